// Pure types for functional core
// No classes, only data structures

import type { Dispatcher } from 'undici';

export type HttpLogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * The subset of fetch's init that the executor sends.
 */
export interface FetchInit {
  body?: string | undefined;
  dispatcher?: Dispatcher | undefined;
  headers: Record<string, string>;
  method: string;
  redirect: 'follow' | 'manual';
  signal: AbortSignal;
}

/**
 * The subset of a fetch Response that the executor reads.
 */
export interface FetchResponse {
  headers: { forEach(callback: (value: string, key: string) => void): void };
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponse>;

/**
 * Side effects interface for dependency injection
 */
export interface HttpEffects {
  /** Wall-clock date used for response timestamps */
  date: () => Date;
  delay: (ms: number) => Promise<void>;
  fetch: FetchLike;
  log: (level: HttpLogLevel, message: string, metadata?: Record<string, unknown>) => void;
  /** Monotonic clock in milliseconds */
  now: () => number;
}
