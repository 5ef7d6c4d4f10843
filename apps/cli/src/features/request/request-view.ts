// Pure rendering for the request command: text reports and JSON payloads

import type { ApiResponse, BenchmarkResult } from '@reqbench/http';
import pc from 'picocolors';

export type Colors = ReturnType<typeof pc.createColors>;

const BODY_PREVIEW_LENGTH = 500;
const RULE = '='.repeat(60);

/**
 * Flat JSON shape of a single response.
 */
export interface ResponseJson {
  status_code: number;
  success: boolean;
  elapsed_ms: number;
  headers: Record<string, string>;
  body: string;
  error: string | null;
}

/**
 * Flat JSON shape of a benchmark run. Times in milliseconds except the total duration.
 */
export interface BenchmarkJson {
  url: string;
  total_requests: number;
  successful_requests: number;
  failed_requests: number;
  success_rate: number;
  avg_time_ms: number;
  median_time_ms: number;
  min_time_ms: number;
  max_time_ms: number;
  total_duration_s: number;
  requests_per_second: number;
}

export function toResponseJson(response: ApiResponse): ResponseJson {
  return {
    status_code: response.statusCode,
    success: response.success,
    elapsed_ms: response.elapsedMs,
    headers: { ...response.headers },
    body: response.body,
    error: response.error ?? null,
  };
}

export function toBenchmarkJson(result: BenchmarkResult): BenchmarkJson {
  return {
    url: result.url,
    total_requests: result.totalRequests,
    successful_requests: result.successfulRequests,
    failed_requests: result.failedRequests,
    success_rate: result.successRate,
    avg_time_ms: result.avgTime * 1000,
    median_time_ms: result.medianTime * 1000,
    min_time_ms: result.minTime * 1000,
    max_time_ms: result.maxTime * 1000,
    total_duration_s: result.totalDuration,
    requests_per_second: result.requestsPerSecond,
  };
}

/**
 * Pretty-print a JSON body; otherwise show the first 500 characters and how many were cut.
 */
export function formatBody(body: string): string {
  try {
    return JSON.stringify(JSON.parse(body), undefined, 2);
  } catch {
    if (body.length <= BODY_PREVIEW_LENGTH) {
      return body;
    }
    return `${body.slice(0, BODY_PREVIEW_LENGTH)}\n... (${body.length - BODY_PREVIEW_LENGTH} more characters)`;
  }
}

export function formatResponse(response: ApiResponse, verbose: boolean, colors: Colors = pc): string {
  const paint = response.success ? colors.green : colors.red;
  const lines = [
    '',
    paint(`${response.success ? '✓' : '✗'} Status: ${response.statusCode}`),
    `Time: ${response.elapsedMs.toFixed(2)}ms`,
  ];

  if (response.error) {
    lines.push(`${colors.red('Error:')} ${response.error}`);
  }

  if (verbose) {
    lines.push('', colors.bold('Headers:'));
    for (const [key, value] of Object.entries(response.headers)) {
      lines.push(`  ${key}: ${value}`);
    }
    lines.push('', colors.bold('Body:'), formatBody(response.body));
  }

  return lines.join('\n');
}

const row = (label: string, value: string): string => `${`${label}:`.padEnd(20)}${value}`;

export function formatBenchmark(result: BenchmarkResult, colors: Colors = pc): string {
  const ms = (seconds: number): string => `${(seconds * 1000).toFixed(2)}ms`;

  return [
    '',
    RULE,
    colors.bold(`BENCHMARK RESULTS: ${result.url}`),
    RULE,
    row('Total Requests', String(result.totalRequests)),
    row('Successful', `${result.successfulRequests} (${result.successRate.toFixed(1)}%)`),
    row('Failed', String(result.failedRequests)),
    '',
    colors.bold('TIMING STATISTICS'),
    row('Average', ms(result.avgTime)),
    row('Median', ms(result.medianTime)),
    row('Min', ms(result.minTime)),
    row('Max', ms(result.maxTime)),
    '',
    colors.bold('THROUGHPUT'),
    row('Total Duration', `${result.totalDuration.toFixed(2)}s`),
    row('Requests/Second', result.requestsPerSecond.toFixed(2)),
    RULE,
    '',
  ].join('\n');
}

/**
 * One progress line per completed benchmark request, for verbose mode.
 */
export function formatProgress(requestNumber: number, totalRequests: number, response: ApiResponse): string {
  const outcome = response.error ?? String(response.statusCode);
  return `[${requestNumber}/${totalRequests}] ${outcome} in ${response.elapsedMs.toFixed(2)}ms`;
}
