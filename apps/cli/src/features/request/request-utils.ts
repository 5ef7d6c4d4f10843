// Pure utility functions for the request command
// All functions are pure - no side effects

import { ApiRequest, JsonValueSchema, TestConfig, ValidationError } from '@reqbench/http';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { z } from 'zod';

import { RequestCommandOptionsSchema } from '../shared/schemas.js';

/**
 * Options as commander collects them. Values of numeric flags arrive as strings.
 */
export interface RequestCommandOptions {
  method?: string | undefined;
  header?: string[] | undefined;
  data?: string | undefined;
  timeout?: string | undefined;
  retry?: string | undefined;
  retryDelay?: string | undefined;
  rateLimit?: string | undefined;
  benchmark?: string | undefined;
  verifySsl?: boolean | undefined;
  followRedirects?: boolean | undefined;
  verbose?: boolean | undefined;
  json?: boolean | undefined;
}

/**
 * Everything needed to run the command, validated.
 */
export interface RequestParams {
  request: ApiRequest;
  config: TestConfig;
  /** Number of benchmark requests; undefined (or 0) sends a single request */
  benchmark: number | undefined;
  verbose: boolean;
  json: boolean;
}

/**
 * Collector for the repeatable -H option.
 */
export function collectHeader(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * Parse "Key: Value" header strings. Entries without a colon are skipped; the
 * value may itself contain colons. Later duplicates win.
 */
export function parseHeaders(headerStrings: readonly string[]): Record<string, string> {
  const headers: Record<string, string> = {};

  for (const header of headerStrings) {
    const separator = header.indexOf(':');
    if (separator === -1) {
      continue;
    }
    headers[header.slice(0, separator).trim()] = header.slice(separator + 1).trim();
  }

  return headers;
}

/**
 * Check the --data argument is JSON and hand back its text, which is sent as
 * typed. An absent or empty value, or a JSON null, means no body.
 */
export function parseBody(data?: string): Result<string | undefined, ValidationError> {
  if (!data) {
    return ok(undefined);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(new ValidationError('data', `Request body is not valid JSON: ${reason}`, data));
  }

  if (!JsonValueSchema.safeParse(parsed).success) {
    return err(new ValidationError('data', 'Request body is not valid JSON', data));
  }

  return ok(parsed === null ? undefined : data);
}

/**
 * camelCase option key to its --kebab-case flag.
 */
export function toFlagName(key: string): string {
  return `--${key.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`)}`;
}

function toOptionError(error: z.ZodError): ValidationError {
  const [first] = error.issues;
  const field = first ? first.path.join('.') : 'options';
  const reason = error.issues.map((issue) => `${toFlagName(issue.path.join('.'))}: ${issue.message}`).join('; ');
  return new ValidationError(field, reason);
}

/**
 * Build request parameters from the URL argument and command options.
 * Validates all parameters and returns a Result.
 */
export function buildRequestParams(
  url: string,
  options: RequestCommandOptions
): Result<RequestParams, ValidationError> {
  const optionsResult = RequestCommandOptionsSchema.safeParse(options);
  if (!optionsResult.success) {
    return err(toOptionError(optionsResult.error));
  }
  const parsed = optionsResult.data;

  const bodyResult = parseBody(parsed.data);
  if (bodyResult.isErr()) {
    return err(bodyResult.error);
  }

  const requestResult = ApiRequest.create({
    url,
    method: parsed.method,
    headers: parseHeaders(parsed.header),
    bodyText: bodyResult.value,
    timeout: parsed.timeout,
  });
  if (requestResult.isErr()) {
    return err(requestResult.error);
  }

  const configResult = TestConfig.create({
    retryAttempts: parsed.retry,
    retryDelay: parsed.retryDelay,
    rateLimit: parsed.rateLimit,
    verifySsl: parsed.verifySsl,
    followRedirects: parsed.followRedirects,
  });
  if (configResult.isErr()) {
    return err(configResult.error);
  }

  return ok({
    request: requestResult.value,
    config: configResult.value,
    benchmark: parsed.benchmark,
    verbose: parsed.verbose ?? false,
    json: parsed.json ?? false,
  });
}
