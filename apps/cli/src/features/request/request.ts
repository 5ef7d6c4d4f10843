import { RequestAbortedError, type ApiClientHooks } from '@reqbench/http';
import type { Command } from 'commander';

import { displayCliError } from '../shared/cli-error.js';
import { runCommand } from '../shared/command-runtime.js';
import { ExitCodes } from '../shared/exit-codes.js';

import { RequestHandler, type RequestOutcome } from './request-handler.js';
import { buildRequestParams, collectHeader, type RequestCommandOptions, type RequestParams } from './request-utils.js';
import { formatBenchmark, formatProgress, formatResponse, toBenchmarkJson, toResponseJson } from './request-view.js';

const EXAMPLES = `
Examples:
  reqbench https://api.example.com/users/42
  reqbench https://api.example.com/health --verbose
  reqbench https://api.example.com --benchmark 100
  reqbench https://api.example.com/items -X POST -d '{"name":"widget"}'
  reqbench https://api.example.com --retry 5 --rate-limit 10`;

/**
 * Register the request options and action on the root command.
 */
export function registerRequestCommand(program: Command): void {
  program
    .argument('<url>', 'URL to test')
    .option('-X, --method <method>', 'HTTP method', 'GET')
    .option('-H, --header <header>', 'Add header (format: "Key: Value"), repeatable', collectHeader, [])
    .option('-d, --data <json>', 'Request body as JSON string')
    .option('-t, --timeout <seconds>', 'Request timeout in seconds', '30')
    .option('--retry <n>', 'Number of attempts for a failing call', '3')
    .option('--retry-delay <seconds>', 'Initial retry delay in seconds', '0.5')
    .option('--rate-limit <rps>', 'Rate limit in requests per second')
    .option('--benchmark <n>', 'Run a benchmark of N sequential requests')
    .option('--no-verify-ssl', 'Disable TLS certificate verification')
    .option('--no-follow-redirects', 'Report redirect responses instead of following them')
    .option('-v, --verbose', 'Verbose output (headers, body, debug logs)')
    .option('--json', 'Output results as JSON')
    .addHelpText('after', EXAMPLES)
    .action(async (url: string, options: RequestCommandOptions) => {
      await executeRequestCommand(url, options);
    });
}

/**
 * Execute the request command.
 */
async function executeRequestCommand(url: string, options: RequestCommandOptions): Promise<void> {
  const verbose = options.verbose ?? false;

  const paramsResult = buildRequestParams(url, options);
  if (paramsResult.isErr()) {
    return displayCliError(paramsResult.error, verbose);
  }
  const params = paramsResult.value;

  try {
    await runCommand(async (ctx) => {
      const controller = new AbortController();
      const handler = new RequestHandler({ hooks: buildProgressHooks(params) });

      ctx.onCleanup(() => handler.destroy());
      ctx.onAbort(() => {
        process.stderr.write('\nInterrupted by user\n');
        controller.abort();
      });

      if (!params.json) {
        console.log(
          params.benchmark
            ? `Benchmarking ${params.request.url} with ${params.benchmark} requests...`
            : `Testing ${params.request.url}...`
        );
      }

      const result = await handler.execute(params, controller.signal);
      if (result.isErr()) {
        if (result.error instanceof RequestAbortedError) {
          ctx.exitCode = ExitCodes.INTERRUPTED;
          return;
        }
        throw result.error;
      }

      console.log(renderOutcome(result.value, params));
    });
  } catch (error) {
    displayCliError(error instanceof Error ? error : new Error(String(error)), verbose);
  }
}

function buildProgressHooks(params: RequestParams): ApiClientHooks | undefined {
  if (!params.verbose || params.json || !params.benchmark) {
    return undefined;
  }
  return {
    onResponse: ({ requestNumber, response, totalRequests }) => {
      console.log(formatProgress(requestNumber, totalRequests, response));
    },
  };
}

function renderOutcome(outcome: RequestOutcome, params: RequestParams): string {
  if (outcome.kind === 'benchmark') {
    return params.json ? JSON.stringify(toBenchmarkJson(outcome.result), undefined, 2) : formatBenchmark(outcome.result);
  }
  return params.json
    ? JSON.stringify(toResponseJson(outcome.response), undefined, 2)
    : formatResponse(outcome.response, params.verbose);
}
