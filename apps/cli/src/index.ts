#!/usr/bin/env node
import { ConsoleSink, flushLoggers, getLogger, initLogger, resolveLogLevel } from '@reqbench/logger';
import { Command } from 'commander';
import pc from 'picocolors';

import { registerRequestCommand } from './features/request/request.js';
import { displayCliError } from './features/shared/cli-error.js';
import { ExitCodes, exitWithCode } from './features/shared/exit-codes.js';

const logger = getLogger('CLI');
const program = new Command();

async function main() {
  program
    .name('reqbench')
    .description('Send test requests to an HTTP endpoint and benchmark its latency')
    .version('0.1.0');

  registerRequestCommand(program);

  // Logs go to stderr so --json output on stdout stays parseable
  program.hook('preAction', (command) => {
    const { verbose } = command.opts<{ verbose?: boolean | undefined }>();
    initLogger({
      level: resolveLogLevel(verbose ?? false),
      sinks: [new ConsoleSink({ color: pc.isColorSupported, stream: 'stderr' })],
    });
  });

  await program.parseAsync();
  flushLoggers();
}

// Handle unhandled rejections
process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${String(reason)}`);
  flushLoggers();
  exitWithCode(ExitCodes.GENERAL_ERROR);
});

main().catch((error: unknown) => {
  displayCliError(error instanceof Error ? error : new Error(String(error)), false);
});
