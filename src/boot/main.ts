#!/usr/bin/env node
/**
 * CLI entry point
 */

import { createInterface } from 'readline';

import chalk from 'chalk';
import { Command } from 'commander';

import { describeError } from '../types/errors';
import { nowMs } from '../utils/time';
import { validateConfig } from '../validation/validator';
import {
  buildTestMessage,
  executeCommand,
  formatDispatchReport,
  formatStatus,
  formatValidation,
  parseCommandLine,
  parseIntervalOption
} from './cli';
import { loadEnvFile } from './config';
import { APP_VERSION, initialize, resolveConfig } from './init';

import type { OutputLine } from './cli';
import type { App } from './types';

function print(line: OutputLine): void {
  console.log(line.ok ? line.text : chalk.red(line.text));
}

function printWarning(line: OutputLine): void {
  console.log(line.text.startsWith('warning') ? chalk.yellow(line.text) : line.text);
}

/**
 * Read commands from stdin until end of input or a termination signal
 * @param app - Wired application
 */
function runInteractive(app: App): Promise<void> {
  return new Promise(function(resolve) {
    const rl = createInterface({ input: process.stdin, terminal: false });

    function onSignal(signal: NodeJS.Signals): void {
      app.logger.info('Received ' + signal + ', shutting down');
      rl.close();
    }

    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);

    rl.on('line', function(line) {
      const output = executeCommand(parseCommandLine(line), app.actions, function() {
        return formatStatus(app.watchdog.snapshot(), nowMs());
      });
      if (output !== null) {
        print(output);
      }
    });

    rl.on('close', function() {
      process.removeListener('SIGINT', onSignal);
      process.removeListener('SIGTERM', onSignal);
      app.logger.info('Draining ' + app.alerts.pending() + ' pending alert(s)');
      app.shutdown().then(resolve, function(err: unknown) {
        app.logger.critical('Shutdown failed: ' + describeError(err));
        resolve();
      });
    });
  });
}

/**
 * Build the command-line program
 * @returns Configured commander program
 */
export function buildProgram(): Command {
  const program = new Command();

  program
    .name('liveness-watchdog')
    .description('Liveness watchdog with multi-channel alert fallback')
    .version(APP_VERSION)
    .option('--env-file <path>', 'load environment variables from this file', '.env');

  program
    .command('run')
    .description('start the watchdog and read feed/stop/status commands from stdin')
    .option('-i, --interval <ms>', 'poll interval in milliseconds', parseIntervalOption)
    .action(async function(options: { interval?: number }) {
      loadEnvFile(program.opts<{ envFile: string }>().envFile);
      const app = initialize({ pollIntervalMs: options.interval });
      if (app === null) {
        process.exitCode = 1;
        return;
      }
      app.poller.start();
      await runInteractive(app);
    });

  program
    .command('send-test')
    .description('send a message through the notification channels and report each attempt')
    .argument('[message]', 'message text')
    .action(async function(message: string | undefined) {
      loadEnvFile(program.opts<{ envFile: string }>().envFile);
      const app = initialize();
      if (app === null) {
        process.exitCode = 1;
        return;
      }
      const report = await app.router.dispatch(message ?? buildTestMessage(nowMs()));
      formatDispatchReport(report).forEach(print);
      process.exitCode = report.delivered ? 0 : 1;
    });

  program
    .command('check-config')
    .description('validate the configuration and print errors and warnings')
    .action(function() {
      loadEnvFile(program.opts<{ envFile: string }>().envFile);
      const result = validateConfig(resolveConfig());
      formatValidation(result).forEach(function(line) {
        if (line.ok) {
          printWarning(line);
        } else {
          print(line);
        }
      });
      process.exitCode = result.valid ? 0 : 1;
    });

  return program;
}

if (require.main === module) {
  buildProgram().parseAsync(process.argv).catch(function(err: unknown) {
    console.error(chalk.red(describeError(err)));
    process.exitCode = 1;
  });
}
