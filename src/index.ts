#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { RecWatchApp } from './app.js';
import { Config, loadConfig, MAX_CHECK_INTERVAL_SECONDS } from './config.js';
import { createLogger, errorMessage } from './logger.js';
import { createServer } from './server.js';

const VERSION = '1.0.0';

interface CliOptions {
  dir?: string;
  interval?: number;
  upload: boolean;
  mcp?: boolean;
  config?: string;
}

const log = createLogger('recwatch');

function parseInterval(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError('must be a positive number of seconds');
  }
  if (seconds > MAX_CHECK_INTERVAL_SECONDS) {
    throw new InvalidArgumentError(`must be at most ${MAX_CHECK_INTERVAL_SECONDS} seconds`);
  }
  return seconds;
}

async function main(options: CliOptions): Promise<void> {
  let config: Config;
  try {
    config = loadConfig({
      configPath: options.config,
      overrides: {
        directory: options.dir,
        checkIntervalSeconds: options.interval,
        uploadEnabled: options.upload === false ? false : undefined,
      },
    });
  } catch (error) {
    log('Failed to load config:', errorMessage(error));
    process.exit(1);
  }

  const app = new RecWatchApp({ config });
  const server = options.mcp ? createServer(app, VERSION) : null;

  const shutdown = async (signal: NodeJS.Signals) => {
    log(`Received ${signal}`);
    await app.stop();
    await server?.close();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error) => {
        log('Error during shutdown:', errorMessage(error));
        process.exit(1);
      });
    });
  }

  await app.start();

  if (server) {
    await server.connect(new StdioServerTransport());
    log('MCP server listening on stdio');
  } else {
    log('Press Ctrl+C to stop...');
  }
}

const program = new Command();

program
  .name('recwatch')
  .description('watch a folder for recordings and upload each one to YouTube once it stops growing')
  .version(VERSION)
  .option('-d, --dir <path>', 'directory to watch (default: ~/Videos)')
  .option('-i, --interval <seconds>', 'seconds of silence before a recording counts as finished', parseInterval)
  .option('--no-upload', 'detect finished recordings without uploading them')
  .option('--mcp', 'serve status and control tools over MCP on stdio')
  .option('-c, --config <file>', 'config file (default: recwatch.config.json or $RECWATCH_CONFIG)')
  .action(async () => {
    try {
      await main(program.opts<CliOptions>());
    } catch (error) {
      log('Failed to start recwatch:', errorMessage(error));
      process.exit(1);
    }
  });

program.parseAsync().catch((error) => {
  log('Fatal error:', errorMessage(error));
  process.exit(1);
});
