#!/usr/bin/env node
import { pino } from 'pino';
import { ConfigError } from './domain/index.js';
import { loadConfig } from './infrastructure/index.js';
import { parseCli, runRuleTest } from './cli.js';
import { startDaemon } from './daemon.js';

/**
 * logrelay entry point.
 *
 * `--test FILE` dry-runs a log file against the configured rules and
 * exits; otherwise the daemon runs until SIGINT / SIGTERM.
 */
const log = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });

async function main(): Promise<void> {
  const cli = parseCli(process.argv.slice(2));
  const config = loadConfig(cli.configPath);

  if (cli.testFile !== undefined) {
    const matched = await runRuleTest(cli.testFile, config.rules, (text) => {
      process.stdout.write(`${text}\n`);
    });
    log.debug({ matched, file: cli.testFile }, 'Rule test finished');
    return;
  }

  const daemon = await startDaemon(config, log);

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, 'Shutting down...');

    daemon.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    log.fatal({ issues: err.issues }, 'Invalid configuration, refusing to start');
  } else {
    log.fatal({ err }, 'Fatal: failed to start');
  }
  process.exit(1);
});
