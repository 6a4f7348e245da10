#!/usr/bin/env node
/**
 * Whale Watcher
 *
 * Watches soon-to-expire prediction markets for whale trades and spends a
 * small daily AI budget on the most active markets, rotating across topics.
 *
 * Usage:
 *   npm start                 # Tick loop (plus operator bot when configured)
 *   npm run scan              # One tick, then exit
 *   npm run reset             # Forget seen whales and today's quota
 *   node dist/src/index.js --reset-history   # Reset, including topic history
 *   node dist/src/index.js --test            # Send a test message everywhere
 */

import type { Client } from 'discord.js';
import { ConfigurationError, describeError, StatePersistError } from './core/index.js';
import { loadConfig, validateConfig, type WatcherConfig } from './config.js';
import { createWatcher, type Watcher } from './watcher.js';
import { formatStatus, registerCommands, startBot } from './output/index.js';
import { logger, setLogLevel, sleep } from './utils/index.js';

// =============================================================================
// CLI PARSING
// =============================================================================

interface CliArgs {
  runNow: boolean;
  reset: boolean;
  resetHistory: boolean;
  test: boolean;
}

function parseArgs(): CliArgs {
  const args = process.argv.slice(2);

  return {
    runNow: args.includes('--run-now') || args.includes('--scan'),
    reset: args.includes('--reset'),
    resetHistory: args.includes('--reset-history'),
    test: args.includes('--test'),
  };
}

// =============================================================================
// MODES
// =============================================================================

async function runOnce(watcher: Watcher): Promise<boolean> {
  try {
    const report = await watcher.scheduler.tick();
    logger.success(
      `Tick done: ${report.whaleAlerts.length} whale alerts, analysis ${report.analysisOutcome}, ` +
      `${report.remaining} AI calls left`
    );
    return true;
  } catch (error) {
    logger.error(`Tick failed: ${describeError(error)}`);
    return false;
  }
}

async function runTest(watcher: Watcher): Promise<boolean> {
  logger.info('Sending a test message to every destination...');
  const report = await watcher.transport.broadcast({
    kind: 'test',
    content: '🐋 **Whale Watcher** - Connection Test\n\nDestination is working! Ready to send alerts.',
  });
  logger.info(`Delivered to ${report.delivered}/${report.results.size} destinations`);
  return report.failed.length === 0 && report.delivered > 0;
}

async function startOperatorBot(config: WatcherConfig, watcher: Watcher): Promise<Client | null> {
  if (!config.discordBotToken) return null;

  const { scheduler } = watcher;

  if (config.discordClientId) {
    await registerCommands(config.discordBotToken, config.discordClientId, config.discordGuildId);
  }

  try {
    return await startBot(config.discordBotToken, {
      status: async () => formatStatus(await scheduler.status()),
      scan: async () => {
        const report = await scheduler.tick();
        return `✅ Scan complete: ${report.whaleAlerts.length} new whales, analysis ${report.analysisOutcome}`;
      },
      rescan: async () => `🔄 Re-scan started\n\n${formatStatus(await scheduler.reset())}`,
    });
  } catch (error) {
    logger.error(`Operator bot unavailable: ${describeError(error)}`);
    return null;
  }
}

/**
 * Tick until SIGINT/SIGTERM. A failed persist is logged and retried on the next tick.
 */
async function runLoop(config: WatcherConfig, watcher: Watcher): Promise<void> {
  const { scheduler } = watcher;
  const shutdown = new AbortController();
  const bot = await startOperatorBot(config, watcher);

  const stop = (signal: string): void => {
    if (shutdown.signal.aborted) return;
    logger.info(`${signal} received, finishing the current tick...`);
    shutdown.abort();
  };
  process.once('SIGINT', () => stop('SIGINT'));
  process.once('SIGTERM', () => stop('SIGTERM'));

  logger.info(`Ticking every ${config.tickIntervalMs / 1000}s (${config.timezone})`);

  while (!shutdown.signal.aborted) {
    try {
      await scheduler.tick();
    } catch (error) {
      if (!(error instanceof StatePersistError)) throw error;
      logger.error(`State not persisted, retrying next tick: ${describeError(error)}`);
    }
    await sleep(config.tickIntervalMs, shutdown.signal);
  }

  await scheduler.stop();
  if (bot) {
    await bot.destroy();
  }
  logger.info('Stopped');
}

// =============================================================================
// MAIN
// =============================================================================

async function main(): Promise<number> {
  console.log(`
╔════════════════════════════════════════════════════════════╗
║                      WHALE WATCHER                         ║
║     Whale alerts and AI insights for expiring markets      ║
╚════════════════════════════════════════════════════════════╝
`);

  let config: WatcherConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (!(error instanceof ConfigurationError)) throw error;
    logger.error('Configuration errors:');
    for (const issue of error.issues) {
      logger.error(`  - ${issue}`);
    }
    return 1;
  }
  setLogLevel(config.logLevel);

  const args = parseArgs();
  const watcher = createWatcher(config);
  watcher.store.open();

  if (args.reset || args.resetHistory) {
    watcher.store.reset({ clearTopicHistory: args.resetHistory });
    logger.success('State reset. The next run re-announces current whales and starts a new burst.');
    return 0;
  }

  // Destinations are needed from here on
  const configCheck = validateConfig(config);
  if (!configCheck.valid) {
    logger.error('Configuration errors:');
    for (const error of configCheck.errors) {
      logger.error(`  - ${error}`);
    }
    logger.info('Please check your .env file');
    return 1;
  }

  if (args.test) {
    return (await runTest(watcher)) ? 0 : 1;
  }

  if (args.runNow) {
    return (await runOnce(watcher)) ? 0 : 1;
  }

  await runLoop(config, watcher);
  return 0;
}

main()
  .then(code => process.exit(code))
  .catch(error => {
    logger.error(`Fatal error: ${describeError(error)}`);
    process.exit(1);
  });
