#!/usr/bin/env node
import { DEFAULT_ALLOCATION, loadConfig, loadEnvFile } from './config';
import { ConfigError } from './errors';
import { RebalanceBot } from './rebalance-bot';
import { SubmissionMode } from './types';

function parseMode(arg: string | undefined): SubmissionMode | null {
  return arg === 'test' || arg === 'live' ? arg : null;
}

async function runRebalance(mode: SubmissionMode): Promise<void> {
  loadEnvFile();
  const config = loadConfig();

  if (mode === 'live') {
    console.log('*** LIVE mode: real orders will be submitted ***');
  }

  const bot = RebalanceBot.fromConfig(config, DEFAULT_ALLOCATION, mode);
  const summary = await bot.run();

  if (summary.report.failedCount > 0) {
    process.exitCode = 1;
  }
}

const mode = parseMode(process.argv[2]);

if (mode) {
  runRebalance(mode).catch((error: unknown) => {
    if (error instanceof ConfigError) {
      console.error(error.message);
    } else {
      console.error('Rebalance aborted:', error);
    }
    process.exitCode = 1;
  });
} else {
  console.log('Usage: npm start [test|live]');
  console.log('  test - Validate orders against the exchange without placing them');
  console.log('  live - Place real buy orders (requires BINANCE_API_KEY and BINANCE_API_SECRET)');
}
