import 'dotenv/config';
import { Command } from 'commander';
import { SetupError, loadConfig } from '../config/settings';
import { formatISODate, parseDateBound } from '../core/time';
import { errorMessage } from '../core/utils';
import { EpisodicStore } from '../memory/episodicStore';
import { reflectOnTrade } from '../memory/reflection';

export type CliReflectOptions = {
  tradeId: string;
  exitPrice: string;
  exitDate?: string;
  config?: string;
};

export const reflectFromCli = (opts: CliReflectOptions, now: Date = new Date()): number => {
  try {
    const config = loadConfig({ configPath: opts.config, env: process.env });
    const exitDate = parseDateBound(opts.exitDate) ?? formatISODate(now);
    const store = new EpisodicStore(config.storage.episodicStoreFile);
    const result = reflectOnTrade(store, opts.tradeId, Number(opts.exitPrice), exitDate, now);
    if (!result.ok) {
      console.error(`[reflect] ${result.error}`);
      return 1;
    }
    const { outcome, reflection } = result;
    console.log(`Trade ${outcome.tradeId} closed: ${outcome.outcome}, P&L ${(outcome.realizedPnl ?? 0).toFixed(2)}`);
    console.log(reflection.outcomeSummary);
    reflection.lessons.forEach((lesson) => console.log(`  lesson: ${lesson}`));
    reflection.adjustments.forEach((adj) => console.log(`  adjust: ${adj}`));
    return 0;
  } catch (err) {
    const message = err instanceof SetupError ? `setup failed: ${err.message}` : errorMessage(err);
    console.error(`[reflect] ${message}`);
    return 1;
  }
};

const program = new Command();

program
  .name('deliberate-reflect')
  .description('Close a recorded trade at an exit price and store a reflection')
  .requiredOption('--trade-id <id>', 'trade id recorded by the learning phase')
  .requiredOption('--exit-price <price>', 'exit price')
  .option('--exit-date <date>', 'exit date (YYYY-MM-DD), defaults to today')
  .option('--config <path>', 'JSON config file merged over the defaults');

if (require.main === module) {
  const opts = program.parse(process.argv).opts<CliReflectOptions>();
  process.exitCode = reflectFromCli(opts);
}
