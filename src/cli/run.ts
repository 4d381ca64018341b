import 'dotenv/config';
import { Command } from 'commander';
import { ConfigOverrides, SetupError, loadConfig } from '../config/settings';
import { validateRunRequest } from '../core/schema';
import { errorMessage } from '../core/utils';
import { appendEvent, ledgerObserver, makeEvent } from '../ledger/ledger';
import { writeRunArtifact } from '../ledger/storage';
import { makeRunId } from '../core/time';
import { buildPipelineDeps, runPipeline } from '../workflow/pipeline';
import { WorkflowResult } from '../workflow/workflowEngine';
import { formatRunSummary } from './summary';

export const EXIT_OK = 0;
export const EXIT_SETUP = 1;
export const EXIT_INTERRUPTED = 130;

export type CliRunOptions = {
  symbol?: string;
  startDate?: string;
  endDate?: string;
  rounds?: string;
  sequential?: boolean;
  config?: string;
};

export const exitCodeFor = (result: WorkflowResult) => (result.reason === 'interrupted' ? EXIT_INTERRUPTED : EXIT_OK);

export const runFromCli = async (opts: CliRunOptions, signal?: AbortSignal): Promise<number> => {
  const request = validateRunRequest({
    symbol: opts.symbol ?? '',
    startDate: opts.startDate,
    endDate: opts.endDate,
    rounds: opts.rounds === undefined ? undefined : Number(opts.rounds),
    sequential: opts.sequential
  });
  if (!request.success) {
    request.errors.forEach((err) => console.error(`[cli] ${err}`));
    return EXIT_SETUP;
  }
  const { value } = request;

  const overrides: ConfigOverrides = {};
  if (value.rounds !== undefined) overrides.debate = { rounds: value.rounds };
  if (value.sequential) overrides.analysis = { concurrent: false };

  let result: WorkflowResult;
  try {
    const config = loadConfig({ configPath: opts.config, env: process.env, overrides });
    const deps = buildPipelineDeps(config);
    const runId = makeRunId(value.symbol, deps.now());
    const ledgerFile = config.storage.ledgerFile;
    appendEvent(makeEvent(runId, 'RUN_STARTED', { symbol: value.symbol.toUpperCase() }), ledgerFile);
    result = await runPipeline(
      {
        symbol: value.symbol,
        startDate: value.startDate,
        endDate: value.endDate,
        runId,
        observer: ledgerObserver(ledgerFile),
        signal
      },
      deps
    );
    writeRunArtifact(result.state.runId, 'state.json', result.state);
  } catch (err) {
    if (err instanceof SetupError) {
      console.error(`[cli] setup failed: ${err.message}`);
    } else {
      console.error(`[cli] ${errorMessage(err)}`);
    }
    return EXIT_SETUP;
  }

  formatRunSummary(result).forEach((line) => console.log(line));
  return exitCodeFor(result);
};

const program = new Command();

program
  .name('deliberate')
  .description('Run one symbol through analysis, debate, strategy, risk and portfolio approval')
  .requiredOption('--symbol <symbol>', 'ticker symbol to evaluate')
  .option('--start-date <date>', 'analysis window start (YYYY-MM-DD)')
  .option('--end-date <date>', 'analysis window end (YYYY-MM-DD)')
  .option('--rounds <n>', 'debate rounds')
  .option('--sequential', 'run analysts one at a time', false)
  .option('--config <path>', 'JSON config file merged over the defaults');

const main = async () => {
  const opts = program.parse(process.argv).opts<CliRunOptions>();
  const controller = new AbortController();
  // The first Ctrl-C stops the run between phases; a second one exits at once.
  process.once('SIGINT', () => {
    console.warn('[cli] interrupt received; stopping after the current phase.');
    controller.abort();
    process.once('SIGINT', () => process.exit(EXIT_INTERRUPTED));
  });
  process.exitCode = await runFromCli(opts, controller.signal);
};

if (require.main === module) {
  main().catch((err) => {
    console.error(err);
    process.exitCode = EXIT_SETUP;
  });
}
