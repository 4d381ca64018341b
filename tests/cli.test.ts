import path from 'path';
import { EXIT_INTERRUPTED, EXIT_OK, EXIT_SETUP, runFromCli } from '../src/cli/run';
import { reflectFromCli } from '../src/cli/reflect';
import { formatRunSummary } from '../src/cli/summary';
import { createInitialState } from '../src/core/state';
import { EpisodicStore } from '../src/memory/episodicStore';
import { makeProposal, silenceConsole, tmpDir } from './helpers/fakes';

describe('formatRunSummary', () => {
  it('lists phases, approval flags and every error', () => {
    const state = createInitialState('AAPL', { runId: 'run-1' });
    state.riskApproved = true;
    state.strategyProposal = makeProposal();
    state.analystReports.fundamentals = { status: 'missing', analyst: 'fundamentals', error: 'timeout' };
    state.errors.push('fundamentals analysis failed: timeout', 'Portfolio decision error: offline');

    expect(formatRunSummary({ state, visited: ['analysis', 'debate'], reason: 'portfolio_rejected' })).toEqual([
      'Run run-1 (AAPL): portfolio_rejected',
      'Phases completed: analysis, debate',
      'Risk approved: yes',
      'Final approval: no',
      'Missing analysts: fundamentals',
      'Strategy: long_equity (long), size 2.00%, confidence 0.70',
      'Errors (2):',
      '  - fundamentals analysis failed: timeout',
      '  - Portfolio decision error: offline'
    ]);
  });

  it('says so when there are no errors', () => {
    const state = createInitialState('MSFT', { runId: 'run-2' });
    expect(formatRunSummary({ state, visited: [], reason: 'interrupted' })).toEqual([
      'Run run-2 (MSFT): interrupted',
      'Phases completed: none',
      'Risk approved: no',
      'Final approval: no',
      'Errors: none'
    ]);
  });
});

describe('command line', () => {
  const savedEnv = { ...process.env };
  let dir: string;

  beforeEach(() => {
    silenceConsole();
    dir = tmpDir('cli');
    process.env.LEDGER_FILE = path.join(dir, 'events.jsonl');
    process.env.EPISODIC_STORE_FILE = path.join(dir, 'memory.jsonl');
    process.env.RUNS_DIR = path.join(dir, 'runs');
    process.env.LLM_PROVIDER = 'stub';
    process.env.MAX_DEBATE_ROUNDS = '';
  });

  afterEach(() => {
    process.env = { ...savedEnv };
    jest.restoreAllMocks();
  });

  it('runs a symbol and prints the summary', async () => {
    const code = await runFromCli({ symbol: 'AAPL', endDate: '2024-03-15', rounds: '3' });
    expect(code).toBe(EXIT_OK);
    expect(console.log).toHaveBeenCalledWith('Final approval: yes');
    expect(console.log).toHaveBeenCalledWith('Errors: none');
  });

  it('exits with the setup code on invalid input', async () => {
    expect(await runFromCli({ symbol: 'NOT A SYMBOL' })).toBe(EXIT_SETUP);
    expect(await runFromCli({ symbol: 'AAPL', rounds: '0' })).toBe(EXIT_SETUP);
  });

  it('exits with the setup code when the provider has no key', async () => {
    process.env.LLM_PROVIDER = 'openai';
    process.env.OPENAI_API_KEY = '';
    process.env.LLM_API_KEY = '';
    expect(await runFromCli({ symbol: 'AAPL' })).toBe(EXIT_SETUP);
    expect(console.error).toHaveBeenCalledWith('[cli] setup failed: LLM_PROVIDER=openai but OPENAI_API_KEY is not set.');
  });

  it('exits with the interrupt code when stopped', async () => {
    const controller = new AbortController();
    controller.abort();
    expect(await runFromCli({ symbol: 'AAPL', endDate: '2024-03-15' }, controller.signal)).toBe(EXIT_INTERRUPTED);
  });

  it('reflects on a recorded trade', () => {
    const store = new EpisodicStore(path.join(dir, 'memory.jsonl'));
    store.recordTrade({
      tradeId: 'run-1-T1',
      runId: 'run-1',
      symbol: 'AAPL',
      strategyKind: 'long_equity',
      side: 'BUY',
      entryDate: '2024-03-15',
      entryPrice: 100,
      quantity: 10,
      outcome: 'pending'
    });

    expect(reflectFromCli({ tradeId: 'run-1-T1', exitPrice: '90', exitDate: '2024-04-01' })).toBe(0);
    expect(console.log).toHaveBeenCalledWith('Trade run-1-T1 closed: loss, P&L -100.00');
    expect(reflectFromCli({ tradeId: 'run-1-T1', exitPrice: '95' })).toBe(1);
    expect(reflectFromCli({ tradeId: 'missing', exitPrice: '95' })).toBe(1);
  });
});
