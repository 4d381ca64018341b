import fs from 'fs';
import path from 'path';
import { SetupError, loadConfig } from '../src/config/settings';
import { createReasoningClient } from '../src/llm';
import { OpenAIReasoningClient } from '../src/llm/openaiClient';
import { StubReasoningClient } from '../src/llm/stubReasoningClient';
import { tmpDir } from './helpers/fakes';

describe('loadConfig', () => {
  it('loads the defaults', () => {
    const config = loadConfig();
    expect(config.llm.provider).toBe('stub');
    expect(config.debate.rounds).toBe(3);
    expect(config.analysis.concurrent).toBe(true);
    expect(config.risk).toEqual({ maxPositionSize: 0.05, maxPortfolioRisk: 0.02, maxSectorConcentration: 0.25 });
    expect(config.sizing).toEqual({ minPositionFraction: 0.001, maxPositionFraction: 0.05 });
    expect(config.executionAdvisor.timeoutMs).toBe(5000);
  });

  it('applies environment overrides', () => {
    const config = loadConfig({
      env: {
        MAX_DEBATE_ROUNDS: '5',
        ENABLE_CONCURRENT_ANALYSIS: 'false',
        EXECUTION_ADVISOR_ENABLED: 'true',
        EXECUTION_ADVISOR_ENDPOINT: 'http://advisor.internal:9000',
        UI_PORT: '9000',
        LEDGER_FILE: '/tmp/ledger.jsonl'
      }
    });
    expect(config.debate.rounds).toBe(5);
    expect(config.analysis.concurrent).toBe(false);
    expect(config.executionAdvisor).toEqual({ enabled: true, endpoint: 'http://advisor.internal:9000', timeoutMs: 5000 });
    expect(config.ui.port).toBe(9000);
    expect(config.storage.ledgerFile).toBe('/tmp/ledger.jsonl');
  });

  it('lets explicit overrides win over the environment', () => {
    const config = loadConfig({ env: { MAX_DEBATE_ROUNDS: '5' }, overrides: { debate: { rounds: 2 } } });
    expect(config.debate.rounds).toBe(2);
  });

  it('merges a config file over the defaults', () => {
    const file = path.join(tmpDir('config'), 'pipeline.json');
    fs.writeFileSync(file, JSON.stringify({ portfolio: { totalValue: 250000 } }));
    const config = loadConfig({ configPath: file });
    expect(config.portfolio.totalValue).toBe(250000);
    expect(config.portfolio.currentVar).toBe(0);
  });

  it('rejects a missing config file', () => {
    expect(() => loadConfig({ configPath: path.join(tmpDir('config'), 'absent.json') })).toThrow(SetupError);
  });

  it('rejects invalid settings', () => {
    expect(() => loadConfig({ overrides: { debate: { rounds: 0 } } })).toThrow(/Invalid configuration: debate\.rounds/);
    expect(() => loadConfig({ overrides: { sizing: { minPositionFraction: 0.1, maxPositionFraction: 0.05 } } })).toThrow(
      SetupError
    );
  });

  it('requires an API key for the openai provider', () => {
    expect(() => loadConfig({ env: { LLM_PROVIDER: 'openai' } })).toThrow(
      new SetupError('LLM_PROVIDER=openai but OPENAI_API_KEY is not set.')
    );
  });

  it('builds the reasoning client for the configured provider', () => {
    expect(createReasoningClient(loadConfig())).toBeInstanceOf(StubReasoningClient);
    const config = loadConfig({ env: { LLM_PROVIDER: 'openai', OPENAI_API_KEY: 'test-secret' } });
    expect(createReasoningClient(config)).toBeInstanceOf(OpenAIReasoningClient);
  });
});
