import express from 'express';
import { PipelineConfig } from '../config/settings';
import { isSafeRunId, readRunArtifact, writeRunArtifact } from '../ledger/storage';
import { appendEvent, getRunStatus, ledgerObserver, makeEvent } from '../ledger/ledger';
import { validateRunRequest } from '../core/schema';
import { makeRunId } from '../core/time';
import { errorMessage } from '../core/utils';
import { PipelineDepOverrides, buildPipelineDeps, runPipeline } from '../workflow/pipeline';
import { WorkflowResult } from '../workflow/workflowEngine';
import { formatRunSummary } from '../cli/summary';

export interface RouteResponse {
  status: number;
  body: unknown;
}

export interface RouteDeps {
  config: PipelineConfig;
  depOverrides?: PipelineDepOverrides;
  registry: RunRegistry;
}

export const DEFAULT_REGISTRY_CAPACITY = 100;

/**
 * Most recent results of runs started through this server. Older runs are
 * evicted past `capacity` and are then served from their stored artifact.
 */
export class RunRegistry {
  private results = new Map<string, WorkflowResult>();

  constructor(private capacity = DEFAULT_REGISTRY_CAPACITY) {}

  set(result: WorkflowResult) {
    this.results.delete(result.state.runId);
    this.results.set(result.state.runId, result);
    // Map iteration follows insertion order, so the first key is the oldest.
    for (const runId of this.results.keys()) {
      if (this.results.size <= this.capacity) break;
      this.results.delete(runId);
    }
  }

  get(runId: string): WorkflowResult | undefined {
    return this.results.get(runId);
  }

  size() {
    return this.results.size;
  }
}

export const handleHealth = (): RouteResponse => ({ status: 200, body: { status: 'ok' } });

const runView = (result: WorkflowResult) => ({
  runId: result.state.runId,
  symbol: result.state.symbol,
  reason: result.reason,
  visited: result.visited,
  riskApproved: result.state.riskApproved,
  finalApproval: result.state.finalApproval,
  errors: result.state.errors,
  summary: formatRunSummary(result),
  state: result.state
});

export const handleRunRequest = async (body: unknown, deps: RouteDeps): Promise<RouteResponse> => {
  const request = validateRunRequest(body);
  if (!request.success) {
    return { status: 400, body: { errors: request.errors } };
  }
  const { value } = request;
  const config: PipelineConfig = {
    ...deps.config,
    debate: { rounds: value.rounds ?? deps.config.debate.rounds },
    analysis: { ...deps.config.analysis, concurrent: value.sequential ? false : deps.config.analysis.concurrent }
  };
  const pipelineDeps = buildPipelineDeps(config, deps.depOverrides);
  const runId = makeRunId(value.symbol, pipelineDeps.now());
  const ledgerFile = config.storage.ledgerFile;
  try {
    appendEvent(makeEvent(runId, 'RUN_STARTED', { symbol: value.symbol.toUpperCase(), source: 'http' }), ledgerFile);
    const result = await runPipeline(
      {
        symbol: value.symbol,
        startDate: value.startDate,
        endDate: value.endDate,
        runId,
        observer: ledgerObserver(ledgerFile)
      },
      pipelineDeps
    );
    deps.registry.set(result);
    writeRunArtifact(runId, 'state.json', result.state);
    return { status: 201, body: runView(result) };
  } catch (err) {
    // Only input problems (bad dates) surface here; phases never throw past the engine.
    return { status: 400, body: { errors: [errorMessage(err)] } };
  }
};

export const handleGetRun = (runId: string, deps: RouteDeps): RouteResponse => {
  if (!isSafeRunId(runId)) {
    return { status: 400, body: { errors: ['invalid run id'] } };
  }
  const known = deps.registry.get(runId);
  if (known) return { status: 200, body: runView(known) };
  const state = readRunArtifact(runId, 'state.json');
  if (state === undefined) {
    return { status: 404, body: { errors: [`run ${runId} not found`] } };
  }
  return {
    status: 200,
    body: { runId, status: getRunStatus(runId, deps.config.storage.ledgerFile), state }
  };
};

const send = (res: express.Response, response: RouteResponse) => {
  res.status(response.status).json(response.body);
};

export const registerRoutes = (app: express.Application, deps: RouteDeps) => {
  app.get('/health', (_req, res) => send(res, handleHealth()));

  app.post('/runs', express.json(), (req, res, next) => {
    handleRunRequest(req.body, deps)
      .then((response) => send(res, response))
      .catch(next);
  });

  app.get('/runs/:runId', (req, res) => send(res, handleGetRun(req.params.runId, deps)));
};
