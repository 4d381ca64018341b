export { loadConfig, SetupError } from './config/settings';
export type { PipelineConfig, ConfigOverrides } from './config/settings';
export * from './core/types';
export { createInitialState } from './core/state';
export { createReasoningClient, OpenAIReasoningClient, StubReasoningClient } from './llm';
export type { ReasoningClient, ReasoningRequest } from './llm';
export { buildPipelineDeps, buildPipelineGraph, runPipeline, PIPELINE_PHASES } from './workflow/pipeline';
export type { PipelineDeps, RunOptions } from './workflow/pipeline';
export { WorkflowEngine } from './workflow/workflowEngine';
export type { PhaseEvent, PhaseObserver, WorkflowResult, TerminationReason } from './workflow/workflowEngine';
export { EpisodicStore } from './memory/episodicStore';
export { reflectOnTrade } from './memory/reflection';
export { StubMarketDataService } from './data/marketData.stub';
export { CachedMarketDataService } from './data/marketData.cache';
export { StubNewsService } from './data/news.stub';
export { StubBroker } from './broker/broker.stub';
export { ExecutionAdvisor } from './execution/executionAdvisor';
export { formatRunSummary } from './cli/summary';
