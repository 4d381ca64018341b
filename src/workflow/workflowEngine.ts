import { PhaseName, StateRecord } from '../core/types';
import { enterPhase, markPhaseVisited, recordError } from '../core/state';
import { errorMessage } from '../core/utils';
import { PhaseGraph, TERMINATE, Target, resolveNext, validateGraph } from './phaseGraph';

export type TerminationReason = 'completed' | 'risk_rejected' | 'portfolio_rejected' | 'interrupted' | 'routing_error';

export type PhaseEvent =
  | { type: 'PHASE_STARTED'; runId: string; phase: PhaseName; at: string }
  | { type: 'PHASE_COMPLETED'; runId: string; phase: PhaseName; at: string; errorCount: number }
  | { type: 'RUN_TERMINATED'; runId: string; at: string; reason: TerminationReason; visited: PhaseName[] };

export type PhaseObserver = (event: PhaseEvent) => void;

export interface WorkflowResult {
  state: StateRecord;
  visited: PhaseName[];
  reason: TerminationReason;
}

export interface RunControls {
  signal?: AbortSignal;
}

export const PHASE_LABELS: Record<PhaseName, string> = {
  analysis: 'Analysis',
  debate: 'Debate',
  strategy: 'Strategy',
  execution_planning: 'Execution planning',
  risk_assessment: 'Risk assessment',
  portfolio_decision: 'Portfolio decision',
  execution: 'Execution',
  learning: 'Learning'
};

const terminationFor = (from: PhaseName): TerminationReason => {
  if (from === 'risk_assessment') return 'risk_rejected';
  if (from === 'portfolio_decision') return 'portfolio_rejected';
  return 'completed';
};

/**
 * Walks the phase graph for one run. Each node call is guarded, so a phase
 * that throws is recorded as an error and the walk continues; the caller
 * always gets a complete final state back.
 */
export class WorkflowEngine {
  private graph: PhaseGraph<PhaseName, StateRecord>;
  private observer?: PhaseObserver;

  constructor(graph: PhaseGraph<PhaseName, StateRecord>, observer?: PhaseObserver) {
    const problems = validateGraph(graph);
    if (problems.length) {
      throw new Error(`Invalid phase graph: ${problems.join('; ')}`);
    }
    this.graph = graph;
    this.observer = observer;
  }

  private emit(event: PhaseEvent) {
    if (!this.observer) return;
    try {
      this.observer(event);
    } catch (err) {
      console.warn(`[workflow] observer failed on ${event.type}: ${errorMessage(err)}`);
    }
  }

  async run(initial: StateRecord, controls: RunControls = {}): Promise<WorkflowResult> {
    let state = initial;
    const visited: PhaseName[] = [];
    let current: Target<PhaseName> = this.graph.entry;
    let reason: TerminationReason = 'completed';

    while (current !== TERMINATE) {
      if (controls.signal?.aborted) {
        reason = 'interrupted';
        break;
      }
      // Each phase runs at most once; the graph has no loops.
      if (visited.includes(current)) {
        recordError(state, `Workflow error: ${current} reached twice`);
        reason = 'routing_error';
        break;
      }
      const phase: PhaseName = current;
      visited.push(phase);
      enterPhase(state, phase);
      this.emit({ type: 'PHASE_STARTED', runId: state.runId, phase, at: new Date().toISOString() });
      try {
        state = await this.graph.nodes[phase](state);
      } catch (err) {
        const message = errorMessage(err);
        console.error(`[workflow] ${phase} threw: ${message}`);
        recordError(state, `${PHASE_LABELS[phase]} error: ${message}`);
      }
      markPhaseVisited(state, phase);
      this.emit({
        type: 'PHASE_COMPLETED',
        runId: state.runId,
        phase,
        at: new Date().toISOString(),
        errorCount: state.errors.length
      });

      try {
        current = resolveNext(this.graph, phase, state);
      } catch (err) {
        recordError(state, `Workflow error: ${errorMessage(err)}`);
        reason = 'routing_error';
        break;
      }
      if (current === TERMINATE) reason = terminationFor(phase);
    }

    this.emit({ type: 'RUN_TERMINATED', runId: state.runId, at: new Date().toISOString(), reason, visited: visited.slice() });
    return { state, visited, reason };
  }
}
