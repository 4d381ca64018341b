import crypto from 'crypto';
import { LedgerEvent, LedgerEventType } from '../core/types';
import { PhaseEvent, PhaseObserver } from '../workflow/workflowEngine';
import { appendLedgerEvent, readEventsForRun, readLedgerEvents } from './storage';

export const makeEvent = (runId: string, type: LedgerEventType, details?: Record<string, unknown>): LedgerEvent => ({
  id: crypto.randomUUID(),
  runId,
  timestamp: new Date().toISOString(),
  type,
  details
});

export const appendEvent = (event: LedgerEvent, filePath?: string) => {
  appendLedgerEvent(event, filePath);
};

export type RunStatus = 'IN_PROGRESS' | 'COMPLETED' | 'REJECTED' | 'FAILED' | 'UNKNOWN';

const statusOf = (type: LedgerEventType): RunStatus => {
  switch (type) {
    case 'RUN_COMPLETED':
      return 'COMPLETED';
    case 'RUN_REJECTED':
      return 'REJECTED';
    case 'RUN_FAILED':
      return 'FAILED';
    case 'RUN_STARTED':
    case 'PHASE_STARTED':
    case 'PHASE_COMPLETED':
      return 'IN_PROGRESS';
  }
};

// Events are appended in order, so the last line for a run carries its status.
export const getRunStatus = (runId: string, filePath?: string): RunStatus => {
  const events = readEventsForRun(runId, filePath);
  const last = events[events.length - 1];
  return last ? statusOf(last.type) : 'UNKNOWN';
};

export const getRecentRuns = (limit = 10, filePath?: string): { runId: string; status: RunStatus; updatedAt: string }[] => {
  const latest = new Map<string, LedgerEvent>();
  for (const evt of readLedgerEvents(filePath)) {
    latest.set(evt.runId, evt);
  }
  return Array.from(latest.values())
    .sort((a, b) => b.timestamp.localeCompare(a.timestamp))
    .slice(0, limit)
    .map((evt) => ({ runId: evt.runId, status: statusOf(evt.type), updatedAt: evt.timestamp }));
};

export const ledgerEventFor = (event: PhaseEvent): LedgerEvent => {
  switch (event.type) {
    case 'PHASE_STARTED':
      return makeEvent(event.runId, 'PHASE_STARTED', { phase: event.phase });
    case 'PHASE_COMPLETED':
      return makeEvent(event.runId, 'PHASE_COMPLETED', { phase: event.phase, errorCount: event.errorCount });
    case 'RUN_TERMINATED': {
      const details = { reason: event.reason, visited: event.visited };
      if (event.reason === 'completed') return makeEvent(event.runId, 'RUN_COMPLETED', details);
      if (event.reason === 'risk_rejected' || event.reason === 'portfolio_rejected') {
        return makeEvent(event.runId, 'RUN_REJECTED', details);
      }
      return makeEvent(event.runId, 'RUN_FAILED', details);
    }
  }
};

export const ledgerObserver =
  (filePath?: string): PhaseObserver =>
  (event) => {
    appendEvent(ledgerEventFor(event), filePath);
  };
