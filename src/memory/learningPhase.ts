import { StateRecord, TradeOutcome } from '../core/types';
import { recordError } from '../core/state';
import { formatISODate } from '../core/time';
import { errorMessage } from '../core/utils';
import { CONTRACT_MULTIPLIER } from '../execution/optionPricing';
import { EpisodicStore } from './episodicStore';

export interface LearningDeps {
  store: EpisodicStore;
  now?: () => Date;
}

export const tradeIdFor = (runId: string) => `${runId}-T1`;

// The first filled order stands for the trade; option legs count in shares.
export const pendingOutcomeFor = (state: StateRecord, entryDate: string): TradeOutcome | undefined => {
  const plan = state.executionPlan;
  const proposal = state.strategyProposal;
  const fill = state.fills[0];
  if (!plan || !proposal || !fill) return undefined;
  const order = plan.orders.find((o) => o.side === fill.side && o.symbol === fill.symbol);
  const multiplier = order?.instrument === 'option' ? CONTRACT_MULTIPLIER : 1;
  return {
    tradeId: tradeIdFor(state.runId),
    runId: state.runId,
    symbol: state.symbol,
    strategyKind: proposal.kind,
    side: fill.side,
    entryDate,
    entryPrice: fill.price,
    quantity: fill.quantity * multiplier,
    outcome: 'pending',
    notes: proposal.rationale
  };
};

export const runLearningPhase = async (state: StateRecord, deps: LearningDeps): Promise<StateRecord> => {
  const now = deps.now ?? (() => new Date());
  try {
    if (state.ordersSubmitted) {
      const outcome = pendingOutcomeFor(state, state.endDate ?? formatISODate(now()));
      if (outcome) {
        deps.store.recordTrade(outcome);
        console.log(`[learning] recorded pending trade ${outcome.tradeId}.`);
      } else {
        console.warn(`[learning] ${state.symbol}: orders submitted but no fill to record.`);
      }
    }
  } catch (err) {
    const message = errorMessage(err);
    console.error(`[learning] ${message}`);
    recordError(state, `Learning error: ${message}`);
  }
  state.learningComplete = true;
  return state;
};
