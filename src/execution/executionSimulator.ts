import { Broker } from '../broker/broker.types';
import { Fill, OrderPlacement, StateRecord } from '../core/types';
import { recordError } from '../core/state';
import { formatISODate } from '../core/time';
import { errorMessage } from '../core/utils';

export interface ExecutionDeps {
  broker: Broker;
  now?: () => Date;
}

const describeOrder = (index: number, symbol: string, side: string) => `order ${index + 1} (${side} ${symbol})`;

/**
 * Submits the approved plan to the paper broker. An empty plan completes
 * without submitting; a failing order is recorded and the rest still go out.
 */
export const runExecutionPhase = async (state: StateRecord, deps: ExecutionDeps): Promise<StateRecord> => {
  const now = deps.now ?? (() => new Date());
  const orders = state.executionPlan?.orders ?? [];
  if (!orders.length) {
    console.log(`[execution] ${state.symbol}: empty plan; nothing to submit.`);
    state.executionComplete = true;
    return state;
  }

  const asOf = state.endDate ?? formatISODate(now());
  const placements: OrderPlacement[] = [];
  for (const [index, order] of orders.entries()) {
    try {
      await deps.broker.previewOrder(order, asOf);
      placements.push(await deps.broker.placeOrder(order, asOf));
    } catch (err) {
      const message = errorMessage(err);
      console.error(`[execution] ${describeOrder(index, order.symbol, order.side)} failed: ${message}`);
      recordError(state, `Execution error: ${describeOrder(index, order.symbol, order.side)}: ${message}`);
    }
  }

  let fills: Fill[] = [];
  if (placements.length) {
    try {
      fills = await deps.broker.getFills(
        placements.map((p) => p.orderId),
        asOf
      );
    } catch (err) {
      const message = errorMessage(err);
      console.error(`[execution] fill retrieval failed: ${message}`);
      recordError(state, `Execution error: fill retrieval: ${message}`);
    }
  }
  state.fills.push(...fills);
  state.ordersSubmitted = placements.length > 0;
  state.executionComplete = true;
  console.log(`[execution] ${state.symbol}: ${placements.length}/${orders.length} order(s) placed, ${fills.length} fill(s).`);
  return state;
};
