import { missingAnalysts } from '../core/state';
import { WorkflowResult } from '../workflow/workflowEngine';

const yesNo = (flag: boolean) => (flag ? 'yes' : 'no');

// Every recorded error is listed, whatever the approval outcome.
export const formatRunSummary = ({ state, visited, reason }: WorkflowResult): string[] => {
  const lines = [
    `Run ${state.runId} (${state.symbol}): ${reason}`,
    `Phases completed: ${visited.length ? visited.join(', ') : 'none'}`,
    `Risk approved: ${yesNo(state.riskApproved)}`,
    `Final approval: ${yesNo(state.finalApproval)}`
  ];
  const missing = missingAnalysts(state);
  if (missing.length) {
    lines.push(`Missing analysts: ${missing.join(', ')}`);
  }
  const proposal = state.strategyProposal;
  if (proposal) {
    lines.push(
      `Strategy: ${proposal.kind} (${proposal.direction}), size ${(proposal.positionSizeFraction * 100).toFixed(2)}%, confidence ${proposal.confidence.toFixed(2)}`
    );
  }
  if (state.executionPlan) {
    lines.push(`Orders planned: ${state.executionPlan.orders.length}`);
  }
  if (state.ordersSubmitted) {
    lines.push(`Fills: ${state.fills.length}`);
  }
  if (!state.errors.length) {
    lines.push('Errors: none');
    return lines;
  }
  lines.push(`Errors (${state.errors.length}):`);
  state.errors.forEach((err) => lines.push(`  - ${err}`));
  return lines;
};
