import { AnalystReports, DebateArgument, DebatePosition, DebateRole, StateRecord } from '../core/types';
import { debatePayloadSchema } from '../core/schema';
import { recordError } from '../core/state';
import { clamp, errorMessage, truncate } from '../core/utils';
import { extractStructuredPayload } from '../llm/extractPayload';
import { instructionFor } from '../llm/prompts';
import { ReasoningClient } from '../llm/reasoningClient';

export interface DebateDeps {
  reasoning: ReasoningClient;
  rounds: number;
  now?: () => Date;
}

interface Side {
  role: DebateRole;
  position: DebatePosition;
}

// Fixed speaking order within a round.
const SIDES: readonly Side[] = [
  { role: 'bullish_researcher', position: 'bullish' },
  { role: 'bearish_researcher', position: 'bearish' }
];

export const FAILED_ARGUMENT_CONFIDENCE = 0.1;
const UNSTRUCTURED_CONFIDENCE = 0.5;

export const summarizeReports = (reports: AnalystReports): Record<string, unknown> => {
  const out: Record<string, unknown> = {};
  for (const [id, slot] of Object.entries(reports)) {
    if (!slot) continue;
    out[id] =
      slot.status === 'ok'
        ? { summary: slot.report.summary, confidence: slot.report.confidence }
        : { missing: true, error: slot.error };
  }
  return out;
};

const priorArguments = (args: DebateArgument[]) =>
  args.map((a) => ({ role: a.role, round: a.round, argument: a.argument, confidence: a.confidence, failed: a.failed }));

const argue = async (
  state: StateRecord,
  side: Side,
  roundNo: number,
  deps: DebateDeps,
  now: () => Date
): Promise<DebateArgument> => {
  const shell = { role: side.role, round: roundNo, position: side.position };
  let raw: string;
  try {
    raw = await deps.reasoning.generate({
      role: side.role,
      instruction: instructionFor(side.role),
      context: {
        symbol: state.symbol,
        round: roundNo,
        position: side.position,
        reports: summarizeReports(state.analystReports),
        priorArguments: priorArguments(state.debateArguments)
      }
    });
  } catch (err) {
    const message = errorMessage(err);
    console.warn(`[debate] ${side.role} round ${roundNo} failed: ${message}`);
    recordError(state, `Debate error: ${side.role} round ${roundNo}: ${message}`);
    return {
      ...shell,
      argument: `Error generating argument: ${message}`,
      evidence: [],
      counterpoints: [],
      confidence: FAILED_ARGUMENT_CONFIDENCE,
      failed: true,
      timestamp: now().toISOString()
    };
  }

  const parsed = debatePayloadSchema.safeParse(extractStructuredPayload(raw));
  if (!parsed.success) {
    console.warn(`[debate] ${side.role} round ${roundNo}: unstructured response; keeping raw text.`);
    return {
      ...shell,
      argument: truncate(raw.trim(), 2000),
      evidence: [],
      counterpoints: [],
      confidence: UNSTRUCTURED_CONFIDENCE,
      failed: false,
      timestamp: now().toISOString()
    };
  }
  return {
    ...shell,
    argument: parsed.data.argument,
    evidence: parsed.data.evidence,
    counterpoints: parsed.data.counterpoints,
    confidence: clamp(parsed.data.confidence, 0, 1),
    failed: false,
    timestamp: now().toISOString()
  };
};

/**
 * Runs `rounds` rounds of bull-then-bear argument. Each argument is appended
 * before the next call so every speaker sees everything said so far. A failed
 * call becomes a low-confidence placeholder and the debate carries on.
 */
export const runDebatePhase = async (state: StateRecord, deps: DebateDeps): Promise<StateRecord> => {
  const now = deps.now ?? (() => new Date());
  try {
    for (let roundNo = 1; roundNo <= deps.rounds; roundNo++) {
      for (const side of SIDES) {
        state.debateArguments.push(await argue(state, side, roundNo, deps, now));
      }
      state.debateRounds = roundNo;
    }
    console.log(`[debate] ${state.symbol}: ${state.debateArguments.length} arguments over ${state.debateRounds} rounds.`);
  } catch (err) {
    const message = errorMessage(err);
    console.error(`[debate] ${message}`);
    recordError(state, `Debate error: ${message}`);
  }
  state.debateComplete = true;
  return state;
};
