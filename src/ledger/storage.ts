import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ensureDir, readJSONFile, writeJSONFile } from '../core/utils';
import { LedgerEvent } from '../core/types';

const ledgerEventSchema = z.object({
  id: z.string(),
  runId: z.string(),
  timestamp: z.string(),
  type: z.enum(['RUN_STARTED', 'PHASE_STARTED', 'PHASE_COMPLETED', 'RUN_REJECTED', 'RUN_COMPLETED', 'RUN_FAILED']),
  details: z.record(z.unknown()).optional()
});

// Resolved per call so LEDGER_FILE / RUNS_DIR set after import still apply.
export const getLedgerFile = (override?: string) =>
  path.resolve(override ?? process.env.LEDGER_FILE ?? path.join(process.cwd(), 'ledger', 'events.jsonl'));

export const getRunsDir = () => path.resolve(process.env.RUNS_DIR ?? path.join(process.cwd(), 'runs'));

export const appendLedgerEvent = (event: LedgerEvent, filePath?: string) => {
  const ledgerFile = getLedgerFile(filePath);
  ensureDir(path.dirname(ledgerFile));
  fs.appendFileSync(ledgerFile, `${JSON.stringify(event)}\n`);
};

export const readLedgerEvents = (filePath?: string): LedgerEvent[] => {
  const ledgerFile = getLedgerFile(filePath);
  if (!fs.existsSync(ledgerFile)) return [];
  const content = fs.readFileSync(ledgerFile, 'utf-8');
  const lines = content.trim().length ? content.trim().split('\n') : [];
  const events: LedgerEvent[] = [];
  for (const line of lines) {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      console.warn(`[ledger] skipping unreadable line in ${ledgerFile}`);
      continue;
    }
    const parsed = ledgerEventSchema.safeParse(raw);
    if (parsed.success) events.push(parsed.data);
  }
  return events;
};

export const readEventsForRun = (runId: string, filePath?: string): LedgerEvent[] =>
  readLedgerEvents(filePath).filter((e) => e.runId === runId);

// Run ids double as directory names; anything that could escape the runs dir is refused.
export const isSafeRunId = (runId: string) => /^[A-Za-z0-9._-]+$/.test(runId) && !runId.includes('..');

export const writeRunArtifact = (runId: string, fileName: string, data: unknown) => {
  if (!isSafeRunId(runId)) throw new Error(`Invalid run id: ${runId}`);
  writeJSONFile(path.join(getRunsDir(), runId, fileName), data);
};

export const readRunArtifact = (runId: string, fileName: string): unknown => {
  if (!isSafeRunId(runId)) return undefined;
  const filePath = path.join(getRunsDir(), runId, fileName);
  if (!fs.existsSync(filePath)) return undefined;
  return readJSONFile(filePath);
};
