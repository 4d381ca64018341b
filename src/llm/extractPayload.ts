import { z } from 'zod';

const FENCE_PATTERN = /```(?:json)?\s*([\s\S]*?)```/i;

const CLOSERS: Record<string, string> = { '{': '}', '[': ']' };

type Scan = { kind: 'closed'; end: number } | { kind: 'mismatched' } | { kind: 'unterminated' };

// Finds the bracket closing the one at `start`.
const scanBalanced = (text: string, start: number): Scan => {
  const expected: string[] = [];
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === '{' || ch === '[') {
      expected.push(CLOSERS[ch]);
    } else if (ch === '}' || ch === ']') {
      if (expected.pop() !== ch) return { kind: 'mismatched' };
      if (expected.length === 0) return { kind: 'closed', end: i };
    }
  }
  return { kind: 'unterminated' };
};

const tryParse = (candidate: string): unknown => {
  try {
    return JSON.parse(candidate);
  } catch {
    return undefined;
  }
};

const parseFirstBalanced = (text: string): unknown => {
  for (let start = 0; start < text.length; start++) {
    const ch = text[start];
    if (ch !== '{' && ch !== '[') continue;
    const scan = scanBalanced(text, start);
    // An opener left open at the end of the text is a truncated payload; stop there.
    if (scan.kind === 'unterminated') return undefined;
    if (scan.kind === 'mismatched') continue;
    const value = tryParse(text.slice(start, scan.end + 1));
    if (value !== undefined) return value;
  }
  return undefined;
};

/**
 * Pulls the first JSON value out of free-form model output.
 *
 * Looks inside a fenced block first, then for the first balanced object or
 * array anywhere in the text. Returns undefined when nothing parses.
 */
export const extractStructuredPayload = (text: string): unknown => {
  if (!text) return undefined;
  const fence = text.match(FENCE_PATTERN);
  if (fence && fence[1]) {
    const inner = fence[1].trim();
    const value = tryParse(inner) ?? parseFirstBalanced(inner);
    if (value !== undefined) return value;
  }
  return parseFirstBalanced(text);
};

export const parseReasoningPayload = <T>(
  text: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fallback: T,
  label: string
): T => {
  const raw = extractStructuredPayload(text);
  if (raw === undefined) {
    console.warn(`[reasoning] ${label}: no structured payload in response; using defaults.`);
    return fallback;
  }
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    console.warn(`[reasoning] ${label}: payload failed validation (${issues}); using defaults.`);
    return fallback;
  }
  return result.data;
};

// Like parseReasoningPayload, but reports failure instead of substituting a value.
export const tryParseReasoningPayload = <T>(
  text: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  label: string
): T | undefined => {
  const raw = extractStructuredPayload(text);
  const result = raw === undefined ? undefined : schema.safeParse(raw);
  if (!result || !result.success) {
    console.warn(`[reasoning] ${label}: unusable payload in response.`);
    return undefined;
  }
  return result.data;
};
