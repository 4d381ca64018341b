export type SettledSlot<T> = { ok: true; value: T } | { ok: false; error: unknown };

export type FanOutMode = 'concurrent' | 'sequential';

export interface SettledEntry<K extends string, T> {
  key: K;
  result: SettledSlot<T>;
}

/**
 * Runs one task per key and collects every outcome before returning.
 *
 * A rejected task never cancels or delays its siblings. Results come back in
 * `keys` order, whatever order the tasks settled in.
 */
export const settleAll = async <K extends string, T>(
  keys: readonly K[],
  task: (key: K) => Promise<T>,
  mode: FanOutMode = 'concurrent'
): Promise<SettledEntry<K, T>[]> => {
  if (mode === 'sequential') {
    const entries: SettledEntry<K, T>[] = [];
    for (const key of keys) {
      try {
        entries.push({ key, result: { ok: true, value: await task(key) } });
      } catch (error) {
        entries.push({ key, result: { ok: false, error } });
      }
    }
    return entries;
  }

  // async wrapper turns a synchronous throw into a rejection of that slot only
  const settled = await Promise.allSettled(keys.map(async (key) => task(key)));
  return settled.map((outcome, i) => ({
    key: keys[i],
    result: outcome.status === 'fulfilled' ? { ok: true, value: outcome.value } : { ok: false, error: outcome.reason }
  }));
};
