import crypto from 'crypto';

export const formatISODate = (date: Date): string => date.toISOString().slice(0, 10);

export const parseDateBound = (value?: string): string | undefined => {
  if (!value) return undefined;
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    throw new Error(`Invalid date bound (expected YYYY-MM-DD): ${value}`);
  }
  const parsed = new Date(`${value}T00:00:00Z`);
  if (Number.isNaN(parsed.getTime()) || formatISODate(parsed) !== value) {
    throw new Error(`Invalid date bound: ${value}`);
  }
  return value;
};

export const assertDateOrder = (startDate?: string, endDate?: string) => {
  if (startDate && endDate && startDate > endDate) {
    throw new Error(`start date ${startDate} is after end date ${endDate}`);
  }
};

// ISO minute with dashes in place of colons so the id is safe as a directory name.
export const makeRunId = (symbol: string, now: Date = new Date()): string => {
  const isoMinute = now.toISOString().slice(0, 16).replace(/:/g, '-');
  return `${symbol.toUpperCase()}-${isoMinute}-${crypto.randomUUID().slice(0, 8)}`;
};
