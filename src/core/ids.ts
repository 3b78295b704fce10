import { nanoid } from 'nanoid';

let lastStamp = 0;

// Strictly increasing within the process, so ids sort by creation order.
function nextStamp(now: Date): number {
  lastStamp = Math.max(now.getTime(), lastStamp + 1);
  return lastStamp;
}

/**
 * Opaque id: `<prefix>_<yyyymmddhhmmssSSS>_<suffix>`.
 */
export function generateId(prefix: string, now: Date = new Date()): string {
  const stamp = new Date(nextStamp(now))
    .toISOString()
    .replace(/[-:TZ.]/g, '');
  return `${prefix}_${stamp}_${nanoid(8)}`;
}
