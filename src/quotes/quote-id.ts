import { randomBytes } from 'crypto';

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

/** `QT-20260118093005-4F1A`: UTC timestamp plus a short random suffix. */
export function generateQuoteId(now: Date = new Date()): string {
  const stamp = [
    pad(now.getUTCFullYear(), 4),
    pad(now.getUTCMonth() + 1),
    pad(now.getUTCDate()),
    pad(now.getUTCHours()),
    pad(now.getUTCMinutes()),
    pad(now.getUTCSeconds()),
  ].join('');

  return `QT-${stamp}-${randomBytes(2).toString('hex').toUpperCase()}`;
}
