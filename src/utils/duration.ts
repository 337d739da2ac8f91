// src/utils/duration.ts - Duration strings such as "672h", "1h30m", "250ms"

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

const SEGMENT = /(\d+(?:\.\d+)?)(ms|s|m|h)/y;

/**
 * Parse a duration string into milliseconds.
 * Returns null when the string is not a well-formed, non-negative duration.
 */
export function parseDuration(input: string): number | null {
  const text = input.trim();
  if (text === '0') return 0;
  if (text.length === 0) return null;

  SEGMENT.lastIndex = 0;
  let total = 0;
  while (SEGMENT.lastIndex < text.length) {
    const match = SEGMENT.exec(text);
    if (!match) return null;
    total += Number(match[1]) * UNIT_MS[match[2]];
  }
  return Math.round(total);
}

export function formatDuration(ms: number): string {
  const sign = ms < 0 ? '-' : '';
  const abs = Math.abs(Math.round(ms));

  if (abs < 1000) return `${sign}${abs}ms`;

  let seconds = Math.round(abs / 1000);
  const hours = Math.floor(seconds / 3600);
  seconds -= hours * 3600;
  const minutes = Math.floor(seconds / 60);
  seconds -= minutes * 60;

  const parts: string[] = [];
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  if (seconds > 0 || parts.length === 0) parts.push(`${seconds}s`);
  return sign + parts.join('');
}
