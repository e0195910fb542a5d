export const MINUTE_MS = 60_000;
export const DAY_MS = 24 * 60 * MINUTE_MS;

// Expirations outlive the window so skewed clocks and late writers still land
export const MINUTE_KEY_TTL_MS = 2 * MINUTE_MS;
export const DAY_KEY_TTL_MS = 25 * 60 * MINUTE_MS;

const BUCKET_WIDTH = 12;

export type WindowKeys = {
  minuteRequests: string;
  minuteTokens: string;
  dayRequests: string;
};

// Fixed width keeps lexical order equal to temporal order
function bucket(nowMs: number, windowMs: number): string {
  return String(Math.floor(nowMs / windowMs)).padStart(BUCKET_WIDTH, '0');
}

export function minuteBucket(nowMs: number): string {
  return bucket(nowMs, MINUTE_MS);
}

export function dayBucket(nowMs: number): string {
  return bucket(nowMs, DAY_MS);
}

export function windowKeys(prefix: string, nowMs: number): WindowKeys {
  const minute = minuteBucket(nowMs);
  return {
    minuteRequests: `${prefix}:minute:${minute}`,
    minuteTokens: `${prefix}:tokens:minute:${minute}`,
    dayRequests: `${prefix}:day:${dayBucket(nowMs)}`,
  };
}

export function msUntilNextMinute(nowMs: number): number {
  return MINUTE_MS - (nowMs % MINUTE_MS);
}

export function msUntilNextDay(nowMs: number): number {
  return DAY_MS - (nowMs % DAY_MS);
}
