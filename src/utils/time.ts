export const MINUTES_PER_DAY = 24 * 60;

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatLocalDate(ms: number): string {
  const date = new Date(ms);
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

export function formatLocalDateTime(ms: number): string {
  const date = new Date(ms);
  return `${formatLocalDate(ms)} ${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
}

export function minuteOfDay(ms: number): number {
  const date = new Date(ms);
  return date.getHours() * 60 + date.getMinutes();
}

export function formatMinuteOfDay(minute: number): string {
  const normalized = ((minute % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
  return `${pad2(Math.floor(normalized / 60))}:${pad2(normalized % 60)}`;
}

export function parseTimeOfDay(value: string): number {
  const match = value.trim().match(/^(\d{1,2}):(\d{2})$/);
  if (!match) {
    throw new Error(`Invalid time of day: ${value}`);
  }
  const hours = Number.parseInt(match[1] ?? "", 10);
  const minutes = Number.parseInt(match[2] ?? "", 10);
  if (hours > 23 || minutes > 59) {
    throw new Error(`Invalid time of day: ${value}`);
  }
  return hours * 60 + minutes;
}

/** Milliseconds from `nowMs` until the next local occurrence of `minute` (always in the future). */
export function msUntilNextDailyRun(nowMs: number, minute: number): number {
  const next = new Date(nowMs);
  next.setHours(Math.floor(minute / 60), minute % 60, 0, 0);
  if (next.getTime() <= nowMs) {
    next.setDate(next.getDate() + 1);
  }
  return next.getTime() - nowMs;
}
