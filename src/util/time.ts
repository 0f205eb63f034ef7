export interface TimeOfDay {
  hours: number;
  minutes: number;
  seconds: number;
}

const TIME_RE = /^(\d{1,2}):(\d{2}):(\d{2})$/;

/** Parses a 24h `HH:MM:SS` string; null when malformed or out of range. */
export function parseTimeOfDay(text: string): TimeOfDay | null {
  const m = TIME_RE.exec(text.trim());
  if (!m) return null;
  const hours = Number(m[1]);
  const minutes = Number(m[2]);
  const seconds = Number(m[3]);
  if (hours > 23 || minutes > 59 || seconds > 59) return null;
  return { hours, minutes, seconds };
}

/** Same local calendar day as `dayMs`, at the given time of day. */
export function atTimeOfDay(dayMs: number, t: TimeOfDay): number {
  const d = new Date(dayMs);
  d.setHours(t.hours, t.minutes, t.seconds, 0);
  return d.getTime();
}

/** Calendar-day shift in local time (DST-safe). */
export function addDays(ms: number, days: number): number {
  const d = new Date(ms);
  d.setDate(d.getDate() + days);
  return d.getTime();
}

export function startOfDay(ms: number): number {
  const d = new Date(ms);
  d.setHours(0, 0, 0, 0);
  return d.getTime();
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** YYYY-MM-DD, local */
export function formatDate(ms: number): string {
  const d = new Date(ms);
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

/** HH:MM:SS, local */
export function formatTime(ms: number): string {
  const d = new Date(ms);
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

export function formatDateTime(ms: number): string {
  return `${formatDate(ms)} ${formatTime(ms)}`;
}
