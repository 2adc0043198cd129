// Structured forms of the string-encoded settings (memory sizes, CIDRs, schedules,
// times of day, rate limits). The string form stays the serialization format; the
// parsers below are the only place that knows the lexical rules.

export type MemoryUnit = "K" | "M" | "G" | "T";

export interface MemorySize {
  readonly magnitude: number;
  readonly unit: MemoryUnit | null;
}

export interface Cidr {
  readonly address: readonly [number, number, number, number];
  readonly prefixLength: number;
}

export const CALENDAR_PERIODS = ["minutely", "hourly", "daily", "weekly", "monthly", "yearly"] as const;
export type CalendarPeriod = (typeof CALENDAR_PERIODS)[number];

export type Schedule =
  | { readonly type: "calendar"; readonly period: CalendarPeriod }
  | { readonly type: "cron"; readonly fields: readonly string[] };

export interface TimeOfDay {
  readonly hours: number;
  readonly minutes: number;
}

export type RateUnit = "s" | "m" | "h" | "d";

export interface RateLimit {
  readonly count: number;
  readonly per: RateUnit;
}

const MEMORY_RE = /^([0-9]+)(K|M|G|T)?$/;
const CIDR_RE = /^(([0-9]{1,3}\.){3}[0-9]{1,3})\/([0-9]{1,2})$/;
const CRON_FIELD_RE = /^[0-9*,/-]+$/;
const TIME_RE = /^([0-9]{2}):([0-9]{2})$/;
const RATE_RE = /^([0-9]+)\/(s|m|h|d)$/;

const UNIT_SHIFT: Record<MemoryUnit, bigint> = { K: 10n, M: 20n, G: 30n, T: 40n };

export function parseMemorySize(text: string): MemorySize | null {
  const m = MEMORY_RE.exec(text);
  if (!m) return null;
  const unit = m[2];
  return {
    magnitude: Number(m[1]),
    unit: unit === "K" || unit === "M" || unit === "G" || unit === "T" ? unit : null,
  };
}

export function formatMemorySize(size: MemorySize): string {
  return `${size.magnitude}${size.unit ?? ""}`;
}

/** Binary units; a bare number is a byte count. */
export function memorySizeToBytes(size: MemorySize): bigint {
  const bytes = BigInt(size.magnitude);
  return size.unit ? bytes << UNIT_SHIFT[size.unit] : bytes;
}

export function parseCidr(text: string): Cidr | null {
  const m = CIDR_RE.exec(text);
  if (!m) return null;
  const octets = m[1].split(".").map(Number);
  const [a, b, c, d] = octets;
  if (a === undefined || b === undefined || c === undefined || d === undefined) return null;
  return { address: [a, b, c, d], prefixLength: Number(m[3]) };
}

export function formatCidr(cidr: Cidr): string {
  return `${cidr.address.join(".")}/${cidr.prefixLength}`;
}

/** Octets within 0-255 and prefix within 0-32. The lexical parser accepts 999.999.999.999/99. */
export function isSemanticCidr(cidr: Cidr): boolean {
  return cidr.address.every((o) => o <= 255) && cidr.prefixLength <= 32;
}

function isCalendarPeriod(text: string): text is CalendarPeriod {
  return (CALENDAR_PERIODS as readonly string[]).includes(text);
}

/** A calendar literal or exactly five cron-shaped fields separated by spaces. */
export function parseSchedule(text: string): Schedule | null {
  if (isCalendarPeriod(text)) return { type: "calendar", period: text };
  const fields = text.trim().split(/\s+/);
  if (fields.length !== 5 || !fields.every((f) => CRON_FIELD_RE.test(f))) return null;
  return { type: "cron", fields };
}

const CRON_FIELD_NAMES = ["minute", "hour", "day-of-month", "month", "day-of-week"];
// [min, max] inclusive for each of the 5 cron positions
const CRON_FIELD_RANGES: ReadonlyArray<readonly [number, number]> = [[0, 59], [0, 23], [1, 31], [1, 12], [0, 7]];

/** Range problems in the numeric tokens of a cron schedule; empty for calendar literals. */
export function cronRangeIssues(schedule: Schedule): string[] {
  if (schedule.type === "calendar") return [];
  const issues: string[] = [];
  schedule.fields.forEach((part, i) => {
    const range = CRON_FIELD_RANGES[i];
    if (!range) return;
    const [min, max] = range;
    // Strip step denominators, wildcards, then split on list/range separators
    const tokens = part.replace(/\/\d+/g, "").replace(/\*/g, "").split(/[,-]/).filter(Boolean);
    for (const token of tokens) {
      const n = parseInt(token, 10);
      if (!isNaN(n) && (n < min || n > max)) {
        issues.push(`${CRON_FIELD_NAMES[i]}: ${n} out of range ${min}-${max}`);
      }
    }
  });
  return issues;
}

export function parseTimeOfDay(text: string): TimeOfDay | null {
  const m = TIME_RE.exec(text);
  if (!m) return null;
  return { hours: Number(m[1]), minutes: Number(m[2]) };
}

export function isSemanticTimeOfDay(time: TimeOfDay): boolean {
  return time.hours <= 23 && time.minutes <= 59;
}

export function parseRateLimit(text: string): RateLimit | null {
  const m = RATE_RE.exec(text);
  if (!m) return null;
  const per = m[2];
  if (per !== "s" && per !== "m" && per !== "h" && per !== "d") return null;
  return { count: Number(m[1]), per };
}
