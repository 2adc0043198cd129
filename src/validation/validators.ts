// Lexical predicates for common setting formats. None of them checks semantic
// ranges: isIPv4("999.999.999.999") is true. options/values.ts has the opt-in
// semantic checks.
import { CALENDAR_PERIODS, parseCidr, parseMemorySize, parseSchedule } from "../options/values.js";

export function isEmail(text: string): boolean {
  return /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/.test(text);
}

export function isIPv4(text: string): boolean {
  return /^([0-9]{1,3}\.){3}[0-9]{1,3}$/.test(text);
}

/** Simplified: eight colon-separated groups only, no :: shorthand. */
export function isIPv6(text: string): boolean {
  return /^([0-9a-fA-F]{0,4}:){7}[0-9a-fA-F]{0,4}$/.test(text);
}

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

/** systemd OnCalendar shorthand, a cron-shaped string of 1-5 fields, or "Mon *-*-* 02:00:00"-style. */
export function isSystemdTimer(text: string): boolean {
  return (
    (CALENDAR_PERIODS as readonly string[]).includes(text) ||
    /^[*0-9,/-]+( [*0-9,/-]+){0,4}$/.test(text) ||
    /^[A-Za-z]{3} [*0-9,/-]+ [*0-9,/-]+:[*0-9,/-]+:[*0-9,/-]+$/.test(text)
  );
}

export function isMemorySize(text: string): boolean {
  return parseMemorySize(text) !== null;
}

export function isCronSchedule(text: string): boolean {
  return parseSchedule(text) !== null;
}

export function isCidr(text: string): boolean {
  return parseCidr(text) !== null;
}
