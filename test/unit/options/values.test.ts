import {
  cronRangeIssues,
  formatCidr,
  formatMemorySize,
  isSemanticCidr,
  isSemanticTimeOfDay,
  memorySizeToBytes,
  parseCidr,
  parseMemorySize,
  parseRateLimit,
  parseSchedule,
  parseTimeOfDay,
} from '../../../src/options/values.js';
import type { Schedule } from '../../../src/options/values.js';

function schedule(text: string): Schedule {
  const parsed = parseSchedule(text);
  if (!parsed) throw new Error(`not a schedule: ${text}`);
  return parsed;
}

describe('memory sizes', () => {
  it('parses magnitude and unit', () => {
    expect(parseMemorySize('2G')).toEqual({ magnitude: 2, unit: 'G' });
    expect(parseMemorySize('512')).toEqual({ magnitude: 512, unit: null });
  });

  it('rejects other suffixes', () => {
    expect(parseMemorySize('2GB')).toBeNull();
    expect(parseMemorySize('')).toBeNull();
  });

  it('converts binary units to bytes', () => {
    expect(memorySizeToBytes({ magnitude: 2, unit: 'G' })).toBe(2147483648n);
    expect(memorySizeToBytes({ magnitude: 1, unit: 'K' })).toBe(1024n);
    expect(memorySizeToBytes({ magnitude: 7, unit: null })).toBe(7n);
  });

  it('formats back to text', () => {
    expect(formatMemorySize({ magnitude: 16, unit: 'G' })).toBe('16G');
  });
});

describe('CIDR', () => {
  it('parses address and prefix', () => {
    const cidr = parseCidr('192.168.1.0/24');
    expect(cidr).toEqual({ address: [192, 168, 1, 0], prefixLength: 24 });
    expect(cidr && formatCidr(cidr)).toBe('192.168.1.0/24');
  });

  it('is lexical unless checked semantically', () => {
    const cidr = parseCidr('999.999.999.999/99');
    expect(cidr).not.toBeNull();
    expect(cidr && isSemanticCidr(cidr)).toBe(false);
  });

  it('requires a prefix', () => {
    expect(parseCidr('10.0.0.0')).toBeNull();
  });
});

describe('schedules', () => {
  it('recognizes calendar periods', () => {
    expect(parseSchedule('daily')).toEqual({ type: 'calendar', period: 'daily' });
  });

  it('recognizes five cron fields', () => {
    expect(parseSchedule('*/5 * * * *')).toEqual({ type: 'cron', fields: ['*/5', '*', '*', '*', '*'] });
  });

  it('rejects other shapes', () => {
    expect(parseSchedule('* * *')).toBeNull();
    expect(parseSchedule('every day')).toBeNull();
  });

  it('reports out-of-range cron fields', () => {
    expect(cronRangeIssues(schedule('99 25 * * *'))).toEqual([
      'minute: 99 out of range 0-59',
      'hour: 25 out of range 0-23',
    ]);
  });

  it('accepts steps, ranges and lists within bounds', () => {
    expect(cronRangeIssues(schedule('*/15 0-23 1,15 * 1-5'))).toEqual([]);
    expect(cronRangeIssues(schedule('weekly'))).toEqual([]);
  });
});

describe('times and rates', () => {
  it('parses HH:MM', () => {
    expect(parseTimeOfDay('02:00')).toEqual({ hours: 2, minutes: 0 });
    expect(parseTimeOfDay('2:00')).toBeNull();
  });

  it('checks time ranges semantically', () => {
    expect(isSemanticTimeOfDay({ hours: 23, minutes: 59 })).toBe(true);
    expect(isSemanticTimeOfDay({ hours: 25, minutes: 0 })).toBe(false);
  });

  it('parses rate limits', () => {
    expect(parseRateLimit('10/m')).toEqual({ count: 10, per: 'm' });
    expect(parseRateLimit('10/x')).toBeNull();
  });
});
