import { checkOverrideKeys, compose, tryCompose } from '../../../src/profiles/composer.js';
import { loadProfileTable } from '../../../src/profiles/loader.js';
import { getPath } from '../../../src/tree/tree.js';
import { PROFILE_TYPES } from '../../../src/types/profile.js';
import type { OverridesTable } from '../../../src/types/profile.js';
import { ComposeError, ComposeErrorCode } from '../../../src/shared/errors.js';

const { baseline, overrides } = loadProfileTable();

function thrown(fn: () => unknown): ComposeError {
  try {
    fn();
  } catch (e) {
    if (e instanceof ComposeError) return e;
    throw e;
  }
  throw new Error('expected a ComposeError');
}

describe('compose', () => {
  it.each(PROFILE_TYPES)('returns the baseline for empty %s overrides', (profile) => {
    const table: OverridesTable = {};
    table[profile] = {};
    expect(compose(profile, baseline, table)).toEqual(baseline);
  });

  it('applies server overrides over the baseline', () => {
    const tree = compose('server', baseline, overrides);
    expect(getPath(tree, 'performance.kernel.profile')).toBe('throughput');
    expect(getPath(tree, 'security.profile')).toBe('hardened');
    expect(getPath(tree, 'backup.paths')).toEqual(['/etc', '/var', '/home', '/opt']);
    expect(getPath(tree, 'backup.repository')).toBe('/var/backup/system');
    expect(getPath(tree, 'maintenance.autoUpdate.rebootWindow')).toEqual({ start: '02:00', end: '05:00' });
  });

  it('leaves the baseline untouched', () => {
    const before = JSON.stringify(baseline);
    compose('workstation', baseline, overrides);
    expect(JSON.stringify(baseline)).toBe(before);
  });

  it('is deterministic', () => {
    expect(JSON.stringify(compose('minimal', baseline, overrides))).toBe(JSON.stringify(compose('minimal', baseline, overrides)));
  });

  it('throws UNKNOWN_PROFILE for an unregistered literal', () => {
    const err = thrown(() => compose('gaming', baseline, overrides));
    expect(err.code).toBe(ComposeErrorCode.UNKNOWN_PROFILE);
    expect(err.context).toEqual({ profile: 'gaming', known: ['minimal', 'workstation', 'server'] });
  });

  it('throws UNKNOWN_OVERRIDE_KEY for keys missing from the baseline', () => {
    const err = thrown(() => compose('server', baseline, { server: { performance: { kernel: { turbo: true } } } }));
    expect(err.code).toBe(ComposeErrorCode.UNKNOWN_OVERRIDE_KEY);
    expect(err.context).toEqual({ paths: ['performance.kernel.turbo'] });
  });
});

describe('tryCompose', () => {
  it('returns the selected profile with the composed tree', () => {
    const result = tryCompose('server', baseline, overrides);
    expect(result.ok ? result.value.profile : null).toBe('server');
    expect(result.ok ? result.value.tree : null).toEqual(compose('server', baseline, overrides));
  });

  it('returns UnknownProfileError naming the registered profiles', () => {
    expect(tryCompose('gaming', baseline, overrides)).toEqual({
      ok: false,
      error: [{
        kind: 'unknown_profile',
        profile: 'gaming',
        known: ['minimal', 'workstation', 'server'],
        message: 'Unknown profile "gaming"; registered profiles: minimal, workstation, server',
      }],
    });
  });

  it('treats a profile without table entry as unknown', () => {
    const result = tryCompose('server', baseline, { minimal: {} });
    expect(result.ok ? null : result.error[0]).toMatchObject({ kind: 'unknown_profile', known: ['minimal'] });
  });
});

describe('checkOverrideKeys', () => {
  it('accepts keys the baseline has', () => {
    expect(checkOverrideKeys({ a: { b: 1 } }, { a: { b: 2 } })).toEqual([]);
  });

  it('flags unknown keys at any depth', () => {
    expect(checkOverrideKeys({ a: { b: 1 } }, { a: { c: 2 }, d: 3 }).map((e) => e.path)).toEqual(['a.c', 'd']);
  });

  it('flags children of a map placed over a scalar', () => {
    expect(checkOverrideKeys({ a: 1 }, { a: { x: 1 } })).toEqual([
      { kind: 'unknown_key', path: 'a.x', message: 'Override key "a.x" does not exist in the baseline' },
    ]);
  });

  it('allows a scalar to replace a map', () => {
    expect(checkOverrideKeys({ a: { b: 1 } }, { a: null })).toEqual([]);
  });
});
