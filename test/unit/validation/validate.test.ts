import { validate } from '../../../src/validation/validate.js';
import { buildServiceEntries } from '../../../src/validation/services.js';
import { mkBoolOption, mkPortOption } from '../../../src/options/builder.js';
import { mkAssertion } from '../../../src/validation/assertions.js';
import type { ServiceCatalog } from '../../../src/types/service.js';

const catalog: ServiceCatalog = {
  services: [
    { name: 'networking', ports: [], dependsOn: [] },
    { name: 'web', ports: [80], dependsOn: ['networking'] },
    { name: 'alt', ports: [80], dependsOn: [] },
    { name: 'monitoring', ports: [], dependsOn: ['networking'] },
  ],
  conflictGroups: [{ services: ['web', 'alt'], message: 'web and alt cannot be enabled simultaneously' }],
};

describe('buildServiceEntries', () => {
  it('lists catalog services first, then other enabled services', () => {
    const tree = { services: { extra: { enable: true }, off: { enable: false }, web: { enable: true } } };
    const entries = buildServiceEntries(tree, catalog);
    expect(entries.map((e) => e.name)).toEqual(['networking', 'web', 'alt', 'monitoring', 'extra']);
    expect(entries.filter((e) => e.enabled).map((e) => e.name)).toEqual(['web', 'extra']);
  });

  it('takes ports from the tree when given', () => {
    const tree = { services: { web: { enable: true, ports: [8080, 8443] }, alt: { enable: true, port: 81 } } };
    const [, web, alt] = buildServiceEntries(tree, catalog);
    expect(web).toMatchObject({ ports: [8080, 8443], portsPath: 'services.web.ports' });
    expect(alt).toMatchObject({ ports: [81], portsPath: 'services.alt.port' });
  });

  it('drops the catalog ports when the tree gives malformed ones', () => {
    const tree = { services: { web: { enable: true, ports: ['8080'] }, alt: { enable: true, port: '81' } } };
    const [, web, alt] = buildServiceEntries(tree, catalog);
    expect(web).toMatchObject({ ports: [], portsPath: 'services.web.ports' });
    expect(alt).toMatchObject({ ports: [], portsPath: 'services.alt.port' });
  });
});

describe('validate', () => {
  it('accumulates every failure', () => {
    const tree = { services: { web: { enable: true }, alt: { enable: true }, monitoring: { enable: true } } };
    const result = validate(tree, { catalog });
    expect(result.ok ? [] : result.error.map((e) => e.message)).toEqual([
      'Port conflict detected: 80 claimed by web, alt',
      'Service conflict: web and alt cannot be enabled simultaneously',
      'Service web requires: networking',
      'Service monitoring requires: networking',
    ]);
  });

  it('reports enabled services and their startup order', () => {
    const tree = { services: { web: { enable: true }, networking: { enable: true } } };
    expect(validate(tree, { catalog })).toEqual({
      ok: true,
      value: { tree, enabledServices: ['networking', 'web'], startupOrder: ['networking', 'web'] },
    });
  });

  it('resolves port conflicts moved through the tree', () => {
    const tree = { services: { networking: { enable: true }, web: { enable: true, ports: [8080] }, alt: { enable: true } } };
    const result = validate(tree, { catalog: { ...catalog, conflictGroups: [] } });
    expect(result.ok).toBe(true);
  });

  it('range-checks ports of enabled services', () => {
    const tree = { services: { extra: { enable: true, port: 70000 } } };
    expect(validate(tree, { catalog })).toEqual({
      ok: false,
      error: [{
        kind: 'bounds',
        path: 'services.extra.port',
        value: 70000,
        min: 1,
        max: 65535,
        message: 'services.extra.port: 70000 is outside 1-65535',
      }],
    });
  });

  it('reports a port error once when the schema declares it too', () => {
    const schema = { services: { ssh: { enable: mkBoolOption({ description: 'ssh' }), port: mkPortOption({ default: 22 }) } } };
    const sshCatalog: ServiceCatalog = { services: [{ name: 'ssh', ports: [22], dependsOn: [] }], conflictGroups: [] };
    const result = validate({ services: { ssh: { enable: true, port: 0 } } }, { catalog: sshCatalog, schema });
    expect(result.ok ? [] : result.error.map((e) => e.message)).toEqual(['services.ssh.port: 0 is outside 1-65535']);
  });

  it('rejects a port list that is not numbers', () => {
    const tree = { services: { networking: { enable: true }, web: { enable: true, ports: ['8080'] } } };
    expect(validate(tree, { catalog })).toEqual({
      ok: false,
      error: [{
        kind: 'type',
        path: 'services.web.ports',
        expected: 'port',
        received: 'array',
        message: 'services.web.ports: expected a list of port numbers, received ["8080"]',
      }],
    });
  });

  it('rejects a string port without claiming the catalog default', () => {
    const tree = { services: { networking: { enable: true }, web: { enable: true, port: '8080' }, alt: { enable: true } } };
    const result = validate(tree, { catalog: { ...catalog, conflictGroups: [] } });
    expect(result.ok ? [] : result.error).toEqual([{
      kind: 'type',
      path: 'services.web.port',
      expected: 'port',
      received: 'string',
      message: 'services.web.port: expected a port number, received "8080"',
    }]);
  });

  it('reports a malformed schema-declared port once', () => {
    const schema = { services: { ssh: { enable: mkBoolOption({ description: 'ssh' }), port: mkPortOption({ default: 22 }) } } };
    const sshCatalog: ServiceCatalog = { services: [{ name: 'ssh', ports: [22], dependsOn: [] }], conflictGroups: [] };
    const result = validate({ services: { ssh: { enable: true, port: '22' } } }, { catalog: sshCatalog, schema });
    expect(result.ok ? [] : result.error.map((e) => [e.kind, 'path' in e ? e.path : ''])).toEqual([['type', 'services.ssh.port']]);
  });

  it('returns the tree with schema defaults filled', () => {
    const schema = { services: { ssh: { enable: mkBoolOption({ description: 'ssh' }), port: mkPortOption({ default: 22 }) } } };
    const result = validate({ services: { ssh: { enable: true } } }, { catalog: { services: [], conflictGroups: [] }, schema });
    expect(result.ok ? result.value.tree : null).toEqual({ services: { ssh: { enable: true, port: 22 } } });
  });

  it('reports dependency cycles', () => {
    const cyclic: ServiceCatalog = {
      services: [{ name: 'a', ports: [], dependsOn: ['b'] }, { name: 'b', ports: [], dependsOn: ['a'] }],
      conflictGroups: [],
    };
    const result = validate({ services: { a: { enable: true }, b: { enable: true } } }, { catalog: cyclic });
    expect(result).toEqual({
      ok: false,
      error: [{ kind: 'cycle', cycle: ['a', 'b'], message: 'Circular dependency detected: a -> b -> a' }],
    });
  });

  it('runs the assertions hook on the checked tree', () => {
    const result = validate({ flag: true }, {
      catalog,
      assertions: (tree) => [mkAssertion(tree.flag !== true, 'flag must stay off')],
    });
    expect(result).toEqual({ ok: false, error: [{ kind: 'assertion', message: 'Configuration error: flag must stay off' }] });
  });

  it('is deterministic', () => {
    const tree = { services: { web: { enable: true }, alt: { enable: true } } };
    expect(validate(tree, { catalog })).toEqual(validate(tree, { catalog }));
  });
});
