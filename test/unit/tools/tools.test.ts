import { z } from 'zod';
import { createToolContext } from '../../../src/bootstrap.js';
import { DEFAULT_CONFIG } from '../../../src/config/loader.js';
import { ToolRegistry } from '../../../src/tools/registry.js';
import { ComposeError, ComposeErrorCode } from '../../../src/shared/errors.js';
import type { ToolContext } from '../../../src/tools/context.js';
import type { ErrorResponse, SuccessResponse, ToolResponse } from '../../../src/types/response.js';

function context(): ToolContext {
  return createToolContext({ config: structuredClone(DEFAULT_CONFIG), configPath: '/tmp/sysconfig-test/config.yaml', firstRun: true });
}

async function call(ctx: ToolContext, name: string, args: Record<string, unknown> = {}): Promise<ToolResponse> {
  const tool = ctx.registry.get(name);
  if (!tool) throw new Error(`tool ${name} is not registered`);
  return tool.execute(args);
}

function expectSuccess(res: ToolResponse): SuccessResponse {
  if (res.status !== 'success') throw new Error(`expected success, got ${res.error_code}: ${res.message}`);
  return res;
}

function expectError(res: ToolResponse): ErrorResponse {
  if (res.status !== 'error') throw new Error('expected an error response');
  return res;
}

describe('ToolRegistry', () => {
  const execute = async (): Promise<ToolResponse> => ({ status: 'success', tool: 'cfg_t', duration_ms: null, data: {} });
  const metadata = { name: 'cfg_t', description: 'first', module: 'test', inputSchema: z.object({}) };

  it('rejects a duplicate registration and keeps the first', () => {
    const registry = new ToolRegistry();
    registry.register({ metadata, execute });
    expect(() => registry.register({ metadata: { ...metadata, module: 'other' }, execute })).toThrow(
      'Tool "cfg_t" is already registered by module test',
    );
    expect(registry.size).toBe(1);
    expect(registry.get('cfg_t')?.metadata.description).toBe('first');
  });

  it('rejects names outside the cfg_ namespace', () => {
    const registry = new ToolRegistry();
    let code: string | undefined;
    try {
      registry.register({ metadata: { ...metadata, name: 'compose' }, execute });
    } catch (e) {
      if (e instanceof ComposeError) code = e.code;
    }
    expect(code).toBe(ComposeErrorCode.INVALID_TOOL);
    expect(registry.size).toBe(0);
  });

  it('counts tools per module', () => {
    const registry = new ToolRegistry();
    registry.register({ metadata, execute });
    registry.register({ metadata: { ...metadata, name: 'cfg_u', module: 'other' }, execute });
    registry.register({ metadata: { ...metadata, name: 'cfg_v' }, execute });
    expect(registry.countByModule()).toEqual({ test: 2, other: 1 });
  });
});

describe('session tools', () => {
  const ctx = context();

  it('registers every tool', () => {
    expect([...ctx.registry.getAll().keys()]).toEqual([
      'cfg_session_info',
      'cfg_list_profiles',
      'cfg_compose',
      'cfg_validate',
      'cfg_service_order',
      'cfg_check_option',
      'cfg_option_docs',
    ]);
  });

  it('cfg_session_info reports profiles and first-run setup', async () => {
    const res = expectSuccess(await call(ctx, 'cfg_session_info'));
    expect(res.data).toMatchObject({
      default_profile: 'workstation',
      registered_profiles: ['minimal', 'workstation', 'server'],
      profiles_source: 'builtin',
      tools_registered: 7,
      tools_by_module: { session: 2, compose: 3, options: 2 },
      setup: { first_run: true, config_path: '/tmp/sysconfig-test/config.yaml' },
    });
  });

  it('cfg_list_profiles lists overridden paths per profile', async () => {
    const res = expectSuccess(await call(ctx, 'cfg_list_profiles'));
    expect(res.total).toBe(3);
    expect(res.data.profiles).toContainEqual(expect.objectContaining({
      name: 'workstation',
      default: true,
      overridden_paths: expect.arrayContaining(['services.pipewire.enable', 'desktop.enable']),
    }));
  });
});

describe('compose tools', () => {
  const ctx = context();

  it('cfg_compose resolves the requested profile', async () => {
    const res = expectSuccess(await call(ctx, 'cfg_compose', { profile: 'server', include_tree: false }));
    expect(res.data).toEqual({
      profile: 'server',
      startup_order: ['networking', 'firewall', 'openssh', 'monitoring', 'docker', 'backup', 'fail2ban'],
    });
    expect(res.summary).toBe('server: 7 services enabled');
  });

  it('cfg_compose falls back to the default profile and includes the tree', async () => {
    const res = expectSuccess(await call(ctx, 'cfg_compose'));
    expect(res.data.profile).toBe('workstation');
    expect(res.data.tree).toMatchObject({ desktop: { enable: true } });
  });

  it('cfg_compose reports an unknown profile', async () => {
    const res = expectError(await call(ctx, 'cfg_compose', { profile: 'gaming' }));
    expect(res.error_code).toBe('UNKNOWN_PROFILE');
    expect(res.error_category).toBe('not_found');
    expect(res.message).toBe('Unknown profile "gaming"; registered profiles: minimal, workstation, server');
  });

  it('cfg_compose returns every validation error', async () => {
    const overrides = { services: { mysql: { enable: true }, mariadb: { enable: true } } };
    const res = expectError(await call(ctx, 'cfg_compose', { profile: 'minimal', overrides }));
    expect(res.error_code).toBe('VALIDATION_FAILED');
    expect(res.message).toBe('2 configuration problems found');
    expect(res.validation_errors?.map((e) => e.message)).toEqual([
      'Port conflict detected: 3306 claimed by mysql, mariadb',
      'Service conflict: mysql and mariadb cannot be enabled simultaneously',
    ]);
    expect(res.remediation).toEqual(['Disable one of the conflicting services or move it to a free port']);
  });

  it('cfg_validate checks a tree as given', async () => {
    const res = expectSuccess(await call(ctx, 'cfg_validate', { tree: { services: { networking: { enable: true } } } }));
    expect(res.data).toEqual({ valid: true, enabled_services: ['networking'], startup_order: ['networking'] });
  });

  it('cfg_validate lists problems without failing the call', async () => {
    const res = expectSuccess(await call(ctx, 'cfg_validate', { tree: { services: { monitoring: { enable: true } } } }));
    expect(res.data.valid).toBe(false);
    expect(res.total).toBe(1);
  });

  it('cfg_service_order uses catalog dependencies by default', async () => {
    const res = expectSuccess(await call(ctx, 'cfg_service_order', { services: ['fail2ban', 'firewall', 'networking'] }));
    expect(res.data.order).toEqual(['networking', 'firewall', 'fail2ban']);
  });

  it('cfg_service_order reports a cycle', async () => {
    const res = expectError(await call(ctx, 'cfg_service_order', { services: ['a', 'b'], dependencies: { a: ['b'], b: ['a'] } }));
    expect(res.error_code).toBe('VALIDATION_FAILED');
    expect(res.message).toBe('Circular dependency detected: a -> b -> a');
  });
});

describe('option tools', () => {
  const ctx = context();

  it('cfg_check_option flags an out-of-range value', async () => {
    const res = expectSuccess(await call(ctx, 'cfg_check_option', { path: 'performance.zram.memoryPercent', value: 150 }));
    expect(res.data).toMatchObject({ kind: 'percentage', valid: false });
  });

  it('cfg_check_option accepts a valid value', async () => {
    const res = expectSuccess(await call(ctx, 'cfg_check_option', { path: 'services.openssh.port', value: 2222 }));
    expect(res.data).toEqual({ path: 'services.openssh.port', kind: 'port', valid: true });
  });

  it('cfg_check_option reports an undeclared path', async () => {
    const res = expectError(await call(ctx, 'cfg_check_option', { path: 'performance.turbo', value: true }));
    expect(res.error_code).toBe('OPTION_NOT_FOUND');
  });

  it('cfg_option_docs renders a subtree as markdown', async () => {
    const res = expectSuccess(await call(ctx, 'cfg_option_docs', { prefix: 'desktop' }));
    expect(res.data).toEqual({
      format: 'markdown',
      markdown: '## desktop.enable\nGNOME desktop with GDM\nDefault: `false`',
    });
  });

  it('cfg_option_docs reports an empty prefix match', async () => {
    const res = expectError(await call(ctx, 'cfg_option_docs', { prefix: 'nothing.here' }));
    expect(res.error_category).toBe('not_found');
  });
});
