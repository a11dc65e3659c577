import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigParseError, DEFAULT_PATHS, loadConfig, resolveConfigPaths } from './index.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'phasegate-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should use defaults resolved against cwd when no file exists', async () => {
    const { config, source } = await loadConfig({ cwd: dir, env: {} });

    expect(source).toBeUndefined();
    expect(config.paths.state).toBe(path.join(dir, '.phasegate', 'state.json'));
    expect(config.paths.audit_log).toBe(path.join(dir, '.phasegate', 'audit_trail.json'));
    expect(config.logging.debug).toBe(false);
  });

  it('should read phasegate.toml from cwd', async () => {
    await writeFile(path.join(dir, 'phasegate.toml'), '[paths]\nstate = "run/state.json"\n');

    const { config, source } = await loadConfig({ cwd: dir, env: {} });

    expect(source).toBe(path.join(dir, 'phasegate.toml'));
    expect(config.paths.state).toBe(path.join(dir, 'run', 'state.json'));
  });

  it('should resolve relative paths against the explicit config file directory', async () => {
    const nested = path.join(dir, 'conf');
    await mkdir(nested);
    await writeFile(path.join(nested, 'custom.toml'), '[paths]\nagent_map = "agents.json"\n');

    const { config } = await loadConfig({ cwd: dir, configPath: 'conf/custom.toml', env: {} });

    expect(config.paths.agent_map).toBe(path.join(nested, 'agents.json'));
    expect(config.paths.state).toBe(path.join(nested, DEFAULT_PATHS.state));
  });

  it('should fail when an explicit config file is missing', async () => {
    await expect(loadConfig({ cwd: dir, configPath: 'absent.toml', env: {} })).rejects.toThrow(
      `Config file not found: ${path.join(dir, 'absent.toml')}`
    );
  });

  it('should apply env overrides on top of the file', async () => {
    await writeFile(path.join(dir, 'phasegate.toml'), '[logging]\ndebug = false\n');

    const { config } = await loadConfig({
      cwd: dir,
      env: { PHASEGATE_LOGGING_DEBUG: '1', PHASEGATE_PATHS_STATE: '/abs/state.json' },
    });

    expect(config.logging.debug).toBe(true);
    expect(config.paths.state).toBe(path.resolve('/abs/state.json'));
  });

  it('should surface parse errors', async () => {
    await writeFile(path.join(dir, 'phasegate.toml'), '[logging]\ndebug = "nope"\n');

    await expect(loadConfig({ cwd: dir, env: {} })).rejects.toBeInstanceOf(ConfigParseError);
  });
});

describe('resolveConfigPaths', () => {
  it('should keep absolute paths unchanged', () => {
    const absolute = path.resolve('/data/state.json');
    const resolved = resolveConfigPaths(
      { state: absolute, audit_log: 'a.json', agent_map: 'm.json' },
      path.resolve('/base')
    );

    expect(resolved.state).toBe(absolute);
    expect(resolved.audit_log).toBe(path.resolve('/base', 'a.json'));
  });
});
