import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { EventEmitter } from 'events';
import { runForwarder } from '../../src/cli.js';
import { ForwarderError, ForwarderErrorCode } from '../../src/shared/errors.js';
import { FakeSpawner } from '../helpers/fake-spawner.js';

class CapturedStderr {
  text = '';
  write(chunk: string): boolean {
    this.text += chunk;
    return true;
  }
}

describe('runForwarder', () => {
  let tmpDir: string;
  let exe: string;
  let stderr: CapturedStderr;
  let userConfigPath: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lean-forward-cli-'));
    exe = path.join(tmpDir, 'tools', 'lean');
    await fs.mkdir(path.dirname(exe), { recursive: true });
    await fs.writeFile(exe, '#!/bin/sh\n', { mode: 0o755 });
    stderr = new CapturedStderr();
    userConfigPath = path.join(tmpDir, 'home', 'config.yaml');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  function run(args: string[], env: NodeJS.ProcessEnv, spawner: FakeSpawner): Promise<number> {
    return runForwarder(args, {
      env,
      cwd: tmpDir,
      platform: 'linux',
      spawner,
      stderr,
      signals: new EventEmitter(),
      userConfigPath,
    });
  }

  it('reports a missing executable and exits 1 without spawning', async () => {
    const missing = path.join(tmpDir, 'nowhere', 'lean.exe');
    const spawner = new FakeSpawner();

    const code = await run(['backtest', 'Strategy'], { LEAN_CLI_PATH: missing, PATH: '' }, spawner);

    expect(code).toBe(1);
    expect(spawner.calls).toHaveLength(0);
    expect(stderr.text.split('\n')).toEqual([
      'Error: LEAN CLI not found at expected location',
      `Expected: ${missing}`,
      '',
      'Please ensure LEAN CLI is installed correctly',
      'Set LEAN_CLI_PATH or "executable" in .lean-forward.yaml to point at it',
      '',
    ]);
  });

  it('names the default executable when nothing is configured or on PATH', async () => {
    const spawner = new FakeSpawner();
    const code = await run([], { PATH: path.join(tmpDir, 'empty') }, spawner);
    expect(code).toBe(1);
    expect(stderr.text).toContain('Expected: lean\n');
    expect(spawner.calls).toHaveLength(0);
  });

  it('forwards --version exactly when no environment exists', async () => {
    const spawner = new FakeSpawner({ kind: 'exited', exitCode: 0 });
    const env = { LEAN_CLI_PATH: exe, PATH: '/usr/bin' };

    const code = await run(['--version'], env, spawner);

    expect(code).toBe(0);
    expect(stderr.text).toBe('');
    expect(spawner.calls).toHaveLength(1);
    expect(spawner.calls[0]?.file).toBe(exe);
    expect(spawner.calls[0]?.args).toEqual(['--version']);
    expect(spawner.calls[0]?.options.env).toBe(env);
    expect(spawner.calls[0]?.options.cwd).toBe(tmpDir);
  });

  it.each([0, 1, 127])('exits with the child code %i', async (exitCode) => {
    const spawner = new FakeSpawner({ kind: 'exited', exitCode });
    await expect(run(['report'], { LEAN_CLI_PATH: exe }, spawner)).resolves.toBe(exitCode);
  });

  it('activates QC_VENV before spawning when its marker exists', async () => {
    const binDir = path.join(tmpDir, 'QC_VENV', 'bin');
    await fs.mkdir(binDir, { recursive: true });
    await fs.writeFile(path.join(binDir, 'activate'), '');
    const spawner = new FakeSpawner();

    await run(['login'], { LEAN_CLI_PATH: exe, PATH: '/usr/bin' }, spawner);

    expect(spawner.calls[0]?.options.env).toEqual({
      LEAN_CLI_PATH: exe,
      PATH: `${binDir}:/usr/bin`,
      VIRTUAL_ENV: path.join(tmpDir, 'QC_VENV'),
    });
  });

  it('skips activation when the config disables it', async () => {
    const binDir = path.join(tmpDir, 'QC_VENV', 'bin');
    await fs.mkdir(binDir, { recursive: true });
    await fs.writeFile(path.join(binDir, 'activate'), '');
    await fs.writeFile(path.join(tmpDir, '.lean-forward.yaml'), 'environment:\n  enabled: false\n');
    const spawner = new FakeSpawner();
    const env = { LEAN_CLI_PATH: exe, PATH: '/usr/bin' };

    await run([], env, spawner);

    expect(spawner.calls[0]?.options.env).toBe(env);
  });

  it('uses the executable named in the project config file', async () => {
    await fs.writeFile(path.join(tmpDir, '.lean-forward.yaml'), 'executable: tools/lean\n');
    const spawner = new FakeSpawner();

    await run(['init'], {}, spawner);

    expect(spawner.calls[0]?.file).toBe(exe);
  });

  it('discovers lean on PATH when nothing is configured', async () => {
    const spawner = new FakeSpawner();
    await run(['whoami'], { PATH: path.dirname(exe) }, spawner);
    expect(spawner.calls[0]?.file).toBe(exe);
  });

  it('reports an invalid LEAN_FORWARD_CONFIG file and exits 1 without spawning', async () => {
    const explicit = path.join(tmpDir, 'broken.yaml');
    await fs.writeFile(explicit, 'lean_path: /opt/lean\n');
    const spawner = new FakeSpawner();

    const code = await run(['backtest'], { LEAN_FORWARD_CONFIG: explicit, LEAN_CLI_PATH: exe }, spawner);

    expect(code).toBe(1);
    expect(spawner.calls).toHaveLength(0);
    expect(stderr.text.split('\n')[0]).toBe(`Error: Invalid config file: ${explicit}`);
  });

  it('reports a spawn failure with exit code 126', async () => {
    const spawner = new FakeSpawner();
    spawner.spawn = () => ({
      kill: () => undefined,
      completion: Promise.reject(new ForwarderError(ForwarderErrorCode.SPAWN_FAILED, 'Command failed to spawn: lean')),
    });

    await expect(run([], { LEAN_CLI_PATH: exe }, spawner)).resolves.toBe(126);
    expect(stderr.text).toBe(
      'Error: Command failed to spawn: lean\nThe LEAN CLI exists but could not be started\n'
    );
  });
});
