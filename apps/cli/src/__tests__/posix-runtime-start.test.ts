import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { runtimeStartDescriptor } from '../platforms/posix/handlers/runtime-start.js';
import { runForeground, spawnDetached } from '../core/io/process-runner.js';
import { isPortInUse } from '../core/io/network-utils.js';
import { setSuppressOutput } from '../core/io/cli-logger.js';
import { StateManager } from '../core/state-manager.js';
import { createTestProject, handlerContext, markProvisioned, type TestProject } from './test-setup.js';

vi.mock('../core/io/process-runner.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../core/io/process-runner.js')>();
  return { ...actual, runForeground: vi.fn(), spawnDetached: vi.fn() };
});

vi.mock('../core/io/network-utils.js', () => ({
  isPortInUse: vi.fn(),
  isHostReachable: vi.fn(),
}));

describe('POSIX start handler', () => {
  let project: TestProject;

  const start = (detach = false, dryRun = false) =>
    runtimeStartDescriptor.handler(handlerContext('start', project.projectRoot, { detach }, { dryRun }));

  beforeEach(() => {
    setSuppressOutput(true);
    project = createTestProject();
    vi.mocked(isPortInUse).mockResolvedValue(false);
    vi.mocked(runForeground).mockResolvedValue({ exitCode: 0, signal: null });
    vi.mocked(spawnDetached).mockReturnValue(4242);
  });

  afterEach(() => {
    project.cleanup();
    setSuppressOutput(false);
  });

  it('should refuse to launch before provisioning', async () => {
    const result = await start();

    expect(result.success).toBe(false);
    expect(result.error).toBe("Environment 'local' is not provisioned. Run: runbox provision -e local");
    expect(result.extensions.status).toBe('not-provisioned');
    expect(runForeground).not.toHaveBeenCalled();
  });

  it('should refuse to launch when the manifest changed', async () => {
    await markProvisioned(project.projectRoot);
    fs.writeFileSync(path.join(project.projectRoot, 'requirements.txt'), 'flask==2.1.0\n');

    const result = await start();
    expect(result.extensions.status).toBe('stale');
    expect(result.error).toBe('Dependency manifest changed since the last provision. Run: runbox provision -e local');
    expect(runForeground).not.toHaveBeenCalled();
  });

  it('should fail when the entry point is missing', async () => {
    await markProvisioned(project.projectRoot);
    fs.rmSync(path.join(project.projectRoot, 'main.py'));

    const result = await start();
    expect(result.success).toBe(false);
    expect(result.error).toBe('Entry point not found: main.py');
    expect(result.extensions.status).toBe('failed');
  });

  it('should run the entry point in the foreground inside the environment', async () => {
    await markProvisioned(project.projectRoot);

    const result = await start();

    expect(runForeground).toHaveBeenCalledWith('python', ['main.py'], {
      cwd: project.projectRoot,
      env: expect.objectContaining({ VIRTUAL_ENV: path.join(project.projectRoot, '.venv') }),
    });
    expect(result).toMatchObject({
      success: true,
      exitCode: 0,
      extensions: { status: 'exited', endpoint: 'http://localhost:8080', exitCode: 0 },
    });
  });

  it('should report the exit code of a failing entry point', async () => {
    await markProvisioned(project.projectRoot);
    vi.mocked(runForeground).mockResolvedValue({ exitCode: 130, signal: 'SIGINT' });

    const result = await start();
    expect(result.success).toBe(false);
    expect(result.exitCode).toBe(130);
    expect(result.error).toBe('Entry point exited with code 130');
    expect(result.extensions.signal).toBe('SIGINT');
  });

  it('should still launch when the port is taken', async () => {
    await markProvisioned(project.projectRoot);
    vi.mocked(isPortInUse).mockResolvedValue(true);

    const result = await start();
    expect(runForeground).toHaveBeenCalledTimes(1);
    expect(result.success).toBe(true);
  });

  it('should record a detached process', async () => {
    await markProvisioned(project.projectRoot);

    const result = await start(true);
    const logFile = path.join(project.projectRoot, 'state', 'local', 'logs', 'app.log');

    expect(spawnDetached).toHaveBeenCalledWith('python', ['main.py'], expect.objectContaining({ logFile }));
    expect(result.extensions.status).toBe('running');
    expect(await StateManager.loadRun(project.projectRoot, 'local')).toMatchObject({
      endpoint: 'http://localhost:8080',
      resources: { platform: 'posix', data: { pid: 4242, logFile } },
    });
  });

  it('should refuse a second detached start while the first is running', async () => {
    await markProvisioned(project.projectRoot);
    await StateManager.saveRun(project.projectRoot, 'local', {
      environment: 'local',
      platform: 'posix',
      startTime: '2026-01-15T10:31:00.000Z',
      endpoint: 'http://localhost:8080',
      resources: { platform: 'posix', data: { environmentPath: '.venv', pid: process.pid } },
    });

    const result = await start(true);
    expect(result.success).toBe(false);
    expect(result.error).toBe(`Already running with PID ${process.pid}`);
    expect(spawnDetached).not.toHaveBeenCalled();
  });

  it('should plan the port declaration before the launch', async () => {
    const result = await start(false, true);

    expect(result.extensions.status).toBe('planned');
    expect(result.extensions.plan).toEqual([
      { step: 'declare-port', description: 'Declare TCP port 8080' },
      { step: 'launch', description: `Run the entry point in ${project.projectRoot}`, command: ['python', 'main.py'] },
    ]);
  });
});
