import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { runtimeCheckDescriptor } from '../platforms/posix/handlers/runtime-check.js';
import { runtimeStopDescriptor } from '../platforms/posix/handlers/runtime-stop.js';
import { runProcess, type ProcessOutcome } from '../core/io/process-runner.js';
import { isHostReachable } from '../core/io/network-utils.js';
import { gracefulStop } from '../platforms/posix/utils/process-manager.js';
import { setSuppressOutput } from '../core/io/cli-logger.js';
import { StateManager } from '../core/state-manager.js';
import { createTestProject, handlerContext, markProvisioned, type TestProject } from './test-setup.js';

vi.mock('../core/io/process-runner.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../core/io/process-runner.js')>();
  return { ...actual, runProcess: vi.fn() };
});

vi.mock('../core/io/network-utils.js', () => ({
  isPortInUse: vi.fn(),
  isHostReachable: vi.fn(),
}));

vi.mock('../platforms/posix/utils/process-manager.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../platforms/posix/utils/process-manager.js')>();
  return { ...actual, gracefulStop: vi.fn() };
});

const outcome = (code: number): ProcessOutcome => ({ code, signal: null, stdout: '', stderr: '' });

describe('POSIX check handler', () => {
  let project: TestProject;
  let notInstalled: string[];

  const check = () => runtimeCheckDescriptor.handler(handlerContext('check', project.projectRoot, {}));

  beforeEach(() => {
    project = createTestProject({ requirements: 'flask==2.0.0\nrequests>=2\npywin32 ; sys_platform == "win32"\n' });
    notInstalled = [];
    vi.mocked(isHostReachable).mockResolvedValue(false);
    // pip show exits non-zero for packages that are not installed
    vi.mocked(runProcess).mockImplementation(async (_command, args) =>
      outcome(notInstalled.includes(args[args.length - 1]) ? 1 : 0)
    );
  });

  afterEach(() => {
    project.cleanup();
  });

  it('should report a healthy, stopped runtime', async () => {
    await markProvisioned(project.projectRoot);

    const result = await check();

    expect(result.success).toBe(true);
    expect(result.extensions.status).toBe('stopped');
    expect(result.extensions.dependencies).toEqual({ installed: ['flask', 'requests'], missing: [] });
    expect(result.extensions.health?.details).toMatchObject({ provisioned: true, fresh: true, listening: false });
  });

  it('should skip requirements behind an environment marker', async () => {
    await markProvisioned(project.projectRoot);
    await check();

    const queried = vi.mocked(runProcess).mock.calls.map(call => call[1][call[1].length - 1]);
    expect(queried).toEqual(['flask', 'requests']);
  });

  it('should flag missing dependencies', async () => {
    await markProvisioned(project.projectRoot);
    notInstalled = ['requests'];

    const result = await check();
    expect(result.success).toBe(false);
    expect(result.extensions.status).toBe('unhealthy');
    expect(result.error).toBe('Missing dependencies: requests');
  });

  it('should report an unprovisioned runtime without querying pip', async () => {
    const result = await check();

    expect(result.success).toBe(false);
    expect(result.extensions.status).toBe('not-provisioned');
    expect(result.error).toBe('Runtime is not provisioned');
    expect(runProcess).not.toHaveBeenCalled();
  });

  it('should report a stale runtime', async () => {
    await markProvisioned(project.projectRoot);
    fs.appendFileSync(path.join(project.projectRoot, 'requirements.txt'), 'click\n');

    const result = await check();
    expect(result.extensions.status).toBe('stale');
    expect(result.error).toBe('Dependency manifest changed since the last provision');
  });

  it('should report a missing entry point', async () => {
    await markProvisioned(project.projectRoot);
    fs.rmSync(path.join(project.projectRoot, 'main.py'));

    const result = await check();
    expect(result.extensions.status).toBe('unhealthy');
    expect(result.error).toBe('Entry point not found');
  });

  it('should report a detached process as running', async () => {
    await markProvisioned(project.projectRoot);
    await StateManager.saveRun(project.projectRoot, 'local', {
      environment: 'local',
      platform: 'posix',
      startTime: '2026-01-15T10:31:00.000Z',
      endpoint: 'http://localhost:8080',
      resources: { platform: 'posix', data: { environmentPath: '.venv', pid: process.pid } },
    });

    const result = await check();
    expect(result.extensions.status).toBe('running');
    expect(result.extensions.endpoint).toBe('http://localhost:8080');
  });
});

describe('POSIX stop handler', () => {
  let project: TestProject;

  const stop = (force = false) =>
    runtimeStopDescriptor.handler(handlerContext('stop', project.projectRoot, { force, timeout: 30 }));

  const recordRun = () =>
    StateManager.saveRun(project.projectRoot, 'local', {
      environment: 'local',
      platform: 'posix',
      startTime: '2026-01-15T10:31:00.000Z',
      endpoint: 'http://localhost:8080',
      resources: { platform: 'posix', data: { environmentPath: '.venv', pid: 4242 } },
    });

  beforeEach(() => {
    setSuppressOutput(true);
    project = createTestProject();
  });

  afterEach(() => {
    project.cleanup();
    setSuppressOutput(false);
  });

  it('should succeed when nothing is running', async () => {
    const result = await stop();
    expect(result).toEqual({ success: true, extensions: { status: 'stopped' }, metadata: { message: 'not running' } });
    expect(gracefulStop).not.toHaveBeenCalled();
  });

  it('should stop the recorded process and clear the record', async () => {
    await recordRun();
    vi.mocked(gracefulStop).mockResolvedValue({ stopped: true, graceful: true });

    const result = await stop();

    expect(gracefulStop).toHaveBeenCalledWith(4242, expect.objectContaining({ timeoutSeconds: 30, force: false }));
    expect(result.extensions).toMatchObject({ status: 'stopped', graceful: true });
    expect(await StateManager.loadRun(project.projectRoot, 'local')).toBeNull();
  });

  it('should keep the record when the process survives', async () => {
    await recordRun();
    vi.mocked(gracefulStop).mockResolvedValue({ stopped: false, graceful: false });

    const result = await stop(true);

    expect(result.success).toBe(false);
    expect(result.error).toBe('Process 4242 did not stop');
    expect(await StateManager.loadRun(project.projectRoot, 'local')).not.toBeNull();
  });
});
