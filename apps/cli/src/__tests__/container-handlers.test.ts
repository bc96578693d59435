import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { imageProvisionDescriptor } from '../platforms/container/handlers/runtime-provision.js';
import { containerStartDescriptor } from '../platforms/container/handlers/runtime-start.js';
import { containerCheckDescriptor } from '../platforms/container/handlers/runtime-check.js';
import { containerStopDescriptor } from '../platforms/container/handlers/runtime-stop.js';
import {
  buildImage,
  detectContainerRuntime,
  inspectImageId,
  isContainerRunning,
  runContainerDetached,
  runContainerForeground,
  stopContainer,
} from '../platforms/container-runtime.js';
import { isHostReachable, isPortInUse } from '../core/io/network-utils.js';
import { setSuppressOutput } from '../core/io/cli-logger.js';
import { StateManager } from '../core/state-manager.js';
import { createTestProject, handlerContext, markProvisioned, type TestProject } from './test-setup.js';

vi.mock('../platforms/container-runtime.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../platforms/container-runtime.js')>();
  return {
    ...actual,
    detectContainerRuntime: vi.fn(),
    inspectImageId: vi.fn(),
    buildImage: vi.fn(),
    removeImage: vi.fn(),
    isContainerRunning: vi.fn(),
    runContainerDetached: vi.fn(),
    runContainerForeground: vi.fn(),
    stopContainer: vi.fn(),
  };
});

vi.mock('../core/io/network-utils.js', () => ({
  isPortInUse: vi.fn(),
  isHostReachable: vi.fn(),
}));

describe('container platform handlers', () => {
  let project: TestProject;

  beforeEach(() => {
    setSuppressOutput(true);
    project = createTestProject({ platform: 'container' });
    vi.mocked(detectContainerRuntime).mockResolvedValue('docker');
    vi.mocked(inspectImageId).mockResolvedValue('sha256:feed');
    vi.mocked(buildImage).mockResolvedValue({ code: 0, signal: null, stdout: '', stderr: '' });
    vi.mocked(isContainerRunning).mockResolvedValue(false);
    vi.mocked(isPortInUse).mockResolvedValue(false);
    vi.mocked(isHostReachable).mockResolvedValue(false);
  });

  afterEach(() => {
    project.cleanup();
    setSuppressOutput(false);
  });

  describe('provision', () => {
    const provision = (dryRun = false) =>
      imageProvisionDescriptor.handler(
        handlerContext('provision', project.projectRoot, { force: false, destroy: false }, { dryRun })
      );

    it('should write the recipe, build the image and record it', async () => {
      const result = await provision();

      expect(result.success).toBe(true);
      expect(result.extensions.status).toBe('provisioned');
      expect(fs.existsSync(path.join(project.projectRoot, '.runbox', 'Dockerfile'))).toBe(true);
      expect(fs.existsSync(path.join(project.projectRoot, '.dockerignore'))).toBe(true);
      expect(buildImage).toHaveBeenCalledWith('docker', 'cat-sim:latest', '.runbox/Dockerfile', project.projectRoot, {
        stream: false,
      });
      expect(await StateManager.loadProvision(project.projectRoot, 'local')).toMatchObject({
        platform: 'container',
        requirements: ['flask'],
        resources: { platform: 'container', data: { runtime: 'docker', image: 'cat-sim:latest', imageId: 'sha256:feed' } },
      });
    });

    it('should leave no record when the build fails', async () => {
      vi.mocked(buildImage).mockResolvedValue({
        code: 2,
        signal: null,
        stdout: '',
        stderr: 'ERROR: No matching distribution found for nosuchpkg\n',
      });

      const result = await provision();

      expect(result.success).toBe(false);
      expect(result.error).toBe('Image build failed (exit code 2)');
      expect(result.metadata).toEqual({
        installerExitCode: 2,
        installerOutput: ['ERROR: No matching distribution found for nosuchpkg'],
      });
      expect(await StateManager.loadProvision(project.projectRoot, 'local')).toBeNull();
    });

    it('should plan the build without touching the runtime', async () => {
      const result = await provision(true);

      expect(result.extensions.status).toBe('planned');
      expect(result.extensions.plan?.[0].command).toEqual([
        'docker', 'build', '-t', 'cat-sim:latest', '-f', '.runbox/Dockerfile', '.',
      ]);
      expect(detectContainerRuntime).not.toHaveBeenCalled();
      expect(buildImage).not.toHaveBeenCalled();
    });
  });

  describe('start', () => {
    const start = (detach = false) =>
      containerStartDescriptor.handler(handlerContext('start', project.projectRoot, { detach }));

    it('should run the image in the foreground with the port published', async () => {
      await markProvisioned(project.projectRoot, 'container');
      vi.mocked(runContainerForeground).mockResolvedValue({ exitCode: 0, signal: null });

      const result = await start();

      expect(runContainerForeground).toHaveBeenCalledWith('docker', 'cat-sim:latest', {
        port: 8080,
        env: {},
        detachAs: undefined,
      });
      expect(result).toMatchObject({ success: true, exitCode: 0, extensions: { status: 'exited' } });
    });

    it('should propagate the container exit code', async () => {
      await markProvisioned(project.projectRoot, 'container');
      vi.mocked(runContainerForeground).mockResolvedValue({ exitCode: 2, signal: null });

      const result = await start();
      expect(result.exitCode).toBe(2);
      expect(result.error).toBe('Container exited with code 2');
    });

    it('should report a missing image as not provisioned', async () => {
      await markProvisioned(project.projectRoot, 'container');
      vi.mocked(inspectImageId).mockResolvedValue(undefined);

      const result = await start();
      expect(result.extensions.status).toBe('not-provisioned');
      expect(result.error).toBe('Image cat-sim:latest not found. Run: runbox provision -e local --force');
      expect(runContainerForeground).not.toHaveBeenCalled();
    });

    it('should record a detached container', async () => {
      await markProvisioned(project.projectRoot, 'container');
      vi.mocked(runContainerDetached).mockResolvedValue('c0ffee');

      const result = await start(true);

      expect(result.extensions.status).toBe('running');
      expect(await StateManager.loadRun(project.projectRoot, 'local')).toMatchObject({
        platform: 'container',
        resources: { data: { containerName: 'cat-sim-local', containerId: 'c0ffee' } },
      });
    });
  });

  describe('check', () => {
    it('should report an unknown status without a container runtime', async () => {
      vi.mocked(detectContainerRuntime).mockRejectedValue(
        new Error('No container runtime found. Please install Docker or Podman.')
      );

      const result = await containerCheckDescriptor.handler(handlerContext('check', project.projectRoot, {}));

      expect(result.success).toBe(false);
      expect(result.extensions.status).toBe('unknown');
      expect(result.error).toBe('No container runtime found. Please install Docker or Podman.');
    });

    it('should list every requirement as installed in a fresh image', async () => {
      await markProvisioned(project.projectRoot, 'container');

      const result = await containerCheckDescriptor.handler(handlerContext('check', project.projectRoot, {}));

      expect(result.success).toBe(true);
      expect(result.extensions.status).toBe('stopped');
      expect(result.extensions.dependencies).toEqual({ installed: ['flask'], missing: [] });
    });
  });

  describe('stop', () => {
    it('should stop the recorded container and clear the record', async () => {
      await StateManager.saveRun(project.projectRoot, 'local', {
        environment: 'local',
        platform: 'container',
        startTime: '2026-01-15T10:31:00.000Z',
        endpoint: 'http://localhost:8080',
        resources: { platform: 'container', data: { runtime: 'docker', image: 'cat-sim:latest', containerName: 'cat-sim-local' } },
      });
      vi.mocked(isContainerRunning).mockResolvedValue(true);
      vi.mocked(stopContainer).mockResolvedValue(true);

      const result = await containerStopDescriptor.handler(
        handlerContext('stop', project.projectRoot, { force: false, timeout: 10 })
      );

      expect(stopContainer).toHaveBeenCalledWith('docker', 'cat-sim-local', { force: false, timeout: 10 });
      expect(result.extensions).toMatchObject({ status: 'stopped', graceful: true });
      expect(await StateManager.loadRun(project.projectRoot, 'local')).toBeNull();
    });
  });
});
