import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  deepMerge,
  listEnvironmentNames,
  parseAndMergeConfigs,
  resolveEnvVars,
} from '../../config/environment-loader';
import {
  getAvailableEnvironments,
  isValidEnvironment,
  loadEnvironmentConfig,
} from '../../config/environment-loader-fs';
import { ConfigurationError } from '../../config/configuration-error';

const BASE = JSON.stringify({
  name: 'cat-sim',
  defaults: {
    port: 8080,
    env: { MODE: '${APP_MODE}', TOKEN: '${UNSET_VALUE}' },
    entrypoint: { args: ['--debug'] },
  },
});

describe('@runbox/core - environment-loader', () => {
  describe('deepMerge', () => {
    it('should merge nested objects and replace arrays', () => {
      const result = deepMerge(
        {},
        { entrypoint: { script: 'main.py', args: ['a', 'b'] }, port: 8080 },
        { entrypoint: { args: ['c'] } }
      );
      expect(result).toEqual({ entrypoint: { script: 'main.py', args: ['c'] }, port: 8080 });
    });

    it('should skip sources that are not objects', () => {
      expect(deepMerge({ port: 1 }, undefined, 'text', { port: 2 })).toEqual({ port: 2 });
    });
  });

  describe('resolveEnvVars', () => {
    it('should substitute known variables and keep unknown placeholders', () => {
      const result = resolveEnvVars(
        { url: 'http://${HOST}:${PORT}/', list: ['${HOST}'], other: '${NOPE}', count: 3 },
        { HOST: 'localhost', PORT: '8080' }
      );
      expect(result).toEqual({
        url: 'http://localhost:8080/',
        list: ['localhost'],
        other: '${NOPE}',
        count: 3,
      });
    });
  });

  describe('parseAndMergeConfigs', () => {
    it('should merge defaults with the environment file and fill schema defaults', () => {
      const config = parseAndMergeConfigs(
        BASE,
        JSON.stringify({ platform: { type: 'posix' }, port: 9090 }),
        { APP_MODE: 'production' },
        'local',
        '/srv/cat-sim'
      );

      expect(config.name).toBe('cat-sim');
      expect(config.platform.type).toBe('posix');
      expect(config.port).toBe(9090);
      expect(config.env).toEqual({ MODE: 'production', TOKEN: '${UNSET_VALUE}' });
      expect(config.entrypoint).toEqual({ script: 'main.py', interpreter: 'python', args: ['--debug'] });
      expect(config.container).toEqual({ tag: 'latest', image: 'cat-sim' });
      expect(config._metadata).toEqual({ environment: 'local', projectRoot: '/srv/cat-sim' });
    });

    it('should keep an explicit image name', () => {
      const config = parseAndMergeConfigs(
        BASE,
        JSON.stringify({ platform: { type: 'container' }, container: { image: 'registry.local/cats', tag: 'v2' } }),
        {},
        'container',
        '/srv/cat-sim'
      );
      expect(config.container).toEqual({ image: 'registry.local/cats', tag: 'v2' });
    });

    it('should reject invalid JSON in runbox.json', () => {
      expect(() => parseAndMergeConfigs('{ name: ', '{}', {}, 'local', '/p')).toThrow(
        'Invalid JSON syntax in runbox.json'
      );
    });

    it('should reject invalid JSON in the environment file', () => {
      expect(() => parseAndMergeConfigs(BASE, '{,}', {}, 'local', '/p')).toThrow(
        'Invalid JSON syntax in environments/local.json'
      );
    });

    it('should require a platform after merging', () => {
      expect(() => parseAndMergeConfigs(BASE, '{}', {}, 'local', '/p')).toThrow(
        'Invalid environment configuration: Missing required property: platform'
      );
    });

    it('should reject an unknown platform type', () => {
      expect(() =>
        parseAndMergeConfigs(BASE, JSON.stringify({ platform: { type: 'kubernetes' } }), {}, 'local', '/p')
      ).toThrow(/must be one of \[posix, container\]/);
    });

    it('should reject an unknown key in the environment file', () => {
      expect(() =>
        parseAndMergeConfigs(BASE, JSON.stringify({ platform: { type: 'posix' }, prot: 9000 }), {}, 'local', '/p')
      ).toThrow("Invalid environments/local.json: root: unknown property 'prot'");
    });

    it('should reject an invalid image name in the environment file', () => {
      expect(() =>
        parseAndMergeConfigs(
          BASE,
          JSON.stringify({ platform: { type: 'container' }, container: { image: 'Bad Image!' } }),
          {},
          'container',
          '/p'
        )
      ).toThrow('Invalid environments/container.json: /container/image: must match pattern');
    });

    it('should raise ConfigurationError with the environment name', () => {
      try {
        parseAndMergeConfigs(BASE, '{}', {}, 'staging', '/p');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        if (error instanceof ConfigurationError) {
          expect(error.environment).toBe('staging');
        }
      }
    });
  });

  describe('listEnvironmentNames', () => {
    it('should list json files without extension, sorted', () => {
      expect(listEnvironmentNames(['local.json', 'notes.txt', 'environments/container.json'])).toEqual([
        'container',
        'local',
      ]);
    });
  });

  describe('filesystem loading', () => {
    let projectRoot: string;

    beforeEach(() => {
      projectRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'runbox-env-'));
      fs.writeFileSync(path.join(projectRoot, 'runbox.json'), BASE);
      fs.mkdirSync(path.join(projectRoot, 'environments'));
      fs.writeFileSync(
        path.join(projectRoot, 'environments', 'local.json'),
        JSON.stringify({ platform: { type: 'posix' } })
      );
    });

    afterEach(() => {
      fs.rmSync(projectRoot, { recursive: true, force: true });
    });

    it('should load an environment from disk', () => {
      const config = loadEnvironmentConfig(projectRoot, 'local', {});
      expect(config.platform.type).toBe('posix');
      expect(config._metadata.projectRoot).toBe(projectRoot);
    });

    it('should list available environments', () => {
      expect(getAvailableEnvironments(projectRoot)).toEqual(['local']);
      expect(isValidEnvironment(projectRoot, 'local')).toBe(true);
      expect(isValidEnvironment(projectRoot, 'production')).toBe(false);
    });

    it('should suggest available environments when one is missing', () => {
      try {
        loadEnvironmentConfig(projectRoot, 'production', {});
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        if (error instanceof ConfigurationError) {
          expect(error.suggestion).toBe('Available environments: local');
        }
      }
    });

    it('should point at init when runbox.json is missing', () => {
      fs.rmSync(path.join(projectRoot, 'runbox.json'));
      expect(() => loadEnvironmentConfig(projectRoot, 'local', {})).toThrow(/Project configuration missing/);
    });
  });
});
