import { describe, it, expect } from 'vitest';
import { IsolatedEnvironment, activationEnv } from '../../bootstrap/activation';

describe('@runbox/core - activation', () => {
  describe('activationEnv', () => {
    it('should put the environment bin directory first on PATH', () => {
      const env = activationEnv(
        '/srv/app/.venv',
        { PATH: '/usr/bin:/bin', HOME: '/home/dev', PYTHONHOME: '/opt/python', UNSET: undefined },
        ':'
      );
      expect(env).toEqual({
        PATH: '/srv/app/.venv/bin:/usr/bin:/bin',
        HOME: '/home/dev',
        VIRTUAL_ENV: '/srv/app/.venv',
      });
    });

    it('should use the bin directory alone when PATH is unset', () => {
      expect(activationEnv('/srv/app/.venv', {}, ':').PATH).toBe('/srv/app/.venv/bin');
    });

    it('should replace an inherited VIRTUAL_ENV', () => {
      const env = activationEnv('/srv/app/.venv', { VIRTUAL_ENV: '/other/.venv' }, ':');
      expect(env.VIRTUAL_ENV).toBe('/srv/app/.venv');
    });
  });

  describe('IsolatedEnvironment', () => {
    it('should expose the interpreter inside the environment', () => {
      const venv = IsolatedEnvironment.activate('/srv/app/.venv', { PATH: '/usr/bin' });
      expect(venv.root).toBe('/srv/app/.venv');
      expect(venv.binDir).toBe('/srv/app/.venv/bin');
      expect(venv.python).toBe('/srv/app/.venv/bin/python');
    });

    it('should add configured variables without letting them override activation', () => {
      const venv = IsolatedEnvironment.activate(
        '/srv/app/.venv',
        { PATH: '/usr/bin' },
        { APP_MODE: 'test', VIRTUAL_ENV: '/elsewhere' }
      );
      expect(venv.env.APP_MODE).toBe('test');
      expect(venv.env.VIRTUAL_ENV).toBe('/srv/app/.venv');
    });

    it('should freeze the activated environment', () => {
      const venv = IsolatedEnvironment.activate('/srv/app/.venv', {});
      expect(Object.isFrozen(venv.env)).toBe(true);
    });
  });
});
