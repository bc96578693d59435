import { describe, it, expect } from 'vitest';
import { formatPlan } from '../../bootstrap/plan';
import { DependencyInstallError, NotProvisionedError, errorMessage } from '../../bootstrap/errors';

describe('@runbox/core - bootstrap plan', () => {
  it('should number plan lines and show commands', () => {
    expect(
      formatPlan([
        { step: 'isolate', description: 'Create virtual environment', command: ['python3', '-m', 'venv', '.venv'] },
        { step: 'declare-port', description: 'Declare port 8080' },
      ])
    ).toEqual([
      '1. [isolate] Create virtual environment: python3 -m venv .venv',
      '2. [declare-port] Declare port 8080',
    ]);
  });
});

describe('@runbox/core - bootstrap errors', () => {
  it('should tag each error with its step', () => {
    const install = new DependencyInstallError('Dependency installation failed (exit code 1)', 1, ['No matching distribution']);
    expect(install.step).toBe('install');
    expect(install.exitCode).toBe(1);
    expect(install.stderrTail).toEqual(['No matching distribution']);

    const stale = new NotProvisionedError('Dependency manifest changed', true);
    expect(stale.step).toBe('launch');
    expect(stale.stale).toBe(true);
  });

  it('should extract messages from anything thrown', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});
