import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../config/configuration-error';

describe('@runbox/core - ConfigurationError', () => {
  it('should render environment and suggestion', () => {
    const error = new ConfigurationError('Environment not specified', 'local', 'Set RUNBOX_ENV');
    expect(error.toString()).toBe(
      '❌ Environment not specified\n   Environment: local\n   💡 Suggestion: Set RUNBOX_ENV'
    );
  });

  it('should render only the message when nothing else is known', () => {
    const error = new ConfigurationError('No runbox.json found');
    expect(error.toString()).toBe('❌ No runbox.json found');
    expect(error.name).toBe('ConfigurationError');
  });

  it('should keep the underlying cause', () => {
    const cause = new SyntaxError('Unexpected token');
    const error = new ConfigurationError('Invalid JSON syntax in runbox.json', 'local', undefined, cause);
    expect(error.cause).toBe(cause);
  });
});
