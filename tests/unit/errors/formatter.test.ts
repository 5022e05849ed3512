import { describe, it, expect } from 'vitest';
import { Err } from '../../../src/errors/factories.js';
import { formatAppError } from '../../../src/errors/formatter.js';

describe('formatAppError', () => {
  it('lists config issues under the message', () => {
    const error = Err.configInvalid([
      { path: 'REFSTORE_USER_ID', message: 'REFSTORE_USER_ID cannot be negative' },
      { path: '(root)', message: 'Expected object' },
    ]);

    expect(formatAppError(error)).toBe(
      'Invalid file store configuration\n\n' +
        '  - REFSTORE_USER_ID: REFSTORE_USER_ID cannot be negative\n' +
        '  - (root): Expected object'
    );
  });

  it('says so when a config error carries no issues', () => {
    expect(formatAppError(Err.configInvalid([]))).toBe('Invalid file store configuration\n\n  - (no details)');
  });

  it('names the startup phase and the cause', () => {
    expect(formatAppError(Err.startupFailed('storage_root', 'Storage root could not be initialized'))).toBe(
      'Startup failed during storage_root: Storage root could not be initialized'
    );
    expect(formatAppError(Err.startupFailed('container', 'Service registration failed', new TypeError('boom')))).toBe(
      'Startup failed during container: Service registration failed\nCause: TypeError: boom'
    );
  });

  it('describes non-error causes', () => {
    expect(formatAppError(Err.unexpected('Something broke', 'plain text'))).toBe('Something broke\nCause: plain text');
    expect(formatAppError(Err.unexpected('Something broke', { code: 42 }))).toBe('Something broke\nCause: {"code":42}');
    expect(formatAppError(Err.unexpected('Something broke', undefined))).toBe('Something broke\nCause: undefined');
  });
});
