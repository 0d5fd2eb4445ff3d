import { describe, it, expect } from 'vitest';
import { createLogger, resolveLogLevel, REDACTION_CONFIG } from '../../src/logging';

describe('resolveLogLevel', () => {
  it('should default to silent', () => {
    expect(resolveLogLevel(undefined)).toBe('silent');
    expect(resolveLogLevel('')).toBe('silent');
  });

  it('should accept known levels in any case', () => {
    expect(resolveLogLevel('debug')).toBe('debug');
    expect(resolveLogLevel('WARN')).toBe('warn');
  });

  it('should fall back to silent for unknown levels', () => {
    expect(resolveLogLevel('verbose')).toBe('silent');
  });
});

describe('createLogger', () => {
  it('should tag records with the component', () => {
    expect(createLogger('token-manager').bindings()).toEqual({ component: 'token-manager' });
  });
});

describe('REDACTION_CONFIG', () => {
  it('should cover tokens and key material', () => {
    expect(REDACTION_CONFIG.paths).toEqual(
      expect.arrayContaining(['token', 'privateKey', 'publicKey', 'secret', 'headers.authorization'])
    );
  });
});
