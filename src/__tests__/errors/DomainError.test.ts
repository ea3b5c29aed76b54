/**
 * Unit Tests for Domain Errors
 */

import {
  ArbitrationError,
  ConfigurationError,
  DomainError,
  ValidationError,
  isDomainError,
  wrapError,
} from '../../errors';

describe('DomainError', () => {
  describe('ConfigurationError', () => {
    it('lists the configuration issues', () => {
      const error = ConfigurationError.invalidAxes([
        { path: 'axes.0.prefix', message: 'bad prefix' },
        { path: 'axes.1.id', message: 'duplicate' },
      ]);

      expect(error).toBeInstanceOf(DomainError);
      expect(error.name).toBe('ConfigurationError');
      expect(error.code).toBe('CONFIG_001');
      expect(error.message).toBe('Invalid axis configuration: 2 issue(s)');
      expect(error.isRetryable).toBe(false);
    });

    it('flattens the cause when serialized', () => {
      const error = ConfigurationError.unreadableFile('/tmp/axes.json', new Error('ENOENT'));
      const json = error.toJSON();

      expect(json.code).toBe('CONFIG_002');
      expect(json.context).toEqual({
        filePath: '/tmp/axes.json',
        cause: 'ENOENT',
        issues: [{ path: '/tmp/axes.json', message: 'ENOENT' }],
      });
    });
  });

  describe('ArbitrationError', () => {
    it('marks transport failures as retryable', () => {
      expect(ArbitrationError.requestFailed('claude', 'socket hang up').isRetryable).toBe(true);
      expect(ArbitrationError.timeout('claude', 30000).code).toBe('EXT_002');
      expect(ArbitrationError.rateLimited('claude').code).toBe('EXT_003');
    });

    it('marks empty and disabled responses as final', () => {
      expect(ArbitrationError.emptyResponse('claude')).toMatchObject({
        code: 'EXT_004',
        isRetryable: false,
        provider: 'claude',
      });
      expect(ArbitrationError.disabled('disabled').isRetryable).toBe(false);
    });

    it('formats a user message', () => {
      expect(ArbitrationError.rateLimited('claude').toUserMessage()).toBe(
        'Error EXT_003: Rate limited by claude'
      );
    });
  });

  describe('wrapError', () => {
    it('passes domain errors through', () => {
      const error = ValidationError.malformedContext([]);
      expect(wrapError(error)).toBe(error);
    });

    it('wraps plain errors and values', () => {
      const wrapped = wrapError(new Error('boom'));

      expect(isDomainError(wrapped)).toBe(true);
      expect(wrapped.code).toBe('UNKNOWN');
      expect(wrapped.message).toBe('boom');
      expect(wrapError('oops', 'fallback message').message).toBe('fallback message');
    });

    it('recognizes domain errors', () => {
      expect(isDomainError(new Error('plain'))).toBe(false);
      expect(isDomainError(ArbitrationError.disabled('disabled'))).toBe(true);
    });
  });
});
