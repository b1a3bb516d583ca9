/**
 * Tests for exchange error classification
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  ErrorCategory,
  ErrorSeverity,
  ExchangeError,
  TransportFailure,
  ambiguousWriteError,
  classifyFailure,
  describeError,
  insufficientMarketDataError,
  toExchangeError,
  type ErrorContext,
  type NonFatalErrorPolicy
} from './ErrorHandler';

const policy: NonFatalErrorPolicy = {
  nonFatalErrorCodes: [502, 503, 504],
  nonFatalErrorMessages: ['Connection reset', 'ECONNREFUSED']
};

const context: ErrorContext = {
  operation: 'getTicker',
  component: 'Test',
  marketId: 'btcusd',
  timestamp: new Date('2024-01-01T00:00:00Z')
};

describe('Error Handler', () => {
  describe('classifyFailure', () => {
    it('treats timeouts as transient', () => {
      expect(classifyFailure({ message: 'slow', timedOut: true }, { nonFatalErrorCodes: [], nonFatalErrorMessages: [] })).toBe(
        ErrorCategory.TRANSIENT_NETWORK
      );
    });

    it('treats allow-listed status codes as transient', () => {
      expect(classifyFailure({ statusCode: 503, message: 'Service Unavailable' }, policy)).toBe(ErrorCategory.TRANSIENT_NETWORK);
      expect(classifyFailure({ statusCode: 400, message: 'Bad Request' }, policy)).toBe(ErrorCategory.FATAL);
    });

    it('matches message fragments case-sensitively', () => {
      expect(classifyFailure({ message: 'Connection reset by peer' }, policy)).toBe(ErrorCategory.TRANSIENT_NETWORK);
      expect(classifyFailure({ message: 'connection reset by peer' }, policy)).toBe(ErrorCategory.FATAL);
    });

    it('ignores empty fragments', () => {
      expect(classifyFailure({ message: 'anything' }, { nonFatalErrorCodes: [], nonFatalErrorMessages: [''] })).toBe(
        ErrorCategory.FATAL
      );
    });

    it('Property: an allow-listed status code is transient whatever the message', () => {
      fc.assert(
        fc.property(fc.constantFrom(502, 503, 504), fc.string(), (statusCode, message) => {
          expect(classifyFailure({ statusCode, message }, policy)).toBe(ErrorCategory.TRANSIENT_NETWORK);
        }),
        { numRuns: 100 }
      );
    });

    it('Property: classification is deterministic', () => {
      fc.assert(
        fc.property(fc.option(fc.integer({ min: 100, max: 599 }), { nil: undefined }), fc.string(), fc.boolean(), (statusCode, message, timedOut) => {
          const failure = { statusCode, message, timedOut };
          expect(classifyFailure(failure, policy)).toBe(classifyFailure(failure, policy));
        }),
        { numRuns: 100 }
      );
    });
  });

  describe('toExchangeError', () => {
    it('classifies transport failures with a status code', () => {
      const failure = new TransportFailure('Service Unavailable', { statusCode: 503 });
      const error = toExchangeError(failure, context, policy);

      expect(error.message).toBe('getTicker failed: Service Unavailable');
      expect(error.code).toBe('HTTP_503');
      expect(error.category).toBe(ErrorCategory.TRANSIENT_NETWORK);
      expect(error.severity).toBe(ErrorSeverity.LOW);
      expect(error.phase).toBe('read');
      expect(error.statusCode).toBe(503);
      expect(error.originalError).toBe(failure);
      expect(error.isRetryable).toBe(true);
    });

    it('codes timeouts and socket errors', () => {
      expect(toExchangeError(new TransportFailure('timed out', { timedOut: true }), context, policy).code).toBe('REQUEST_TIMEOUT');

      const socket = toExchangeError(new TransportFailure('socket hang up'), context, policy, 'write');
      expect(socket.code).toBe('NETWORK_ERROR');
      expect(socket.category).toBe(ErrorCategory.FATAL);
      expect(socket.phase).toBe('write');
      expect(socket.isRetryable).toBe(false);
    });

    it('wraps unexpected errors as fatal', () => {
      const error = toExchangeError(new Error('bad'), context, policy);
      expect(error.code).toBe('UNEXPECTED_ERROR');
      expect(error.category).toBe(ErrorCategory.FATAL);
      expect(error.severity).toBe(ErrorSeverity.HIGH);
      expect(error.message).toBe('getTicker failed: bad');

      expect(toExchangeError('oops', context, policy).message).toBe('getTicker failed: oops');
    });

    it('passes exchange errors through untouched', () => {
      const original = insufficientMarketDataError(context, 'empty book');
      expect(toExchangeError(original, context, policy, 'write')).toBe(original);
    });
  });

  describe('ExchangeError', () => {
    it('re-tags the phase without changing the category', () => {
      const error = toExchangeError(new TransportFailure('Bad Request', { statusCode: 400 }), context, policy);
      expect(error.withPhase('read')).toBe(error);

      const write = error.withPhase('write');
      expect(write).not.toBe(error);
      expect(write.phase).toBe('write');
      expect(write.category).toBe(ErrorCategory.FATAL);
      expect(write.code).toBe('HTTP_400');
      expect(write.message).toBe(error.message);
    });

    it('serializes the fields needed for logging', () => {
      const error = insufficientMarketDataError(context, 'empty book');
      expect(error.toJSON()).toMatchObject({
        name: 'ExchangeError',
        message: 'empty book',
        code: 'INSUFFICIENT_MARKET_DATA',
        category: ErrorCategory.INSUFFICIENT_MARKET_DATA,
        severity: ErrorSeverity.LOW,
        phase: 'read'
      });
    });
  });

  describe('ambiguousWriteError', () => {
    it('escalates a transient write failure', () => {
      const cause = toExchangeError(
        new TransportFailure('Service Unavailable', { statusCode: 503 }),
        { ...context, operation: 'placeOrder' },
        policy,
        'write'
      );
      const error = ambiguousWriteError(cause, 'confirmation read failed');

      expect(error).toBeInstanceOf(ExchangeError);
      expect(error.message).toBe('placeOrder outcome unknown: confirmation read failed (placeOrder failed: Service Unavailable)');
      expect(error.category).toBe(ErrorCategory.AMBIGUOUS_WRITE_OUTCOME);
      expect(error.severity).toBe(ErrorSeverity.CRITICAL);
      expect(error.phase).toBe('write');
      expect(error.statusCode).toBe(503);
      expect(error.originalError).toBe(cause);
    });
  });

  it('describes unknown thrown values', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError(42)).toBe('42');
  });
});
