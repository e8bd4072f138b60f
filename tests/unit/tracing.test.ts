/**
 * Tracing Unit Tests
 *
 * Without a registered SDK the global tracer is a no-op one, which is
 * enough to check the enable switch and that results and errors pass
 * through the span wrappers untouched.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as tracing from '../../src/observability/tracing';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('Tracing', () => {
  const original = process.env.OTEL_ENABLED;

  beforeEach(() => {
    delete process.env.OTEL_ENABLED;
  });

  afterEach(() => {
    if (original === undefined) delete process.env.OTEL_ENABLED;
    else process.env.OTEL_ENABLED = original;
  });

  describe('Tracing State', () => {
    it('should be disabled by default', () => {
      expect(tracing.isOTelEnabled()).toBe(false);
      expect(tracing.getTracer()).toBeNull();
    });

    it.each(['1', 'true'])('should be enabled when OTEL_ENABLED=%s', (value) => {
      process.env.OTEL_ENABLED = value;
      expect(tracing.isOTelEnabled()).toBe(true);
      expect(tracing.getTracer()).not.toBeNull();
    });

    it('should be disabled when OTEL_ENABLED=0', () => {
      process.env.OTEL_ENABLED = '0';
      expect(tracing.isOTelEnabled()).toBe(false);
    });
  });

  describe('Request ids', () => {
    it('should generate unique v4 UUIDs', () => {
      const first = tracing.generateRequestId();
      const second = tracing.generateRequestId();

      expect(first).toMatch(UUID_V4);
      expect(second).toMatch(UUID_V4);
      expect(first).not.toBe(second);
    });
  });

  describe('Span Operations', () => {
    it('should run without a span when tracing is disabled', async () => {
      const result = await tracing.withSpan('test-span', async (span) => {
        expect(span).toBeNull();
        return 'test-result';
      });

      expect(result).toBe('test-result');
    });

    it('should run inside a span when tracing is enabled', async () => {
      process.env.OTEL_ENABLED = '1';

      const result = await tracing.withSpan(
        'test-span',
        async (span) => {
          expect(span).not.toBeNull();
          return 'test-result';
        },
        { 'test.attr': 'value', 'test.number': 42, 'test.boolean': true }
      );

      expect(result).toBe('test-result');
    });

    it('should rethrow errors from the wrapped function', async () => {
      process.env.OTEL_ENABLED = '1';

      await expect(
        tracing.withSpan('test-span', async () => {
          throw new Error('Test error');
        })
      ).rejects.toThrow('Test error');
    });
  });

  describe('Specialized Span Functions', () => {
    it('should create HTTP spans', async () => {
      process.env.OTEL_ENABLED = '1';

      const result = await tracing.withHttpSpan(
        'GET',
        'https://api.example.test/v1/metric/',
        0,
        async () => 200
      );

      expect(result).toBe(200);
    });

    it('should create OAuth spans', async () => {
      const result = await tracing.withOAuthSpan('refresh_token', async () => 'token');

      expect(result).toBe('token');
    });
  });
});
