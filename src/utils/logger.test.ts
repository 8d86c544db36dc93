import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { Logger } from './logger.js';

describe('Logger', () => {
  let capturedOutput: string[] = [];
  let originalWrite: typeof process.stderr.write;

  beforeEach(() => {
    capturedOutput = [];
    originalWrite = process.stderr.write.bind(process.stderr);
    process.stderr.write = vi.fn((chunk: string | Uint8Array): boolean => {
      capturedOutput.push(typeof chunk === 'string' ? chunk : new TextDecoder().decode(chunk));
      return true;
    }) as typeof process.stderr.write;
  });

  afterEach(() => {
    process.stderr.write = originalWrite;
  });

  function getOutput(index: number): string {
    const output = capturedOutput[index];
    if (output === undefined) {
      throw new Error(`Expected output at index ${String(index)} but got undefined`);
    }
    return output;
  }

  function parseOutput(index: number): Record<string, unknown> {
    return JSON.parse(getOutput(index).trim()) as Record<string, unknown>;
  }

  describe('entries', () => {
    it('writes one JSON line per entry', () => {
      const logger = new Logger({ component: 'ClosureEngine' });
      logger.info('attractor_converged', { seed: 'X', generation: 2 });

      expect(capturedOutput).toHaveLength(1);
      expect(getOutput(0).endsWith('\n')).toBe(true);

      const parsed = parseOutput(0);
      expect(parsed.level).toBe('info');
      expect(parsed.component).toBe('ClosureEngine');
      expect(parsed.event).toBe('attractor_converged');
      expect(parsed.data).toEqual({ seed: 'X', generation: 2 });
      expect(typeof parsed.timestamp).toBe('string');
    });

    it('omits data when none is given', () => {
      new Logger({ component: 'cli' }).warn('config_missing');

      expect(Object.keys(parseOutput(0)).sort()).toEqual([
        'component',
        'event',
        'level',
        'timestamp',
      ]);
    });

    it('writes an ISO timestamp', () => {
      new Logger({ component: 'cli' }).error('failed');
      const timestamp = parseOutput(0).timestamp;

      expect(typeof timestamp === 'string' && !Number.isNaN(Date.parse(timestamp))).toBe(true);
    });

    it('labels each level', () => {
      const logger = new Logger({ component: 'cli', debugMode: true });
      logger.debug('a');
      logger.info('b');
      logger.warn('c');
      logger.error('d');

      expect(capturedOutput.map((_, i) => parseOutput(i).level)).toEqual([
        'debug',
        'info',
        'warn',
        'error',
      ]);
    });
  });

  describe('debug mode', () => {
    it('drops debug entries by default', () => {
      const logger = new Logger({ component: 'cli' });
      logger.debug('generation_expanded', { generation: 1 });

      expect(logger.isDebugEnabled).toBe(false);
      expect(capturedOutput).toHaveLength(0);
    });

    it('writes debug entries when enabled', () => {
      const logger = new Logger({ component: 'cli', debugMode: true });
      logger.debug('generation_expanded', { generation: 1 });

      expect(logger.isDebugEnabled).toBe(true);
      expect(parseOutput(0).event).toBe('generation_expanded');
    });

    it('carries over to derived loggers', () => {
      const derived = new Logger({ component: 'cli', debugMode: true }).forComponent('validator');
      derived.debug('checked');

      expect(derived.isDebugEnabled).toBe(true);
      expect(parseOutput(0).component).toBe('validator');
    });
  });

  describe('unserializable data', () => {
    it('replaces circular data', () => {
      const circular: Record<string, unknown> = { name: 'test' };
      circular.self = circular;

      expect(() => {
        new Logger({ component: 'cli' }).info('circular_test', circular);
      }).not.toThrow();

      const parsed = parseOutput(0);
      expect(parsed.event).toBe('circular_test');
      expect(parsed.originalData).toBe('[unserializable]');
      expect(typeof parsed.serializationError).toBe('string');
      expect(parsed.data).toBeUndefined();
    });

    it('replaces BigInt data', () => {
      new Logger({ component: 'cli' }).info('bigint_test', { value: BigInt(1) });

      expect(parseOutput(0).originalData).toBe('[unserializable]');
    });
  });

  it('always writes parseable JSON for string data', () => {
    fc.assert(
      fc.property(fc.string(), fc.string(), (event, value) => {
        capturedOutput = [];
        new Logger({ component: 'prop' }).info(event, { value });

        const parsed = parseOutput(0);
        expect(parsed.event).toBe(event);
        expect(parsed.data).toEqual({ value });
      })
    );
  });
});
