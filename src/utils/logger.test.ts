import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { Logger, silentLogger } from './logger.js';

describe('Logger', () => {
  let lines: string[] = [];

  const createLogger = (debugMode = false): Logger =>
    new Logger({
      component: 'TestLogger',
      debugMode,
      sink: (line) => {
        lines.push(line);
      },
    });

  function parseLine(index: number): Record<string, unknown> {
    const line = lines[index];
    if (line === undefined) {
      throw new Error(`Expected output at index ${String(index)} but got undefined`);
    }
    return JSON.parse(line.trim()) as Record<string, unknown>;
  }

  beforeEach(() => {
    lines = [];
  });

  describe('levels', () => {
    it('writes info entries with component and event', () => {
      createLogger().info('phase_approved', { phase: 3 });

      expect(lines).toHaveLength(1);
      const entry = parseLine(0);
      expect(entry.level).toBe('info');
      expect(entry.component).toBe('TestLogger');
      expect(entry.event).toBe('phase_approved');
      expect(entry.data).toEqual({ phase: 3 });
    });

    it('omits data when none is given', () => {
      createLogger().warn('agent_unmapped');

      expect('data' in parseLine(0)).toBe(false);
    });

    it('suppresses debug output unless debugMode is set', () => {
      createLogger(false).debug('state_loaded');
      expect(lines).toHaveLength(0);

      createLogger(true).debug('state_loaded');
      expect(lines).toHaveLength(1);
      expect(parseLine(0).level).toBe('debug');
    });

    it('terminates every entry with a newline', () => {
      const logger = createLogger();
      logger.error('write_failed');
      logger.info('done');

      expect(lines.every((line) => line.endsWith('\n'))).toBe(true);
    });
  });

  describe('child', () => {
    it('keeps the sink and debug setting under a new component name', () => {
      const child = createLogger(true).child('WorkflowLoop');
      child.debug('tick');

      const entry = parseLine(0);
      expect(entry.component).toBe('WorkflowLoop');
      expect(entry.level).toBe('debug');
    });
  });

  describe('safe JSON.stringify', () => {
    it('handles circular references without throwing', () => {
      const circular: Record<string, unknown> = { name: 'test' };
      circular.self = circular;

      expect(() => {
        createLogger().info('circular_test', circular);
      }).not.toThrow();

      const entry = parseLine(0);
      expect(entry.event).toBe('circular_test');
      expect(typeof entry.serializationError).toBe('string');
      expect(entry.originalData).toBe('[unserializable]');
      expect(Object.keys(entry)).toEqual([
        'timestamp',
        'level',
        'component',
        'event',
        'serializationError',
        'originalData',
      ]);
    });

    it('handles BigInt values without throwing', () => {
      createLogger().info('bigint_test', { value: BigInt(10) });

      expect(parseLine(0).originalData).toBe('[unserializable]');
    });
  });

  describe('default sink', () => {
    let originalWrite: typeof process.stderr.write;
    const captured: string[] = [];

    beforeEach(() => {
      captured.length = 0;
      originalWrite = process.stderr.write.bind(process.stderr);
      process.stderr.write = vi.fn((chunk: string | Uint8Array): boolean => {
        captured.push(typeof chunk === 'string' ? chunk : new TextDecoder().decode(chunk));
        return true;
      }) as typeof process.stderr.write;
    });

    afterEach(() => {
      process.stderr.write = originalWrite;
    });

    it('writes to stderr', () => {
      new Logger({ component: 'Stderr' }).info('hello');

      expect(captured).toHaveLength(1);
      expect(captured[0]).toContain('"component":"Stderr"');
    });

    it('silentLogger writes nothing', () => {
      silentLogger.error('ignored');
      silentLogger.child('Other').info('ignored');

      expect(captured).toHaveLength(0);
    });
  });

  describe('property-based tests', () => {
    it('every entry round-trips through JSON with the given event name', () => {
      fc.assert(
        fc.property(fc.string(), (event) => {
          lines = [];
          createLogger().info(event);
          return parseLine(0).event === event;
        }),
        { numRuns: 50 }
      );
    });
  });
});
