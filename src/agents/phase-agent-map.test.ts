import { describe, expect, it, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  PhaseAgentMapError,
  UNKNOWN_AGENT,
  loadPhaseAgentMap,
  parsePhaseAgentMap,
  resolveAgent,
} from './phase-agent-map.js';
import { Logger } from '../utils/logger.js';

describe('Phase-agent map', () => {
  describe('parsePhaseAgentMap', () => {
    it('should map phase numbers to agent names', () => {
      const map = parsePhaseAgentMap('{"0": "Planner", "13": "Reviewer"}');

      expect([...map.entries()]).toEqual([
        [0, 'Planner'],
        [13, 'Reviewer'],
      ]);
    });

    it('should accept an empty object', () => {
      expect(parsePhaseAgentMap('{}').size).toBe(0);
    });

    it('should reject invalid JSON', () => {
      expect(() => parsePhaseAgentMap('{"0": ')).toThrow(PhaseAgentMapError);
      expect(() => parsePhaseAgentMap('{"0": ')).toThrow(
        expect.objectContaining({ errorType: 'parse_error', cause: expect.any(SyntaxError) })
      );
    });

    it('should reject a non-object document', () => {
      expect(() => parsePhaseAgentMap('["Planner"]')).toThrow(
        'Invalid phase-agent map: expected an object'
      );
    });

    it.each(['14', '-1', 'one', '1.5', '', '_comment'])('should skip key %j with a warning', (key) => {
      const lines: string[] = [];
      const logger = new Logger({ component: 'PhaseAgentMap', sink: (line) => lines.push(line) });

      const map = parsePhaseAgentMap(JSON.stringify({ [key]: 'Agent', '3': 'Design' }), logger);

      expect([...map.entries()]).toEqual([[3, 'Design']]);
      expect(lines).toHaveLength(1);
      expect(lines[0]).toContain('"level":"warn"');
      expect(lines[0]).toContain('"event":"agent_map_key_ignored"');
      expect(lines[0]).toContain(`"key":${JSON.stringify(key)}`);
    });

    it('should skip a non-phase key whatever its value', () => {
      expect(parsePhaseAgentMap('{"_comment": ["notes"], "0": "Planner"}').size).toBe(1);
    });

    it('should reject a non-string agent', () => {
      expect(() => parsePhaseAgentMap('{"2": 7}')).toThrow(
        'Invalid phase-agent map: agent for phase 2 must be a string'
      );
    });
  });

  describe('resolveAgent', () => {
    it('should fall back to Unknown Agent', () => {
      const map = parsePhaseAgentMap('{"0": "Planner"}');

      expect(resolveAgent(map, 0)).toBe('Planner');
      expect(resolveAgent(map, 7)).toBe(UNKNOWN_AGENT);
    });
  });

  describe('loadPhaseAgentMap', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'phasegate-agents-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should return an empty map when the file is missing', async () => {
      const map = await loadPhaseAgentMap(join(dir, 'absent.json'));
      expect(map.size).toBe(0);
    });

    it('should load a map from disk', async () => {
      const path = join(dir, 'agents.json');
      await writeFile(path, '{"4": "Legal"}');

      expect(resolveAgent(await loadPhaseAgentMap(path), 4)).toBe('Legal');
    });

    it('should name the file in schema errors', async () => {
      const path = join(dir, 'agents.json');
      await writeFile(path, '{"4": false}');

      await expect(loadPhaseAgentMap(path)).rejects.toThrow(
        `Error loading phase-agent map from "${path}": Invalid phase-agent map: agent for phase 4 must be a string`
      );
    });

    it('should report unreadable paths as file errors', async () => {
      const path = join(dir, 'agents.json');
      await mkdir(path);

      await expect(loadPhaseAgentMap(path)).rejects.toMatchObject({
        name: 'PhaseAgentMapError',
        errorType: 'file_error',
      });
    });
  });
});
