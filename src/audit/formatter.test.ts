import { describe, expect, it } from 'vitest';
import { escapeCsvField, formatAuditTrail, formatAuditTrailCsv } from './formatter.js';
import type { AuditEntry } from './types.js';

const entries: AuditEntry[] = [
  {
    timestamp: '2024-03-01T09:00:00.000Z',
    agent: 'Planner',
    phase: 3,
    action: 'approved',
    comment: 'Phase approved.',
  },
  {
    timestamp: '2024-03-01T09:05:00.000Z',
    agent: 'Finance',
    phase: 4,
    action: 'paused',
    comment: 'User chose to pause.',
  },
  {
    timestamp: '2024-03-02T10:00:00.000Z',
    agent: 'Orchestrator',
    phase: 13,
    action: 'completed',
    comment: 'Workflow finished.',
  },
];

describe('formatAuditTrail', () => {
  it('should say when the trail is empty', () => {
    expect(formatAuditTrail([])).toBe('Audit trail is empty.');
  });

  it('should list one aligned line per entry', () => {
    expect(formatAuditTrail(entries)).toBe(
      [
        'Audit Trail (3 entries)',
        '=======================',
        '2024-03-01T09:00:00.000Z  phase  3  approved   Planner: Phase approved.',
        '2024-03-01T09:05:00.000Z  phase  4  paused     Finance: User chose to pause.',
        '2024-03-02T10:00:00.000Z  phase 13  completed  Orchestrator: Workflow finished.',
      ].join('\n')
    );
  });

  it('should use the singular for one entry', () => {
    expect(formatAuditTrail(entries.slice(0, 1)).split('\n').slice(0, 2)).toEqual([
      'Audit Trail (1 entry)',
      '=====================',
    ]);
  });
});

describe('escapeCsvField', () => {
  it('should leave plain text alone', () => {
    expect(escapeCsvField('Phase approved.')).toBe('Phase approved.');
  });

  it('should quote delimiters, quotes and line breaks', () => {
    expect(escapeCsvField('a,b')).toBe('"a,b"');
    expect(escapeCsvField('say "yes"')).toBe('"say ""yes"""');
    expect(escapeCsvField('line\nbreak')).toBe('"line\nbreak"');
  });
});

describe('formatAuditTrailCsv', () => {
  it('should write a header and one row per entry', () => {
    expect(formatAuditTrailCsv(entries)).toBe(
      'timestamp,agent,phase,action,comment\n' +
        '2024-03-01T09:00:00.000Z,Planner,3,approved,Phase approved.\n' +
        '2024-03-01T09:05:00.000Z,Finance,4,paused,User chose to pause.\n' +
        '2024-03-02T10:00:00.000Z,Orchestrator,13,completed,Workflow finished.\n'
    );
  });

  it('should write only the header for an empty trail', () => {
    expect(formatAuditTrailCsv([])).toBe('timestamp,agent,phase,action,comment\n');
  });

  it('should escape comments that contain commas', () => {
    const [first] = entries;
    const rows = formatAuditTrailCsv(first === undefined ? [] : [{ ...first, comment: 'ok, ship' }]);
    expect(rows.split('\n')[1]).toBe('2024-03-01T09:00:00.000Z,Planner,3,approved,"ok, ship"');
  });
});
