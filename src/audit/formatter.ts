/**
 * Audit trail renderers for external review: a plain-text listing for the
 * terminal and CSV for spreadsheets.
 *
 * @packageDocumentation
 */

import type { AuditEntry } from './types.js';

/**
 * Column order used by {@link formatAuditTrailCsv}.
 */
export const AUDIT_CSV_COLUMNS = ['timestamp', 'agent', 'phase', 'action', 'comment'] as const;

const ACTION_WIDTH = 'completed'.length;

/**
 * Renders the trail as one line per entry under a header.
 *
 * @param entries - Entries in chronological order.
 * @returns Text listing, or a placeholder line when the trail is empty.
 *
 * @example
 * ```typescript
 * formatAuditTrail([entry]);
 * // Audit Trail (1 entry)
 * // =====================
 * // 2024-01-15T10:30:00.000Z  phase  3  approved   Planner: Phase approved.
 * ```
 */
export function formatAuditTrail(entries: readonly AuditEntry[]): string {
  if (entries.length === 0) {
    return 'Audit trail is empty.';
  }

  const title = `Audit Trail (${String(entries.length)} ${entries.length === 1 ? 'entry' : 'entries'})`;
  const lines = [title, '='.repeat(title.length)];

  for (const entry of entries) {
    const phase = String(entry.phase).padStart(2, ' ');
    const action = entry.action.padEnd(ACTION_WIDTH, ' ');
    lines.push(`${entry.timestamp}  phase ${phase}  ${action}  ${entry.agent}: ${entry.comment}`);
  }

  return lines.join('\n');
}

/**
 * Quotes a CSV field when it contains a delimiter, quote or line break.
 *
 * @param value - Raw field text.
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Renders the trail as CSV with a header row, one line per entry.
 *
 * @param entries - Entries in chronological order.
 */
export function formatAuditTrailCsv(entries: readonly AuditEntry[]): string {
  const rows = [AUDIT_CSV_COLUMNS.join(',')];

  for (const entry of entries) {
    rows.push(
      [entry.timestamp, entry.agent, String(entry.phase), entry.action, entry.comment]
        .map(escapeCsvField)
        .join(',')
    );
  }

  return rows.join('\n') + '\n';
}
