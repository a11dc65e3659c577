/**
 * Phase labels.
 *
 * Labels are display-only: the workflow is driven by phase numbers, and a
 * label never affects a transition.
 *
 * @packageDocumentation
 */

import { COMPLETED_PHASE, FIRST_PHASE, LAST_PHASE } from './types.js';

/**
 * Label shown once every phase has been approved.
 */
export const COMPLETED_PHASE_NAME = 'Workflow complete';

/**
 * Phase number to display label.
 */
export type PhaseNames = ReadonlyMap<number, string>;

/**
 * Builds the label lookup, falling back to `Phase <n>` for any phase without
 * an explicit name.
 *
 * @param overrides - Configured labels keyed by phase number.
 * @returns A complete lookup for phases 0..13.
 */
export function createPhaseNames(overrides: Readonly<Record<string, string>> = {}): PhaseNames {
  const names = new Map<number, string>();
  for (let phase = FIRST_PHASE; phase <= LAST_PHASE; phase++) {
    names.set(phase, overrides[String(phase)] ?? `Phase ${String(phase)}`);
  }
  return names;
}

/**
 * Resolves the display label for a phase number.
 *
 * @param names - Label lookup.
 * @param phase - Phase number, possibly {@link COMPLETED_PHASE}.
 */
export function getPhaseName(names: PhaseNames, phase: number): string {
  if (phase >= COMPLETED_PHASE) {
    return COMPLETED_PHASE_NAME;
  }
  return names.get(phase) ?? `Phase ${String(phase)}`;
}
