import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { COMPLETED_PHASE_NAME, createPhaseNames, getPhaseName } from './phases.js';
import { isAwaitingCompletion, isGatedPhase, isWorkflowStatus } from './types.js';

describe('phase labels', () => {
  it('should default every gated phase to a generic label', () => {
    const names = createPhaseNames();

    expect(names.size).toBe(14);
    expect(getPhaseName(names, 0)).toBe('Phase 0');
    expect(getPhaseName(names, 13)).toBe('Phase 13');
  });

  it('should apply overrides and keep the rest generic', () => {
    const names = createPhaseNames({ '2': 'Finance review' });

    expect(getPhaseName(names, 2)).toBe('Finance review');
    expect(getPhaseName(names, 3)).toBe('Phase 3');
  });

  it('should label the completed position', () => {
    expect(getPhaseName(createPhaseNames({ '13': 'Release' }), 14)).toBe(COMPLETED_PHASE_NAME);
  });
});

describe('workflow type guards', () => {
  it('should recognize exactly phases 0..13 as gated', () => {
    fc.assert(
      fc.property(fc.integer({ min: -50, max: 50 }), (phase) => {
        expect(isGatedPhase(phase)).toBe(phase >= 0 && phase <= 13);
      })
    );
    expect(isGatedPhase(2.5)).toBe(false);
  });

  it('should recognize statuses', () => {
    expect(isWorkflowStatus('paused')).toBe(true);
    expect(isWorkflowStatus('halted')).toBe(false);
    expect(isWorkflowStatus(1)).toBe(false);
  });

  it('should detect a completion that was not recorded', () => {
    const base = { next_phase: 15, phase_name: 'Workflow complete', last_action: '' };

    expect(isAwaitingCompletion({ ...base, current_phase: 14, status: 'in_progress' })).toBe(true);
    expect(isAwaitingCompletion({ ...base, current_phase: 14, status: 'completed' })).toBe(false);
    expect(
      isAwaitingCompletion({ ...base, current_phase: 13, next_phase: 14, status: 'in_progress' })
    ).toBe(false);
  });
});
