import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import {
  ENV_VARIABLES,
  EnvCoercionError,
  applyEnvOverrides,
  formatEnvHelp,
  parseEnvBoolean,
} from './env.js';
import { DEFAULT_CONFIG, parseConfig } from './index.js';

describe('Environment Variable Overrides', () => {
  describe('applyEnvOverrides', () => {
    it('should override every path', () => {
      const config = applyEnvOverrides(DEFAULT_CONFIG, {
        PHASEGATE_PATHS_STATE: '/custom/state.json',
        PHASEGATE_PATHS_AUDIT_LOG: '/custom/audit.json',
        PHASEGATE_PATHS_AGENT_MAP: '/custom/agents.json',
      });

      expect(config.paths).toEqual({
        state: '/custom/state.json',
        audit_log: '/custom/audit.json',
        agent_map: '/custom/agents.json',
      });
    });

    it('should override values from the config file and keep the rest', () => {
      const fileConfig = parseConfig(
        '[paths]\nstate = "file.json"\n\n[logging]\ndebug = true\n\n[phases.names]\n0 = "Intake"\n'
      );
      const config = applyEnvOverrides(fileConfig, {
        PHASEGATE_PATHS_STATE: 'env.json',
        PHASEGATE_LOGGING_DEBUG: 'false',
      });

      expect(config.paths.state).toBe('env.json');
      expect(config.paths.audit_log).toBe(DEFAULT_CONFIG.paths.audit_log);
      expect(config.logging.debug).toBe(false);
      expect(config.phases.names).toEqual({ '0': 'Intake' });
    });

    it('should read PHASEGATE_DEBUG as a shortcut for logging.debug', () => {
      expect(applyEnvOverrides(DEFAULT_CONFIG, { PHASEGATE_DEBUG: 'yes' }).logging.debug).toBe(true);
    });

    it('should let PHASEGATE_LOGGING_DEBUG win over the shortcut', () => {
      const config = applyEnvOverrides(DEFAULT_CONFIG, {
        PHASEGATE_DEBUG: 'true',
        PHASEGATE_LOGGING_DEBUG: 'off',
      });

      expect(config.logging.debug).toBe(false);
    });

    it('should skip unset and empty variables', () => {
      expect(applyEnvOverrides(DEFAULT_CONFIG, { PHASEGATE_PATHS_STATE: '', OTHER: 'value' })).toEqual(
        DEFAULT_CONFIG
      );
    });

    it('should not mutate the base config', () => {
      const base = parseConfig('[paths]\nstate = "file.json"\n');
      applyEnvOverrides(base, { PHASEGATE_PATHS_STATE: 'env.json', PHASEGATE_DEBUG: '1' });

      expect(base.paths.state).toBe('file.json');
      expect(base.logging.debug).toBe(false);
    });

    it('should throw EnvCoercionError for an invalid boolean', () => {
      expect(() => applyEnvOverrides(DEFAULT_CONFIG, { PHASEGATE_LOGGING_DEBUG: 'maybe' })).toThrow(
        EnvCoercionError
      );
    });
  });

  describe('parseEnvBoolean', () => {
    it('should accept every boolean spelling in any case', () => {
      fc.assert(
        fc.property(
          fc.constantFrom('true', '1', 'yes', 'on', 'false', '0', 'no', 'off'),
          fc.boolean(),
          (word, upper) => {
            const raw = upper ? ` ${word.toUpperCase()} ` : word;
            expect(parseEnvBoolean('PHASEGATE_DEBUG', raw)).toBe(
              ['true', '1', 'yes', 'on'].includes(word)
            );
          }
        )
      );
    });

    it('should report the variable and raw value', () => {
      try {
        parseEnvBoolean('PHASEGATE_LOGGING_DEBUG', 'maybe');
        expect.unreachable('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(EnvCoercionError);
        if (error instanceof EnvCoercionError) {
          expect(error.envVar).toBe('PHASEGATE_LOGGING_DEBUG');
          expect(error.rawValue).toBe('maybe');
          expect(error.message).toBe(
            "Cannot coerce 'PHASEGATE_LOGGING_DEBUG' value 'maybe' to boolean. Expected one of: true, 1, yes, on, false, 0, no, off"
          );
        }
      }
    });
  });

  describe('formatEnvHelp', () => {
    it('should list every variable with aligned descriptions', () => {
      const lines = formatEnvHelp().split('\n');

      expect(lines).toHaveLength(ENV_VARIABLES.length);
      expect(lines[0]).toBe('  PHASEGATE_PATHS_STATE      Workflow state file');
      expect(lines[3]).toBe('  PHASEGATE_DEBUG            Shortcut for PHASEGATE_LOGGING_DEBUG');
    });
  });
});
