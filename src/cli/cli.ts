/**
 * Command implementations for the phasegate CLI.
 *
 * - run: walk the gated workflow interactively
 * - status: read-only view of the persisted state
 * - history: print the audit trail
 *
 * @packageDocumentation
 */

import path from 'node:path';
import { loadPhaseAgentMap, resolveAgent } from '../agents/phase-agent-map.js';
import { formatAuditTrail, formatAuditTrailCsv } from '../audit/formatter.js';
import { FileAuditTrail, serializeAuditTrail } from '../audit/trail.js';
import type { AuditEntry } from '../audit/types.js';
import { loadConfig } from '../config/loader.js';
import { formatEnvHelp, type EnvRecord } from '../config/env.js';
import type { Config } from '../config/types.js';
import { Logger, type LogSink } from '../utils/logger.js';
import { createWorkflow, runWorkflow } from '../workflow/loop.js';
import { FileStateStore } from '../workflow/persistence.js';
import { createPhaseNames } from '../workflow/phases.js';
import { isGatedPhase, type WorkflowState } from '../workflow/types.js';
import {
  PromptOperator,
  createReadlineReader,
  defaultOutputWriter,
  type InputReader,
  type OutputWriter,
} from './prompts.js';

/**
 * CLI command type.
 */
export type CliCommand = 'run' | 'status' | 'history' | 'help';

/**
 * Output formats for the history command.
 */
export type HistoryFormat = 'table' | 'csv' | 'json';

const HISTORY_FORMATS: readonly HistoryFormat[] = ['table', 'csv', 'json'];

/**
 * CLI options parsed from arguments.
 */
export interface CliOptions {
  /** The command to execute. */
  command: CliCommand;
  /** Explicit TOML config file. */
  configPath?: string | undefined;
  /** State file override. */
  statePath?: string | undefined;
  /** Audit log override. */
  auditPath?: string | undefined;
  /** Phase-agent map override. */
  agentMapPath?: string | undefined;
  /** Output format for history. */
  format: HistoryFormat;
  /** Whether to enable debug logging and verbose status output. */
  verbose: boolean;
}

/**
 * Result of CLI command execution.
 */
export interface CliResult {
  /** Whether the command succeeded. */
  success: boolean;
  /** Output message. */
  message: string;
  /** Exit code. */
  exitCode: number;
}

/**
 * Process-level collaborators, injectable for tests.
 */
export interface CliContext {
  /** Directory used for relative paths and the default config file. */
  cwd: string;
  env: EnvRecord;
  /** Receives prompts and command output. */
  writer: OutputWriter;
  /** Receives error messages. */
  errorWriter: OutputWriter;
  /** Opens the operator's input; only the run command calls it. */
  createReader: () => Promise<InputReader>;
  /** Destination for JSON log lines. Defaults to stderr. */
  logSink?: LogSink | undefined;
}

/**
 * Thrown for malformed command lines.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * Help text for the CLI.
 */
const HELP_TEXT = `
phasegate - Human-gated phase workflow

Usage:
  phasegate [command] [options]

Commands:
  run                 Walk the gated workflow interactively (default)
  status              Show the persisted workflow state (read-only)
  history             Print the audit trail
  help                Show this help message

Options:
  --config, -c <path>  TOML config file (default: phasegate.toml, optional)
  --state <path>       State file (overrides config)
  --audit <path>       Audit log file (overrides config)
  --agents <path>      Phase-agent map file (overrides config)
  --format <format>    History format: table, csv or json (default: table)
  --verbose, -v        Enable debug logging and detailed status
  --help, -h           Show this help message

Environment:
${formatEnvHelp()}

Examples:
  phasegate
  phasegate status --verbose
  phasegate history --format csv > audit.csv
  phasegate run --config ./project/phasegate.toml
`;

const COMMANDS: readonly CliCommand[] = ['run', 'status', 'history', 'help'];

function isCliCommand(value: string): value is CliCommand {
  return COMMANDS.some((command) => command === value);
}

function isHistoryFormat(value: string): value is HistoryFormat {
  return HISTORY_FORMATS.some((format) => format === value);
}

/**
 * Parse CLI arguments into options.
 *
 * @param args - Command line arguments (without node and script).
 * @returns Parsed CLI options.
 * @throws CliUsageError for unknown commands or options, and missing values.
 */
export function parseArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = { command: 'run', format: 'table', verbose: false };
  let commandSeen = false;

  const takeValue = (index: number, flag: string): string => {
    const next = args[index + 1];
    if (next === undefined || next.startsWith('-')) {
      throw new CliUsageError(`Option ${flag} requires a value`);
    }
    return next;
  };

  for (let i = 0; i < args.length; i++) {
    // eslint-disable-next-line security/detect-object-injection -- safe: i is bounded numeric loop counter
    const arg = args[i];
    if (arg === undefined) {
      continue;
    }

    switch (arg) {
      case '--help':
      case '-h':
        return { ...options, command: 'help' };
      case '--verbose':
      case '-v':
        options.verbose = true;
        continue;
      case '--config':
      case '-c':
        options.configPath = takeValue(i, arg);
        i++;
        continue;
      case '--state':
        options.statePath = takeValue(i, arg);
        i++;
        continue;
      case '--audit':
        options.auditPath = takeValue(i, arg);
        i++;
        continue;
      case '--agents':
        options.agentMapPath = takeValue(i, arg);
        i++;
        continue;
      case '--format': {
        const format = takeValue(i, arg);
        if (!isHistoryFormat(format)) {
          throw new CliUsageError(
            `Invalid format '${format}': expected one of ${HISTORY_FORMATS.join(', ')}`
          );
        }
        options.format = format;
        i++;
        continue;
      }
    }

    if (arg.startsWith('-')) {
      throw new CliUsageError(`Unknown option '${arg}'`);
    }
    if (commandSeen) {
      throw new CliUsageError(`Unexpected argument '${arg}'`);
    }
    if (!isCliCommand(arg)) {
      throw new CliUsageError(`Unknown command '${arg}'`);
    }
    options.command = arg;
    commandSeen = true;
  }

  return options;
}

/**
 * Loads the configuration and applies command-line path overrides, which
 * resolve against the working directory.
 */
export async function resolveSettings(options: CliOptions, context: CliContext): Promise<Config> {
  const { config } = await loadConfig({
    configPath: options.configPath,
    cwd: context.cwd,
    env: context.env,
  });

  const resolve = (override: string | undefined, fallback: string): string =>
    override === undefined ? fallback : path.resolve(context.cwd, override);

  return {
    ...config,
    paths: {
      state: resolve(options.statePath, config.paths.state),
      audit_log: resolve(options.auditPath, config.paths.audit_log),
      agent_map: resolve(options.agentMapPath, config.paths.agent_map),
    },
    logging: { debug: config.logging.debug || options.verbose },
  };
}

function createLogger(config: Config, context: CliContext): Logger {
  return new Logger({ component: 'Cli', debugMode: config.logging.debug, sink: context.logSink });
}

function failure(error: unknown): CliResult {
  const errorMessage = error instanceof Error ? error.message : String(error);
  return { success: false, message: `Error: ${errorMessage}`, exitCode: 1 };
}

/**
 * Format the workflow state for display.
 */
function formatStatus(
  state: WorkflowState,
  agent: string | undefined,
  config: Config,
  verbose: boolean
): string {
  const lines: string[] = [];

  lines.push('Workflow Status');
  lines.push('===============');
  lines.push(`Phase: ${String(state.current_phase)} (${state.phase_name})`);
  lines.push(`Status: ${state.status}`);
  if (agent !== undefined) {
    lines.push(`Agent: ${agent}`);
  }
  lines.push(`Last action: ${state.last_action === '' ? '(none)' : state.last_action}`);

  if (verbose) {
    lines.push('');
    lines.push(`Next phase: ${String(state.next_phase)}`);
    lines.push(`State file: ${config.paths.state}`);
    lines.push(`Audit log: ${config.paths.audit_log}`);
    lines.push(`Agent map: ${config.paths.agent_map}`);
  }

  return lines.join('\n');
}

/**
 * Execute the run command.
 */
export async function executeRun(options: CliOptions, context: CliContext): Promise<CliResult> {
  try {
    const config = await resolveSettings(options, context);
    const logger = createLogger(config, context);
    const controller = await createWorkflow(config, logger);

    const reader = await context.createReader();
    const outcome = await runWorkflow({
      controller,
      operator: new PromptOperator(reader, context.writer),
      logger,
    }).finally(() => {
      reader.close();
    });

    if (outcome.outcome === 'paused') {
      return {
        success: true,
        message: `Workflow paused at phase ${String(outcome.state.current_phase)}. Run "phasegate run" to resume.`,
        exitCode: 0,
      };
    }

    return {
      success: true,
      message:
        outcome.transitions.length === 0
          ? 'Workflow already completed. Nothing to do.'
          : 'Workflow completed.',
      exitCode: 0,
    };
  } catch (error) {
    return failure(error);
  }
}

/**
 * Execute the status command. Never writes any file.
 */
export async function executeStatus(options: CliOptions, context: CliContext): Promise<CliResult> {
  try {
    const config = await resolveSettings(options, context);
    const logger = createLogger(config, context);
    const store = new FileStateStore({
      filePath: config.paths.state,
      phaseNames: createPhaseNames(config.phases.names),
      logger,
    });
    const state = await store.load();
    const agentMap = await loadPhaseAgentMap(config.paths.agent_map, logger);
    const agent = isGatedPhase(state.current_phase)
      ? resolveAgent(agentMap, state.current_phase)
      : undefined;

    return {
      success: true,
      message: formatStatus(state, agent, config, options.verbose),
      exitCode: 0,
    };
  } catch (error) {
    return failure(error);
  }
}

function renderHistory(entries: readonly AuditEntry[], format: HistoryFormat): string {
  switch (format) {
    case 'table':
      return formatAuditTrail(entries);
    case 'csv':
      return formatAuditTrailCsv(entries).replace(/\n$/, '');
    case 'json':
      return serializeAuditTrail(entries).replace(/\n$/, '');
  }
}

/**
 * Execute the history command.
 */
export async function executeHistory(
  options: CliOptions,
  context: CliContext
): Promise<CliResult> {
  try {
    const config = await resolveSettings(options, context);
    const trail = new FileAuditTrail({
      filePath: config.paths.audit_log,
      logger: createLogger(config, context),
    });
    const entries = await trail.read();

    return { success: true, message: renderHistory(entries, options.format), exitCode: 0 };
  } catch (error) {
    return failure(error);
  }
}

/**
 * Execute the help command.
 */
export function executeHelp(): CliResult {
  return {
    success: true,
    message: HELP_TEXT.trim(),
    exitCode: 0,
  };
}

/**
 * Execute a CLI command.
 */
export async function executeCommand(options: CliOptions, context: CliContext): Promise<CliResult> {
  switch (options.command) {
    case 'run':
      return executeRun(options, context);
    case 'status':
      return executeStatus(options, context);
    case 'history':
      return executeHistory(options, context);
    case 'help':
      return executeHelp();
  }
}

const stderrWriter: OutputWriter = {
  writeLine(text: string): void {
    process.stderr.write(text + '\n');
  },
  write(text: string): void {
    process.stderr.write(text);
  },
};

/**
 * Context bound to the real process.
 */
export function createProcessContext(): CliContext {
  return {
    cwd: process.cwd(),
    env: process.env,
    writer: defaultOutputWriter,
    errorWriter: stderrWriter,
    createReader: createReadlineReader,
  };
}

/**
 * Main CLI entry point.
 *
 * @param args - Command line arguments.
 * @param context - Process collaborators.
 * @returns Exit code.
 */
export async function main(
  args: readonly string[],
  context: CliContext = createProcessContext()
): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (error) {
    if (error instanceof CliUsageError) {
      context.errorWriter.writeLine(`Error: ${error.message}\nRun "phasegate help" for usage.`);
      return 1;
    }
    throw error;
  }

  const result = await executeCommand(options, context);

  if (result.success) {
    context.writer.writeLine(result.message);
  } else {
    context.errorWriter.writeLine(result.message);
  }

  return result.exitCode;
}
