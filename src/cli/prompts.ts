/**
 * Interactive operator for the gated workflow.
 *
 * Renders each gate to the terminal and reads a y/n confirmation followed
 * by an optional comment. Input and output are abstracted so tests can
 * drive the operator with scripted answers.
 *
 * @packageDocumentation
 */

import type { GateDecision, GatePrompt, TransitionResult } from '../workflow/gate.js';
import type { Operator } from '../workflow/loop.js';

/**
 * Formatted text styles for CLI output.
 */
export const CLI_STYLES = {
  /** Bold text marker. */
  BOLD: '\x1b[1m',
  /** Reset formatting. */
  RESET: '\x1b[0m',
  /** Dim/gray text. */
  DIM: '\x1b[2m',
  /** Green text for success. */
  GREEN: '\x1b[32m',
  /** Yellow text for warnings. */
  YELLOW: '\x1b[33m',
  /** Cyan text for info. */
  CYAN: '\x1b[36m',
} as const;

export const CONFIRM_PROMPT = 'Confirm completion (y/n)? ';
export const COMMENT_PROMPT = 'Optional comment: ';

/**
 * Interface for reading user input.
 * Abstracted for testability.
 */
export interface InputReader {
  /** Read a line of input. Resolves with '' once input has ended. */
  readLine(prompt: string): Promise<string>;
  /** Close the reader. */
  close(): void;
}

/**
 * Interface for writing output.
 * Abstracted for testability.
 */
export interface OutputWriter {
  /** Write a line of text. */
  writeLine(text: string): void;
  /** Write text without newline. */
  write(text: string): void;
}

/**
 * Default output writer using process.stdout.
 */
export const defaultOutputWriter: OutputWriter = {
  writeLine(text: string): void {
    process.stdout.write(text + '\n');
  },
  write(text: string): void {
    process.stdout.write(text);
  },
};

/**
 * Formats a section header for CLI display.
 *
 * @param title - The section title.
 * @returns Formatted header string.
 */
export function formatSectionHeader(title: string): string {
  const line = '═'.repeat(Math.max(title.length, 40));
  return `\n${CLI_STYLES.BOLD}${CLI_STYLES.CYAN}${line}${CLI_STYLES.RESET}\n${CLI_STYLES.BOLD}${title}${CLI_STYLES.RESET}\n${CLI_STYLES.CYAN}${line}${CLI_STYLES.RESET}\n`;
}

export function formatSuccess(message: string): string {
  return `${CLI_STYLES.GREEN}✓ ${message}${CLI_STYLES.RESET}`;
}

export function formatWarning(message: string): string {
  return `${CLI_STYLES.YELLOW}⚠ ${message}${CLI_STYLES.RESET}`;
}

/**
 * Renders a gate: phase number and name as a header, then agent and
 * instructions.
 */
export function formatGate(prompt: GatePrompt): string {
  const lines = [
    formatSectionHeader(`Phase ${String(prompt.phase)}: ${prompt.phaseName}`),
    `${CLI_STYLES.BOLD}Agent:${CLI_STYLES.RESET} ${prompt.agent}`,
    `${CLI_STYLES.DIM}${prompt.instructions}${CLI_STYLES.RESET}`,
  ];
  return lines.join('\n');
}

/**
 * One-line summary of a committed transition.
 */
export function formatTransition(result: TransitionResult): string {
  switch (result.kind) {
    case 'approved':
      return formatSuccess(`Phase ${String(result.phase)} approved.`);
    case 'paused':
      return formatWarning(`Phase ${String(result.phase)} paused.`);
    case 'completed':
      return formatSuccess('All phases approved. Workflow complete.');
  }
}

/**
 * Whether a confirmation answer approves the gate: "y" or "yes", any case.
 */
export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}

/**
 * Operator that asks on a terminal.
 *
 * @example
 * ```typescript
 * const reader = await createReadlineReader();
 * const operator = new PromptOperator(reader, defaultOutputWriter);
 * ```
 */
export class PromptOperator implements Operator {
  private readonly reader: InputReader;
  private readonly writer: OutputWriter;

  constructor(reader: InputReader, writer: OutputWriter) {
    this.reader = reader;
    this.writer = writer;
  }

  async confirm(prompt: GatePrompt): Promise<GateDecision> {
    this.writer.writeLine(formatGate(prompt));

    const answer = await this.reader.readLine(CONFIRM_PROMPT);
    if (!isAffirmative(answer)) {
      return { approved: false };
    }

    const comment = await this.reader.readLine(COMMENT_PROMPT);
    return { approved: true, comment };
  }

  notify(result: TransitionResult): void {
    this.writer.writeLine(formatTransition(result));
  }
}

/**
 * Creates an InputReader backed by node:readline.
 *
 * Lines are queued as they arrive, so answers piped in ahead of their
 * prompts are served in order. Once input has ended and the queue is empty,
 * reads resolve with '', which the operator treats as a decline.
 */
export async function createReadlineReader(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Promise<InputReader> {
  // Use dynamic import to avoid issues in test environments
  const readline = await import('node:readline');

  const rl = readline.createInterface({ input, output });

  const lines: string[] = [];
  const waiting: ((line: string) => void)[] = [];
  let closed = false;

  rl.on('line', (line) => {
    const next = waiting.shift();
    if (next === undefined) {
      lines.push(line);
    } else {
      next(line);
    }
  });

  rl.on('close', () => {
    closed = true;
    for (const next of waiting.splice(0)) {
      next('');
    }
  });

  return {
    readLine(prompt: string): Promise<string> {
      if (closed) {
        output.write(prompt);
      } else {
        rl.setPrompt(prompt);
        rl.prompt();
      }
      const queued = lines.shift();
      if (queued !== undefined) {
        return Promise.resolve(queued);
      }
      if (closed) {
        return Promise.resolve('');
      }
      return new Promise((resolve) => {
        waiting.push(resolve);
      });
    },
    close(): void {
      rl.close();
    },
  };
}
