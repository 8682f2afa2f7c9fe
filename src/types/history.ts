/**
 * CommandHistory interface for the Quire text editor.
 * The history is the invoker: it runs commands and remembers them.
 */

import type { Command } from './commands.ts';

/**
 * Invoker that executes commands and tracks them for undo.
 *
 * Two sequences are kept: the log, a permanent record of every executed
 * command, and the undo stack, which only holds commands not yet undone.
 * There is no redo.
 */
export interface CommandHistory {
  /** Every executed command, in execution order */
  readonly log: readonly Command[];
  /** Executed, not-yet-undone commands; the last entry is undone first */
  readonly undoStack: readonly Command[];

  /**
   * Apply a command and record it in the log and on the undo stack.
   * Nothing is recorded if apply() throws.
   */
  executeCommand(command: Command): void;

  /**
   * Execute commands one by one, in order.
   * Not atomic: if one throws, the commands before it stay executed and recorded.
   */
  executeBatch(commands: readonly Command[]): void;

  /**
   * Revert the most recently executed command that has not been undone.
   * @returns The reverted command, or null when there was nothing to undo
   */
  undo(): Command | null;

  /**
   * List the log as `1. Insert`, `2. Replace`, ...
   */
  showHistory(): string[];
}
