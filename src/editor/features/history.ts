/**
 * Command history for the Quire text editor.
 * Executes commands, keeps the permanent log, and undoes from a LIFO stack.
 */

import type { Command } from '../../types/commands.ts';
import type { CommandHistory } from '../../types/history.ts';
import { CommandStateError } from '../core/errors.ts';
import type { EditorEventEmitter } from './events.ts';
import {
  createBatchStartEvent,
  createHistoryListingEvent,
  createUndoEmptyEvent,
} from './events.ts';

/**
 * Options for creating a command history.
 */
export interface CommandHistoryOptions {
  /** Emitter notified of batches, empty undos and history listings */
  readonly events?: EditorEventEmitter;
}

/**
 * Factory function to create a CommandHistory.
 * Uses closure-based encapsulation; the exposed sequences are read-only views.
 */
export function createCommandHistory(options: CommandHistoryOptions = {}): CommandHistory {
  const { events } = options;
  const log: Command[] = [];
  const undoStack: Command[] = [];

  function executeCommand(command: Command): void {
    if (command.applied) {
      throw new CommandStateError(
        command.kind,
        `Cannot execute ${command.name} command: it is already applied`
      );
    }
    command.apply();
    log.push(command);
    undoStack.push(command);
  }

  function executeBatch(commands: readonly Command[]): void {
    events?.emit('batch-start', createBatchStartEvent(commands.length));
    for (const command of commands) {
      executeCommand(command);
    }
  }

  // The entry leaves the stack only once revert succeeds.
  function undo(): Command | null {
    const command = undoStack.at(-1);
    if (!command) {
      events?.emit('undo-empty', createUndoEmptyEvent());
      return null;
    }
    command.revert();
    undoStack.pop();
    return command;
  }

  function showHistory(): string[] {
    const lines = log.map((command, index) => `${index + 1}. ${command.name}`);
    events?.emit('history-listing', createHistoryListingEvent(lines));
    return lines;
  }

  return {
    get log(): readonly Command[] { return log; },
    get undoStack(): readonly Command[] { return undoStack; },
    executeCommand,
    executeBatch,
    undo,
    showHistory,
  };
}

// =============================================================================
// History Helpers
// =============================================================================

/**
 * Check if undo is available.
 * @returns true if there are entries in the undo stack
 */
export function canUndo(history: CommandHistory): boolean {
  return history.undoStack.length > 0;
}

/**
 * Get the number of available undo steps.
 */
export function getUndoCount(history: CommandHistory): number {
  return history.undoStack.length;
}

/**
 * Get the number of commands ever executed.
 */
export function getLogLength(history: CommandHistory): number {
  return history.log.length;
}

/**
 * Check if nothing has been executed yet.
 */
export function isHistoryEmpty(history: CommandHistory): boolean {
  return history.log.length === 0;
}
