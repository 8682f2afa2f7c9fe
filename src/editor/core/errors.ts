/**
 * Error classes for the Quire text editor.
 */

import type { CommandKind } from '../../types/commands.ts';

/**
 * Thrown when a position or length does not address the buffer.
 */
export class PositionRangeError extends RangeError {
  readonly position: number;
  readonly bufferLength: number;

  constructor(message: string, position: number, bufferLength: number) {
    super(message);
    this.name = 'PositionRangeError';
    this.position = position;
    this.bufferLength = bufferLength;
  }
}

/**
 * Thrown when a command is reverted while it is not applied, or handed
 * to the history while it is still applied.
 * This is a caller bug, not a recoverable condition.
 */
export class CommandStateError extends Error {
  readonly kind: CommandKind;

  constructor(kind: CommandKind, message: string) {
    super(message);
    this.name = 'CommandStateError';
    this.kind = kind;
  }
}

/**
 * Thrown by a session batch when one of its edits is malformed.
 */
export class EditSpecError extends Error {
  /** Index of the offending edit within the batch */
  readonly index: number;
  readonly errors: readonly string[];

  constructor(index: number, errors: readonly string[]) {
    super(`Invalid edit at index ${index}: ${errors.join('; ')}`);
    this.name = 'EditSpecError';
    this.index = index;
    this.errors = errors;
  }
}
