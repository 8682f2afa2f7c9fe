/**
 * Command types for the Quire text editor.
 * Every edit is a reversible command bound to the buffer it operates on.
 * The variant set is closed: Insert, Delete, and the Replace macro.
 */

import type { TextBuffer } from './buffer.ts';
import type { CharLength, CharOffset } from './branded.ts';

// =============================================================================
// Shared Capability
// =============================================================================

/**
 * Display names used by history listings and narration.
 */
export type CommandName = 'Insert' | 'Delete' | 'Replace';

/**
 * Capability shared by every command variant.
 */
export interface ReversibleCommand {
  /** Display name of the variant */
  readonly name: CommandName;
  /** The receiver this command mutates (not owned) */
  readonly buffer: TextBuffer;
  /** True between a successful apply() and the next revert() */
  readonly applied: boolean;

  /** Perform the forward edit against the bound buffer. */
  apply(): void;

  /**
   * Undo the forward edit.
   * @throws {CommandStateError} If the command is not currently applied
   */
  revert(): void;
}

// =============================================================================
// Command Variants
// =============================================================================

/**
 * Insert text at a position.
 */
export interface InsertCommand extends ReversibleCommand {
  readonly kind: 'insert';
  readonly name: 'Insert';
  readonly text: string;
  /** Insert position, fixed when the command is constructed */
  readonly position: CharOffset;
}

/**
 * Delete a run of characters.
 */
export interface DeleteCommand extends ReversibleCommand {
  readonly kind: 'delete';
  readonly name: 'Delete';
  readonly position: CharOffset;
  /** Requested length; the buffer may remove fewer at the end of the text */
  readonly length: CharLength;
  /** Text removed by the last apply(), undefined until then */
  readonly deletedText: string | undefined;
}

/**
 * Replace a run of characters: a macro of Delete then Insert at one position.
 */
export interface ReplaceCommand extends ReversibleCommand {
  readonly kind: 'replace';
  readonly name: 'Replace';
  readonly deleteCommand: DeleteCommand;
  readonly insertCommand: InsertCommand;
}

// =============================================================================
// Union Type
// =============================================================================

/**
 * All command variants.
 */
export type Command = InsertCommand | DeleteCommand | ReplaceCommand;

/**
 * Extract the kind string from a command.
 */
export type CommandKind = Command['kind'];

// =============================================================================
// Edit Specs
// =============================================================================

/**
 * Plain description of an insert, turned into a command by the session.
 */
export interface InsertEdit {
  readonly kind: 'insert';
  readonly text: string;
  /** Defaults to the buffer length when the command is constructed */
  readonly position?: number;
}

/**
 * Plain description of a delete.
 */
export interface DeleteEdit {
  readonly kind: 'delete';
  readonly position: number;
  readonly length: number;
}

/**
 * Plain description of a replace.
 */
export interface ReplaceEdit {
  readonly kind: 'replace';
  readonly position: number;
  readonly length: number;
  readonly text: string;
}

/**
 * Serializable edit description, one per command kind.
 */
export type EditSpec = InsertEdit | DeleteEdit | ReplaceEdit;

/**
 * Result of edit spec validation.
 */
export interface EditValidationResult {
  readonly valid: boolean;
  readonly errors: readonly string[];
}

// =============================================================================
// Type Guards
// =============================================================================

const COMMAND_KINDS: ReadonlySet<string> = new Set(['insert', 'delete', 'replace']);

/**
 * Check if a value is one of the command kinds.
 */
export function isCommandKind(value: unknown): value is CommandKind {
  return typeof value === 'string' && COMMAND_KINDS.has(value);
}

/**
 * Check if a command is a composite of sub-commands.
 */
export function isMacroCommand(command: Command): command is ReplaceCommand {
  return command.kind === 'replace';
}

/**
 * Validate an edit spec with detailed error messages.
 * Optionally checks positions against the buffer length.
 *
 * @example
 * ```typescript
 * const result = validateEditSpec({ kind: 'delete', position: 3, length: 2 }, 4);
 * if (!result.valid) {
 *   console.error('Invalid edit:', result.errors);
 * }
 * ```
 */
export function validateEditSpec(
  value: unknown,
  bufferLength?: number
): EditValidationResult {
  const errors: string[] = [];

  if (typeof value !== 'object' || value === null) {
    errors.push('Edit must be a non-null object');
    return { valid: false, errors };
  }

  const kind = 'kind' in value ? value.kind : undefined;
  if (!isCommandKind(kind)) {
    errors.push(`Unknown edit kind: "${String(kind)}"`);
    return { valid: false, errors };
  }

  const label = kind.toUpperCase();
  const position = 'position' in value ? value.position : undefined;
  const length = 'length' in value ? value.length : undefined;
  const text = 'text' in value ? value.text : undefined;

  // Insert may omit its position; the others may not.
  if (position !== undefined || kind !== 'insert') {
    if (typeof position !== 'number' || !Number.isInteger(position)) {
      errors.push(`${label} edit requires an integer "position" property`);
    } else if (position < 0) {
      errors.push(`${label} position cannot be negative: ${position}`);
    } else if (bufferLength !== undefined && position > bufferLength) {
      errors.push(`${label} position ${position} exceeds buffer length ${bufferLength}`);
    }
  }

  if (kind !== 'insert') {
    if (typeof length !== 'number' || !Number.isInteger(length)) {
      errors.push(`${label} edit requires an integer "length" property`);
    } else if (length < 0) {
      errors.push(`${label} length cannot be negative: ${length}`);
    }
  }

  if (kind !== 'delete' && typeof text !== 'string') {
    errors.push(`${label} edit requires a string "text" property`);
  }

  return { valid: errors.length === 0, errors };
}
