/**
 * EditorSession interface for the Quire text editor.
 * A session is the facade over the buffer, the commands, the history and the narration.
 */

import type { TextBuffer } from './buffer.ts';
import type { Command, EditSpec } from './commands.ts';
import type { CommandHistory } from './history.ts';
import type { EditorEventEmitter } from '../editor/features/events.ts';

/**
 * Sink for narration lines.
 */
export type LineWriter = (line: string) => void;

/**
 * Configuration options for creating an editor session.
 */
export interface EditorSessionConfig {
  /** Initial buffer content (default: '') */
  content: string;
  /** Whether to narrate every step through `write` (default: true) */
  narrate: boolean;
  /** Where narration and show() lines go (default: console.log) */
  write: LineWriter;
}

/**
 * One editing session: a buffer, its history and its event stream.
 * The verbs build the matching command and run it through the history.
 */
export interface EditorSession {
  readonly buffer: TextBuffer;
  readonly history: CommandHistory;
  readonly events: EditorEventEmitter;

  /**
   * Insert text (default position: end of the buffer).
   * @returns The executed command
   */
  insert(text: string, position?: number): Command;

  /**
   * Delete `length` characters at `position`.
   * @returns The executed command
   */
  delete(position: number, length: number): Command;

  /**
   * Replace `length` characters at `position` with `text`.
   * @returns The executed command
   */
  replace(position: number, length: number, text: string): Command;

  /**
   * Build a command for every edit, then execute them as one batch.
   * All commands are built before the first runs, so default insert
   * positions all refer to the buffer length before the batch.
   * @throws {EditSpecError} If any edit is malformed; nothing is executed then
   * @returns The executed commands
   */
  batch(edits: readonly EditSpec[]): Command[];

  /**
   * Undo the most recent command.
   * @returns The reverted command, or null when there was nothing to undo
   */
  undo(): Command | null;

  /**
   * The numbered command log, e.g. `1. Insert`.
   */
  listHistory(): string[];

  /**
   * Write the current text through the line sink.
   * @returns The current text
   */
  show(): string;

  /**
   * Get the current text.
   */
  getText(): string;

  /**
   * Detach narration and drop every event listener.
   */
  dispose(): void;
}
