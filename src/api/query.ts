/**
 * Query namespace — read-only selectors over a buffer, a command or a history.
 * None of these mutate state or emit events.
 */

import type { TextBuffer } from '../types/buffer.ts';
import { describeCommand } from '../editor/core/commands.ts';
import {
  canUndo,
  getLogLength,
  getUndoCount,
  isHistoryEmpty,
} from '../editor/features/history.ts';

function getText(buffer: TextBuffer): string {
  return buffer.getText();
}

function getLength(buffer: TextBuffer): number {
  return buffer.length;
}

export const query = {
  /** @complexity O(1) — current buffer string */
  getText,
  /** @complexity O(1) — cached string length */
  getLength,
  /** @complexity O(1) — undo stack length check */
  canUndo,
  /** @complexity O(1) — undo stack length */
  getUndoCount,
  /** @complexity O(1) — log length */
  getLogLength,
  /** @complexity O(1) — log length check */
  isHistoryEmpty,
  /** @complexity O(text length) — formats the command's parameters */
  describeCommand,
} as const;
