/**
 * Text buffer for the Quire text editor.
 * Holds one string and performs position-addressed inserts and deletes.
 */

import type { TextBuffer } from '../../types/buffer.ts';
import type { CharLength, CharOffset } from '../../types/branded.ts';
import { charOffset, clampCharLength, isValidLength, isValidOffset } from '../../types/branded.ts';
import type { EditorEventEmitter } from '../features/events.ts';
import { createBufferDeleteEvent, createBufferInsertEvent } from '../features/events.ts';
import { PositionRangeError } from './errors.ts';

/**
 * Fail unless `position` is an integer in [0, total].
 */
function assertPosition(position: number, total: number): void {
  if (!isValidOffset(position) || position > total) {
    throw new PositionRangeError(
      `Position ${position} is outside the buffer (length ${total})`,
      position,
      total
    );
  }
}

/**
 * Factory function to create a TextBuffer.
 *
 * @param initial - Initial content
 * @param events - Optional emitter notified after every insert and delete
 */
export function createTextBuffer(
  initial: string = '',
  events?: EditorEventEmitter
): TextBuffer {
  let content = initial;

  function insert(text: string, position?: CharOffset): void {
    const at = position ?? charOffset(content.length);
    assertPosition(at, content.length);

    content = content.slice(0, at) + text + content.slice(at);
    events?.emit('buffer-insert', createBufferInsertEvent(text, at, content));
  }

  function remove(position: CharOffset, length: CharLength): string {
    assertPosition(position, content.length);
    if (!isValidLength(length)) {
      throw new PositionRangeError(
        `Length ${length} must be a non-negative integer`,
        position,
        content.length
      );
    }

    const end = position + clampCharLength(position, length, content.length);
    const deleted = content.slice(position, end);
    content = content.slice(0, position) + content.slice(end);
    events?.emit('buffer-delete', createBufferDeleteEvent(deleted, position, content));
    return deleted;
  }

  function getText(): string {
    return content;
  }

  return {
    get length() { return content.length; },
    insert,
    delete: remove,
    getText,
  };
}
