/**
 * TextBuffer interface for the Quire text editor.
 * The buffer is the receiver: it holds the text and does the real work.
 */

import type { CharLength, CharOffset } from './branded.ts';

/**
 * A single mutable string addressed by character offsets.
 */
export interface TextBuffer {
  /** Current number of characters */
  readonly length: number;

  /**
   * Insert text at a position.
   * @param text - Text to insert
   * @param position - Insert position (default: end of the buffer)
   * @throws {PositionRangeError} If position is not an integer in [0, length]
   */
  insert(text: string, position?: CharOffset): void;

  /**
   * Remove characters starting at a position.
   * A length running past the end is clamped to the available characters.
   * @param position - Start of the removed run
   * @param length - Number of characters to remove
   * @returns The removed text
   * @throws {PositionRangeError} If position is out of range or length is negative
   */
  delete(position: CharOffset, length: CharLength): string;

  /**
   * Get the current content.
   */
  getText(): string;
}
