/**
 * Branded types for type-safe position handling.
 *
 * Branded types (also called "opaque types" or "nominal types") prevent
 * accidentally mixing up different kinds of numeric values. Every command
 * carries both a position and a length, and swapping the two is an easy
 * mistake when the constructor takes `(position, length)`.
 *
 * Usage:
 * ```typescript
 * const at = charOffset(5);
 * const size = charLength(3);
 *
 * // Type error: can't pass a CharLength where a CharOffset is expected
 * buffer.delete(size, at);
 * ```
 */

// =============================================================================
// Brand Symbol
// =============================================================================

/**
 * Unique symbol used for branding types.
 * This symbol is never used at runtime - it only exists for the type system.
 */
declare const brand: unique symbol;

/**
 * Generic brand interface.
 * The brand is a phantom type that only exists in the type system.
 */
interface Brand<B> {
  readonly [brand]: B;
}

/**
 * Create a branded type from a base type.
 * The brand only exists at compile time - no runtime overhead.
 */
type Branded<T, B> = T & Brand<B>;

// =============================================================================
// Position Types
// =============================================================================

/**
 * Character offset in the buffer.
 * Represents a position in terms of UTF-16 code units (JavaScript's string indexing).
 */
export type CharOffset = Branded<number, 'CharOffset'>;

/**
 * Character length (count of UTF-16 code units).
 *
 * Semantically distinct from CharOffset: an offset is a position,
 * a length is a size/count.
 */
export type CharLength = Branded<number, 'CharLength'>;

// =============================================================================
// Constructor Functions
// =============================================================================

/**
 * Create a CharOffset from a number.
 * Use this for explicit conversions from raw numbers.
 */
export function charOffset(value: number): CharOffset {
  return value as CharOffset;
}

/**
 * Create a CharLength from a number.
 * Use this for explicit conversions from raw numbers.
 */
export function charLength(value: number): CharLength {
  return value as CharLength;
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if a value is a valid offset (non-negative integer).
 */
export function isValidOffset(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/**
 * Check if a value is a valid length (non-negative integer).
 */
export function isValidLength(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

// =============================================================================
// Arithmetic Helpers
// =============================================================================

/**
 * Length of a string as a CharLength.
 */
export function lengthOf(text: string): CharLength {
  return charLength(text.length);
}

/**
 * Clamp a CharLength so that `offset + length` does not run past `total`.
 */
export function clampCharLength(
  offset: CharOffset,
  length: CharLength,
  total: number
): CharLength {
  return charLength(Math.max(0, Math.min(length, total - offset)));
}

// =============================================================================
// Zero Constants
// =============================================================================

/**
 * Zero char offset - the start of the buffer.
 */
export const ZERO_CHAR_OFFSET: CharOffset = charOffset(0);

/**
 * Zero char length.
 */
export const ZERO_CHAR_LENGTH: CharLength = charLength(0);
