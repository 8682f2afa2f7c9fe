/**
 * Quire - command-pattern text editing with undo, plus a home theater facade
 *
 * Main entry point exporting core types, the editor session, and utilities.
 */

// =============================================================================
// Types
// =============================================================================

export type {
  TextBuffer,
  CommandName,
  ReversibleCommand,
  InsertCommand,
  DeleteCommand,
  ReplaceCommand,
  Command,
  CommandKind,
  InsertEdit,
  DeleteEdit,
  ReplaceEdit,
  EditSpec,
  EditValidationResult,
  CommandHistory,
  LineWriter,
  EditorSessionConfig,
  EditorSession,
} from './types/index.ts';

// Branded position types
export type { CharOffset, CharLength } from './types/index.ts';

export {
  charOffset,
  charLength,
  isValidOffset,
  isValidLength,
  lengthOf,
  clampCharLength,
  ZERO_CHAR_OFFSET,
  ZERO_CHAR_LENGTH,
} from './types/index.ts';

// =============================================================================
// Type Guards
// =============================================================================

export {
  isCommandKind,
  isMacroCommand,
  validateEditSpec,
} from './types/index.ts';

// =============================================================================
// Session
// =============================================================================

export { createEditorSession } from './editor/index.ts';

// =============================================================================
// Buffer and Commands
// =============================================================================

export {
  createTextBuffer,
  createInsertCommand,
  createDeleteCommand,
  createReplaceCommand,
  createCommand,
  describeCommand,
} from './editor/index.ts';
export type { CommandOptions } from './editor/index.ts';

// =============================================================================
// Errors
// =============================================================================

export { PositionRangeError, CommandStateError, EditSpecError } from './editor/index.ts';

// =============================================================================
// History
// =============================================================================

export {
  createCommandHistory,
  canUndo,
  getUndoCount,
  getLogLength,
  isHistoryEmpty,
} from './editor/index.ts';
export type { CommandHistoryOptions } from './editor/index.ts';

// =============================================================================
// Event System
// =============================================================================

export {
  createEventEmitter,
  createBufferInsertEvent,
  createBufferDeleteEvent,
  createCommandApplyEvent,
  createCommandRevertEvent,
  createBatchStartEvent,
  createUndoEmptyEvent,
  createHistoryListingEvent,
  attachNarrator,
  commandLabel,
} from './editor/index.ts';
export type {
  EditorEvent,
  BufferInsertEvent,
  BufferDeleteEvent,
  CommandApplyEvent,
  CommandRevertEvent,
  BatchStartEvent,
  UndoEmptyEvent,
  HistoryListingEvent,
  AnyEditorEvent,
  EditorEventMap,
  EventHandler,
  Unsubscribe,
  EditorEventEmitter,
} from './editor/index.ts';

// =============================================================================
// API Namespaces
// =============================================================================

export { query } from './api/index.ts';

// =============================================================================
// Home Theater Facade
// =============================================================================

export {
  createAmplifier,
  createDvdPlayer,
  createProjector,
  createTheaterLights,
  createScreen,
  createPopcornPopper,
  createHomeTheaterComponents,
  createHomeTheaterFacade,
  runFacadeDemo,
} from './theater/index.ts';
export type {
  TheaterComponent,
  Amplifier,
  DvdPlayer,
  Projector,
  TheaterLights,
  ScreenPosition,
  Screen,
  PopcornPopper,
  HomeTheaterComponents,
  HomeTheaterFacade,
  TheaterOptions,
} from './types/index.ts';

// =============================================================================
// Demo
// =============================================================================

export { runCommandDemo } from './demo/command-demo.ts';
