/**
 * Editor exports for the Quire text editor.
 */

// Session facade
export { createEditorSession } from './features/session.ts';

// Receiver
export { createTextBuffer } from './core/text-buffer.ts';

// Commands
export {
  createInsertCommand,
  createDeleteCommand,
  createReplaceCommand,
  createCommand,
  describeCommand,
} from './core/commands.ts';
export type { CommandOptions } from './core/commands.ts';

// Errors
export { PositionRangeError, CommandStateError, EditSpecError } from './core/errors.ts';

// Invoker and history helpers
export {
  createCommandHistory,
  canUndo,
  getUndoCount,
  getLogLength,
  isHistoryEmpty,
} from './features/history.ts';
export type { CommandHistoryOptions } from './features/history.ts';

// Event system
export {
  createEventEmitter,
  createBufferInsertEvent,
  createBufferDeleteEvent,
  createCommandApplyEvent,
  createCommandRevertEvent,
  createBatchStartEvent,
  createUndoEmptyEvent,
  createHistoryListingEvent,
} from './features/events.ts';
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
} from './features/events.ts';

// Narration
export { attachNarrator, commandLabel } from './features/narrator.ts';
