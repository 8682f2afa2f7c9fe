/**
 * Event system for the Quire text editor.
 * Provides a pub/sub mechanism for buffer edits and command lifecycle steps.
 */

import type { CharOffset } from '../../types/branded.ts';
import type { Command } from '../../types/commands.ts';

// =============================================================================
// Event Types
// =============================================================================

/**
 * Base event interface.
 */
export interface EditorEvent {
  readonly type: string;
  readonly timestamp: number;
}

/**
 * Fired after the buffer inserted text.
 */
export interface BufferInsertEvent extends EditorEvent {
  readonly type: 'buffer-insert';
  readonly text: string;
  readonly position: CharOffset;
  /** Buffer content after the insert */
  readonly content: string;
}

/**
 * Fired after the buffer removed text.
 */
export interface BufferDeleteEvent extends EditorEvent {
  readonly type: 'buffer-delete';
  /** The removed text (may be shorter than requested at the end of the buffer) */
  readonly deleted: string;
  readonly position: CharOffset;
  /** Buffer content after the delete */
  readonly content: string;
}

/**
 * Fired when a command starts its forward edit.
 */
export interface CommandApplyEvent extends EditorEvent {
  readonly type: 'command-apply';
  readonly command: Command;
}

/**
 * Fired when a command starts undoing its edit.
 */
export interface CommandRevertEvent extends EditorEvent {
  readonly type: 'command-revert';
  readonly command: Command;
}

/**
 * Fired before the history executes a batch.
 */
export interface BatchStartEvent extends EditorEvent {
  readonly type: 'batch-start';
  readonly count: number;
}

/**
 * Fired when undo is requested with an empty undo stack.
 */
export interface UndoEmptyEvent extends EditorEvent {
  readonly type: 'undo-empty';
}

/**
 * Fired when the history lists its log.
 */
export interface HistoryListingEvent extends EditorEvent {
  readonly type: 'history-listing';
  readonly lines: readonly string[];
}

/**
 * Union of all editor events.
 */
export type AnyEditorEvent =
  | BufferInsertEvent
  | BufferDeleteEvent
  | CommandApplyEvent
  | CommandRevertEvent
  | BatchStartEvent
  | UndoEmptyEvent
  | HistoryListingEvent;

/**
 * Event type to handler mapping.
 */
export interface EditorEventMap {
  'buffer-insert': BufferInsertEvent;
  'buffer-delete': BufferDeleteEvent;
  'command-apply': CommandApplyEvent;
  'command-revert': CommandRevertEvent;
  'batch-start': BatchStartEvent;
  'undo-empty': UndoEmptyEvent;
  'history-listing': HistoryListingEvent;
}

// =============================================================================
// Event Handler Types
// =============================================================================

/**
 * Handler function for a specific event type.
 */
export type EventHandler<T extends AnyEditorEvent> = (event: T) => void;

/**
 * Unsubscribe function returned by addEventListener.
 */
export type Unsubscribe = () => void;

/**
 * Handlers registered for one event type.
 */
type HandlerSet<K extends keyof EditorEventMap> = Set<EventHandler<EditorEventMap[K]>>;

/**
 * Handler sets keyed by event type. Every key is present.
 */
type HandlerRegistry = {
  readonly [K in keyof EditorEventMap]: HandlerSet<K>;
};

function createHandlerRegistry(): HandlerRegistry {
  return {
    'buffer-insert': new Set(),
    'buffer-delete': new Set(),
    'command-apply': new Set(),
    'command-revert': new Set(),
    'batch-start': new Set(),
    'undo-empty': new Set(),
    'history-listing': new Set(),
  };
}

// =============================================================================
// Event Emitter
// =============================================================================

/**
 * Event emitter for editor events.
 * Provides type-safe pub/sub for all editor events.
 */
export interface EditorEventEmitter {
  /**
   * Add an event listener for a specific event type.
   * @returns Unsubscribe function
   */
  addEventListener<K extends keyof EditorEventMap>(
    type: K,
    handler: EventHandler<EditorEventMap[K]>
  ): Unsubscribe;

  /**
   * Remove an event listener.
   */
  removeEventListener<K extends keyof EditorEventMap>(
    type: K,
    handler: EventHandler<EditorEventMap[K]>
  ): void;

  /**
   * Emit an event to all registered handlers.
   */
  emit<K extends keyof EditorEventMap>(
    type: K,
    event: EditorEventMap[K]
  ): void;

  /**
   * Remove all event listeners.
   */
  removeAllListeners(): void;
}

/**
 * Create a new editor event emitter.
 */
export function createEventEmitter(): EditorEventEmitter {
  let handlers = createHandlerRegistry();

  function removeEventListener<K extends keyof EditorEventMap>(
    type: K,
    handler: EventHandler<EditorEventMap[K]>
  ): void {
    const typeHandlers: HandlerSet<K> = handlers[type];
    typeHandlers.delete(handler);
  }

  return {
    addEventListener<K extends keyof EditorEventMap>(
      type: K,
      handler: EventHandler<EditorEventMap[K]>
    ): Unsubscribe {
      const typeHandlers: HandlerSet<K> = handlers[type];
      typeHandlers.add(handler);

      return () => {
        removeEventListener(type, handler);
      };
    },

    removeEventListener,

    emit<K extends keyof EditorEventMap>(
      type: K,
      event: EditorEventMap[K]
    ): void {
      const typeHandlers: HandlerSet<K> = handlers[type];
      for (const handler of typeHandlers) {
        try {
          handler(event);
        } catch (error) {
          console.error(`Event handler error for '${type}':`, error);
        }
      }
    },

    removeAllListeners(): void {
      handlers = createHandlerRegistry();
    },
  };
}

// =============================================================================
// Event Helpers
// =============================================================================

/**
 * Create a buffer insert event.
 */
export function createBufferInsertEvent(
  text: string,
  position: CharOffset,
  content: string
): BufferInsertEvent {
  return Object.freeze({
    type: 'buffer-insert' as const,
    timestamp: Date.now(),
    text,
    position,
    content,
  });
}

/**
 * Create a buffer delete event.
 */
export function createBufferDeleteEvent(
  deleted: string,
  position: CharOffset,
  content: string
): BufferDeleteEvent {
  return Object.freeze({
    type: 'buffer-delete' as const,
    timestamp: Date.now(),
    deleted,
    position,
    content,
  });
}

/**
 * Create a command apply event.
 */
export function createCommandApplyEvent(command: Command): CommandApplyEvent {
  return Object.freeze({
    type: 'command-apply' as const,
    timestamp: Date.now(),
    command,
  });
}

/**
 * Create a command revert event.
 */
export function createCommandRevertEvent(command: Command): CommandRevertEvent {
  return Object.freeze({
    type: 'command-revert' as const,
    timestamp: Date.now(),
    command,
  });
}

/**
 * Create a batch start event.
 */
export function createBatchStartEvent(count: number): BatchStartEvent {
  return Object.freeze({
    type: 'batch-start' as const,
    timestamp: Date.now(),
    count,
  });
}

/**
 * Create an empty undo event.
 */
export function createUndoEmptyEvent(): UndoEmptyEvent {
  return Object.freeze({
    type: 'undo-empty' as const,
    timestamp: Date.now(),
  });
}

/**
 * Create a history listing event.
 */
export function createHistoryListingEvent(lines: readonly string[]): HistoryListingEvent {
  return Object.freeze({
    type: 'history-listing' as const,
    timestamp: Date.now(),
    lines,
  });
}
