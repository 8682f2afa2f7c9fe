/**
 * Tests for the command history.
 * Tests executeCommand, executeBatch, undo, showHistory and the history helpers.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  createCommandHistory,
  canUndo,
  getUndoCount,
  getLogLength,
  isHistoryEmpty,
} from './history.ts';
import { createEventEmitter } from './events.ts';
import { createTextBuffer } from '../core/text-buffer.ts';
import {
  createDeleteCommand,
  createInsertCommand,
  createReplaceCommand,
} from '../core/commands.ts';
import { CommandStateError, PositionRangeError } from '../core/errors.ts';
import { charLength, charOffset } from '../../types/branded.ts';

// =============================================================================
// executeCommand
// =============================================================================

describe('executeCommand', () => {
  it('should apply the command', () => {
    const buffer = createTextBuffer();
    const history = createCommandHistory();

    history.executeCommand(createInsertCommand(buffer, 'Hello'));

    expect(buffer.getText()).toBe('Hello');
  });

  it('should record the command in the log and on the undo stack', () => {
    const buffer = createTextBuffer();
    const history = createCommandHistory();
    const command = createInsertCommand(buffer, 'Hello');

    history.executeCommand(command);

    expect(history.log).toEqual([command]);
    expect(history.undoStack).toEqual([command]);
  });

  it('should record nothing when apply throws', () => {
    const buffer = createTextBuffer('ab');
    const history = createCommandHistory();

    expect(() => history.executeCommand(createInsertCommand(buffer, 'x', charOffset(5)))).toThrow(
      PositionRangeError
    );
    expect(history.log).toHaveLength(0);
    expect(history.undoStack).toHaveLength(0);
  });
  it('should reject a command that is already applied', () => {
    const buffer = createTextBuffer('abcdef');
    const history = createCommandHistory();
    const command = createDeleteCommand(buffer, charOffset(0), charLength(2));
    history.executeCommand(command);

    expect(() => history.executeCommand(command)).toThrow(CommandStateError);
    expect(() => history.executeCommand(command)).toThrow(
      'Cannot execute Delete command: it is already applied'
    );
    expect(buffer.getText()).toBe('cdef');
    expect(history.log).toHaveLength(1);
    expect(history.undoStack).toHaveLength(1);

    history.undo();
    expect(buffer.getText()).toBe('abcdef');
  });

  it('should accept a command again once it was undone', () => {
    const buffer = createTextBuffer('abcdef');
    const history = createCommandHistory();
    const command = createDeleteCommand(buffer, charOffset(0), charLength(2));
    history.executeCommand(command);
    history.undo();

    history.executeCommand(command);

    expect(buffer.getText()).toBe('cdef');
    expect(history.log).toEqual([command, command]);
    expect(history.undoStack).toEqual([command]);
  });
});

// =============================================================================
// undo
// =============================================================================

describe('undo', () => {
  it('should walk back inserts one at a time', () => {
    const buffer = createTextBuffer();
    const history = createCommandHistory();

    history.executeCommand(createInsertCommand(buffer, 'Hello', charOffset(0)));
    expect(buffer.getText()).toBe('Hello');
    history.executeCommand(createInsertCommand(buffer, ' World'));
    expect(buffer.getText()).toBe('Hello World');

    history.undo();
    expect(buffer.getText()).toBe('Hello');
    history.undo();
    expect(buffer.getText()).toBe('');
    expect(history.undo()).toBeNull();
    expect(buffer.getText()).toBe('');
  });

  it('should return the reverted command', () => {
    const buffer = createTextBuffer();
    const history = createCommandHistory();
    const first = createInsertCommand(buffer, 'a');
    history.executeCommand(first);
    const second = createInsertCommand(buffer, 'b');
    history.executeCommand(second);

    expect(history.undo()).toBe(second);
    expect(history.undo()).toBe(first);
  });

  it('should undo a replace back to the exact original', () => {
    const buffer = createTextBuffer('Hello World!');
    const history = createCommandHistory();

    history.executeCommand(createReplaceCommand(buffer, charOffset(0), charLength(5), 'Greetings'));
    expect(buffer.getText()).toBe('Greetings World!');

    history.undo();
    expect(buffer.getText()).toBe('Hello World!');
  });

  it('should undo a delete', () => {
    const buffer = createTextBuffer('Hello World');
    const history = createCommandHistory();

    history.executeCommand(createDeleteCommand(buffer, charOffset(5), charLength(6)));
    expect(buffer.getText()).toBe('Hello');

    history.undo();
    expect(buffer.getText()).toBe('Hello World');
  });

  it('should keep undone commands in the log', () => {
    const buffer = createTextBuffer();
    const history = createCommandHistory();
    history.executeCommand(createInsertCommand(buffer, 'a'));
    history.executeCommand(createInsertCommand(buffer, 'b'));

    history.undo();
    history.undo();

    expect(history.log).toHaveLength(2);
    expect(history.undoStack).toHaveLength(0);
  });

  it('should keep a command reverted outside the history on the stack', () => {
    const buffer = createTextBuffer('Hello');
    const history = createCommandHistory();
    const first = createInsertCommand(buffer, '!');
    history.executeCommand(first);
    const second = createInsertCommand(buffer, '?');
    history.executeCommand(second);
    second.revert();

    expect(() => history.undo()).toThrow(CommandStateError);
    expect(buffer.getText()).toBe('Hello!');
    expect(history.log).toHaveLength(2);
    expect(history.undoStack).toEqual([first, second]);

    second.apply();
    expect(history.undo()).toBe(second);
    expect(history.undo()).toBe(first);
    expect(buffer.getText()).toBe('Hello');
  });

  it('should never touch the buffer or throw on an empty stack', () => {
    const buffer = createTextBuffer('untouched');
    const history = createCommandHistory();

    for (let i = 0; i < 5; i++) {
      expect(history.undo()).toBeNull();
    }
    expect(buffer.getText()).toBe('untouched');
  });

  it('should emit undo-empty on an empty stack only', () => {
    const events = createEventEmitter();
    const handler = vi.fn();
    events.addEventListener('undo-empty', handler);

    const buffer = createTextBuffer();
    const history = createCommandHistory({ events });
    history.executeCommand(createInsertCommand(buffer, 'a'));

    history.undo();
    expect(handler).not.toHaveBeenCalled();

    history.undo();
    history.undo();
    expect(handler).toHaveBeenCalledTimes(2);
  });

  it('should keep log length at N and undo count at N minus undos', () => {
    const executed = 4;
    for (let undos = 0; undos <= 6; undos++) {
      const buffer = createTextBuffer();
      const history = createCommandHistory();
      for (let i = 0; i < executed; i++) {
        history.executeCommand(createInsertCommand(buffer, String(i)));
      }
      for (let i = 0; i < undos; i++) {
        history.undo();
      }

      expect(history.log).toHaveLength(executed);
      expect(history.undoStack).toHaveLength(Math.max(0, executed - undos));
    }
  });
});

// =============================================================================
// executeBatch
// =============================================================================

describe('executeBatch', () => {
  it('should execute every command in order', () => {
    const buffer = createTextBuffer();
    const history = createCommandHistory();

    history.executeBatch([
      createInsertCommand(buffer, 'a', charOffset(0)),
      createInsertCommand(buffer, 'b', charOffset(1)),
      createInsertCommand(buffer, 'c', charOffset(2)),
    ]);

    expect(buffer.getText()).toBe('abc');
    expect(history.log).toHaveLength(3);
    expect(history.undoStack).toHaveLength(3);
  });

  it('should grow the log by the batch size in one call', () => {
    const buffer = createTextBuffer();
    const history = createCommandHistory();
    history.executeCommand(createInsertCommand(buffer, 'x'));

    history.executeBatch([
      createInsertCommand(buffer, 'a'),
      createInsertCommand(buffer, 'b'),
      createInsertCommand(buffer, 'c'),
    ]);

    expect(history.log).toHaveLength(4);
  });

  it('should use construction-time default positions', () => {
    const buffer = createTextBuffer('Greetings');
    const history = createCommandHistory();

    history.executeBatch([
      createInsertCommand(buffer, ' to'),
      createInsertCommand(buffer, ' all'),
      createInsertCommand(buffer, '!'),
    ]);

    expect(buffer.getText()).toBe('Greetings! all to');
  });

  it('should leave earlier commands executed when one fails', () => {
    const buffer = createTextBuffer();
    const history = createCommandHistory();
    const good = createInsertCommand(buffer, 'ok', charOffset(0));
    const bad = createDeleteCommand(buffer, charOffset(9), charLength(1));
    const never = createInsertCommand(buffer, '!', charOffset(0));

    expect(() => history.executeBatch([good, bad, never])).toThrow(PositionRangeError);

    expect(buffer.getText()).toBe('ok');
    expect(history.log).toEqual([good]);
    expect(never.applied).toBe(false);
  });

  it('should emit batch-start with the count', () => {
    const events = createEventEmitter();
    const handler = vi.fn();
    events.addEventListener('batch-start', handler);

    const buffer = createTextBuffer();
    createCommandHistory({ events }).executeBatch([
      createInsertCommand(buffer, 'a'),
      createInsertCommand(buffer, 'b'),
    ]);

    expect(handler).toHaveBeenCalledWith(expect.objectContaining({ type: 'batch-start', count: 2 }));
  });

  it('should accept an empty batch', () => {
    const history = createCommandHistory();
    history.executeBatch([]);
    expect(history.log).toHaveLength(0);
  });
});

// =============================================================================
// showHistory
// =============================================================================

describe('showHistory', () => {
  it('should list nothing for a fresh history', () => {
    expect(createCommandHistory().showHistory()).toEqual([]);
  });

  it('should number every logged command by variant name', () => {
    const buffer = createTextBuffer('Hello');
    const history = createCommandHistory();
    history.executeCommand(createInsertCommand(buffer, '!'));
    history.executeCommand(createReplaceCommand(buffer, charOffset(0), charLength(5), 'Howdy'));
    history.executeCommand(createDeleteCommand(buffer, charOffset(5), charLength(1)));
    history.undo();

    expect(history.showHistory()).toEqual(['1. Insert', '2. Replace', '3. Delete']);
    expect(buffer.getText()).toBe('Howdy!');
  });

  it('should emit history-listing with the lines', () => {
    const events = createEventEmitter();
    const handler = vi.fn();
    events.addEventListener('history-listing', handler);

    const buffer = createTextBuffer();
    const history = createCommandHistory({ events });
    history.executeCommand(createInsertCommand(buffer, 'a'));
    history.showHistory();

    expect(handler).toHaveBeenCalledWith(expect.objectContaining({ lines: ['1. Insert'] }));
  });
});

// =============================================================================
// History Helpers
// =============================================================================

describe('history helpers', () => {
  it('should report a fresh history as empty', () => {
    const history = createCommandHistory();
    expect(canUndo(history)).toBe(false);
    expect(getUndoCount(history)).toBe(0);
    expect(getLogLength(history)).toBe(0);
    expect(isHistoryEmpty(history)).toBe(true);
  });

  it('should track counts through executes and undos', () => {
    const buffer = createTextBuffer();
    const history = createCommandHistory();
    history.executeCommand(createInsertCommand(buffer, 'a'));
    history.executeCommand(createInsertCommand(buffer, 'b'));
    history.undo();

    expect(canUndo(history)).toBe(true);
    expect(getUndoCount(history)).toBe(1);
    expect(getLogLength(history)).toBe(2);
    expect(isHistoryEmpty(history)).toBe(false);
  });

  it('should keep a history non-empty after undoing everything', () => {
    const buffer = createTextBuffer();
    const history = createCommandHistory();
    history.executeCommand(createInsertCommand(buffer, 'a'));
    history.undo();

    expect(canUndo(history)).toBe(false);
    expect(isHistoryEmpty(history)).toBe(false);
  });
});
