/**
 * Command factories for the Quire text editor.
 * Each command is bound to one buffer and knows how to apply and revert its edit.
 */

import type { TextBuffer } from '../../types/buffer.ts';
import type { CharLength, CharOffset } from '../../types/branded.ts';
import { charLength, charOffset, lengthOf } from '../../types/branded.ts';
import type {
  Command,
  DeleteCommand,
  EditSpec,
  InsertCommand,
  ReplaceCommand,
} from '../../types/commands.ts';
import type { EditorEventEmitter } from '../features/events.ts';
import { createCommandApplyEvent, createCommandRevertEvent } from '../features/events.ts';
import { CommandStateError } from './errors.ts';

/**
 * Options shared by all command factories.
 */
export interface CommandOptions {
  /** Emitter notified when the command applies or reverts */
  readonly events?: EditorEventEmitter;
}

function notApplied(command: Command): CommandStateError {
  return new CommandStateError(
    command.kind,
    `Cannot revert ${command.name} command: it is not applied`
  );
}

/**
 * Create an insert command.
 *
 * @param buffer - Buffer to edit
 * @param text - Text to insert
 * @param position - Insert position; defaults to the buffer length now, not at apply time
 */
export function createInsertCommand(
  buffer: TextBuffer,
  text: string,
  position?: CharOffset,
  options: CommandOptions = {}
): InsertCommand {
  const { events } = options;
  const at = position ?? charOffset(buffer.length);
  let applied = false;

  const command: InsertCommand = {
    kind: 'insert',
    name: 'Insert',
    buffer,
    text,
    position: at,
    get applied() { return applied; },

    apply(): void {
      events?.emit('command-apply', createCommandApplyEvent(command));
      buffer.insert(text, at);
      applied = true;
    },

    revert(): void {
      if (!applied) {
        throw notApplied(command);
      }
      events?.emit('command-revert', createCommandRevertEvent(command));
      buffer.delete(at, lengthOf(text));
      applied = false;
    },
  };

  return command;
}

/**
 * Create a delete command.
 * The removed text is captured on apply() and restored on revert().
 */
export function createDeleteCommand(
  buffer: TextBuffer,
  position: CharOffset,
  length: CharLength,
  options: CommandOptions = {}
): DeleteCommand {
  const { events } = options;
  let applied = false;
  let deletedText: string | undefined;

  const command: DeleteCommand = {
    kind: 'delete',
    name: 'Delete',
    buffer,
    position,
    length,
    get applied() { return applied; },
    get deletedText() { return deletedText; },

    apply(): void {
      events?.emit('command-apply', createCommandApplyEvent(command));
      deletedText = buffer.delete(position, length);
      applied = true;
    },

    revert(): void {
      if (!applied || deletedText === undefined) {
        throw notApplied(command);
      }
      events?.emit('command-revert', createCommandRevertEvent(command));
      buffer.insert(deletedText, position);
      applied = false;
    },
  };

  return command;
}

/**
 * Create a replace command: a macro of Delete then Insert at the same position.
 * Revert runs the sub-commands in the opposite order.
 */
export function createReplaceCommand(
  buffer: TextBuffer,
  position: CharOffset,
  length: CharLength,
  text: string,
  options: CommandOptions = {}
): ReplaceCommand {
  const { events } = options;
  const deleteCommand = createDeleteCommand(buffer, position, length, options);
  const insertCommand = createInsertCommand(buffer, text, position, options);
  let applied = false;

  const command: ReplaceCommand = {
    kind: 'replace',
    name: 'Replace',
    buffer,
    deleteCommand,
    insertCommand,
    get applied() { return applied; },

    apply(): void {
      events?.emit('command-apply', createCommandApplyEvent(command));
      deleteCommand.apply();
      insertCommand.apply();
      applied = true;
    },

    revert(): void {
      if (!applied) {
        throw notApplied(command);
      }
      events?.emit('command-revert', createCommandRevertEvent(command));
      insertCommand.revert();
      deleteCommand.revert();
      applied = false;
    },
  };

  return command;
}

/**
 * Build the command described by an edit spec.
 * The spec is assumed valid; see validateEditSpec.
 */
export function createCommand(
  buffer: TextBuffer,
  edit: EditSpec,
  options: CommandOptions = {}
): Command {
  switch (edit.kind) {
    case 'insert':
      return createInsertCommand(
        buffer,
        edit.text,
        edit.position === undefined ? undefined : charOffset(edit.position),
        options
      );
    case 'delete':
      return createDeleteCommand(buffer, charOffset(edit.position), charLength(edit.length), options);
    case 'replace':
      return createReplaceCommand(
        buffer,
        charOffset(edit.position),
        charLength(edit.length),
        edit.text,
        options
      );
  }
}

/**
 * One-line description of a command, e.g. `Insert 'Hello' at 0`.
 */
export function describeCommand(command: Command): string {
  switch (command.kind) {
    case 'insert':
      return `Insert '${command.text}' at ${command.position}`;
    case 'delete':
      return `Delete ${command.length} at ${command.position}`;
    case 'replace':
      return `Replace ${command.deleteCommand.length} at ${command.deleteCommand.position} with '${command.insertCommand.text}'`;
  }
}
