/**
 * Editor session for the Quire text editor.
 * Facade over the buffer, the command factories, the history and the narration.
 */

import type { Command, EditSpec } from '../../types/commands.ts';
import { validateEditSpec } from '../../types/commands.ts';
import type { EditorSession, EditorSessionConfig } from '../../types/session.ts';
import { charLength, charOffset } from '../../types/branded.ts';
import { createTextBuffer } from '../core/text-buffer.ts';
import {
  createCommand,
  createDeleteCommand,
  createInsertCommand,
  createReplaceCommand,
} from '../core/commands.ts';
import { EditSpecError } from '../core/errors.ts';
import { createEventEmitter } from './events.ts';
import { createCommandHistory } from './history.ts';
import { attachNarrator } from './narrator.ts';

const DEFAULT_CONFIG: EditorSessionConfig = {
  content: '',
  narrate: true,
  write: (line) => console.log(line),
};

/**
 * Factory function to create an EditorSession.
 * The session owns one buffer, one history and one emitter.
 *
 * @param config - Optional configuration for the session
 * @returns A new EditorSession instance
 */
export function createEditorSession(
  config: Partial<EditorSessionConfig> = {}
): EditorSession {
  const content = config.content ?? DEFAULT_CONFIG.content;
  const narrate = config.narrate ?? DEFAULT_CONFIG.narrate;
  const write = config.write ?? DEFAULT_CONFIG.write;

  const events = createEventEmitter();
  const buffer = createTextBuffer(content, events);
  const history = createCommandHistory({ events });
  const detachNarrator = narrate ? attachNarrator(events, write) : null;

  function run(command: Command): Command {
    history.executeCommand(command);
    return command;
  }

  function insert(text: string, position?: number): Command {
    const at = position === undefined ? undefined : charOffset(position);
    return run(createInsertCommand(buffer, text, at, { events }));
  }

  function remove(position: number, length: number): Command {
    return run(createDeleteCommand(buffer, charOffset(position), charLength(length), { events }));
  }

  function replace(position: number, length: number, text: string): Command {
    return run(
      createReplaceCommand(buffer, charOffset(position), charLength(length), text, { events })
    );
  }

  function batch(edits: readonly EditSpec[]): Command[] {
    edits.forEach((edit, index) => {
      const result = validateEditSpec(edit);
      if (!result.valid) {
        throw new EditSpecError(index, result.errors);
      }
    });

    const commands = edits.map((edit) => createCommand(buffer, edit, { events }));
    history.executeBatch(commands);
    return commands;
  }

  function show(): string {
    const text = buffer.getText();
    write(`[Editor] Text: '${text}'`);
    return text;
  }

  function dispose(): void {
    detachNarrator?.();
    events.removeAllListeners();
  }

  return {
    buffer,
    history,
    events,
    insert,
    delete: remove,
    replace,
    batch,
    undo: () => history.undo(),
    listHistory: () => history.showHistory(),
    show,
    getText: () => buffer.getText(),
    dispose,
  };
}
