/**
 * Console narration for the Quire text editor.
 * Renders editor events as the human-readable lines of a demonstration run.
 */

import type { Command } from '../../types/commands.ts';
import { isMacroCommand } from '../../types/commands.ts';
import type { LineWriter } from '../../types/session.ts';
import type { EditorEventEmitter, Unsubscribe } from './events.ts';

/**
 * Upper-case command label, with a marker for composite commands.
 */
export function commandLabel(command: Command): string {
  const label = command.name.toUpperCase();
  return isMacroCommand(command) ? `${label} (macro)` : label;
}

/**
 * Subscribe a narrator to an emitter.
 *
 * @param events - Emitter to listen to
 * @param write - Line sink (default: console.log)
 * @returns Unsubscribe function that detaches every narration handler
 */
export function attachNarrator(
  events: EditorEventEmitter,
  write: LineWriter = (line) => console.log(line)
): Unsubscribe {
  const unsubscribers: Unsubscribe[] = [
    events.addEventListener('buffer-insert', (event) => {
      write(`[Editor] Inserted '${event.text}' at position ${event.position}`);
      write(`[Editor] Current text: '${event.content}'`);
    }),

    events.addEventListener('buffer-delete', (event) => {
      write(`[Editor] Deleted '${event.deleted}' at position ${event.position}`);
      write(`[Editor] Current text: '${event.content}'`);
    }),

    events.addEventListener('command-apply', (event) => {
      write('');
      write(`[Command] Executing ${commandLabel(event.command)}`);
    }),

    events.addEventListener('command-revert', (event) => {
      write('');
      write(`[Command] Undoing ${commandLabel(event.command)}`);
    }),

    events.addEventListener('batch-start', (event) => {
      write('');
      write(`[Invoker] Executing batch of ${event.count} commands`);
    }),

    events.addEventListener('undo-empty', () => {
      write('');
      write('[Invoker] Nothing to undo!');
    }),

    events.addEventListener('history-listing', (event) => {
      write('');
      write('[Invoker] Command History:');
      for (const line of event.lines) {
        write(`  ${line}`);
      }
    }),
  ];

  return () => {
    for (const unsubscribe of unsubscribers) {
      unsubscribe();
    }
  };
}
