/**
 * Narrated walkthrough of the command pattern on a text editor session.
 */

import type { LineWriter } from '../types/session.ts';
import { createEditorSession } from '../editor/features/session.ts';

const RULE = '='.repeat(70);

const KEY_CONCEPTS = [
  'Commands as objects (encapsulation)',
  'Separation of invoker and receiver',
  'Undo capability',
  'Command history/logging',
  'Command queuing (batch execution)',
  'Macro commands (composite)',
  'Session facade over buffer, commands and history',
] as const;

/**
 * Run the demonstration, writing every line through `write`.
 * @returns The final buffer text
 */
export function runCommandDemo(write: LineWriter = (line) => console.log(line)): string {
  const session = createEditorSession({ write });

  function scenario(title: string): void {
    write('');
    write(`### ${title} ###`);
  }

  write(RULE);
  write('COMMAND PATTERN DEMONSTRATION - Text Editor');
  write(RULE);

  scenario('SCENARIO 1: Basic Commands');
  session.insert('Hello');
  session.insert(' World');
  session.insert('!');

  scenario('SCENARIO 2: Undo Operations');
  session.undo();
  session.undo();

  scenario('SCENARIO 3: Macro Command (Replace)');
  session.replace(0, 5, 'Greetings');

  // Every insert is built before the batch runs, so all three land at the same offset.
  scenario('SCENARIO 4: Batch Execution (Queue)');
  session.batch([
    { kind: 'insert', text: ' to' },
    { kind: 'insert', text: ' all' },
    { kind: 'insert', text: '!' },
  ]);

  scenario('SCENARIO 5: Multiple Undos');
  session.undo();
  session.undo();

  scenario('SCENARIO 6: Command History');
  session.listHistory();

  scenario('Final State');
  const text = session.show();

  write('');
  write(RULE);
  write('KEY CONCEPTS DEMONSTRATED:');
  write(RULE);
  KEY_CONCEPTS.forEach((concept, index) => write(`${index + 1}. ${concept}`));
  write(RULE);

  session.dispose();
  return text;
}
