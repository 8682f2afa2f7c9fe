/**
 * Narrated walkthrough of the home theater facade.
 */

import type { LineWriter } from '../types/session.ts';
import type { HomeTheaterFacade } from '../types/theater.ts';
import { createHomeTheaterComponents } from './components.ts';
import { createHomeTheaterFacade } from './facade.ts';

const RULE = '='.repeat(60);

const KEY_BENEFITS = [
  'Simplified interface (1 method vs 12+ calls)',
  'Hides subsystem complexity from client',
  'Loose coupling between client and subsystems',
  'Easy to use and understand',
  "Client doesn't need to know internal details",
] as const;

/**
 * Run the demonstration, writing every line through `write`.
 * @returns The facade after the radio step, for inspecting component state
 */
export function runFacadeDemo(write: LineWriter = (line) => console.log(line)): HomeTheaterFacade {
  function section(title: string): void {
    write('');
    write(RULE);
    write(title);
    write(RULE);
  }

  write(RULE);
  write('FACADE PATTERN DEMONSTRATION - Home Theater System');
  write(RULE);

  write('');
  write('--- Creating Complex Subsystem Components ---');
  write('');
  const components = createHomeTheaterComponents({ write });

  write('--- Creating Facade ---');
  write('');
  const theater = createHomeTheaterFacade(components, { write });

  theater.watchMovie('The Matrix');

  section('INTERMISSION - Theater is running...');
  theater.endMovie();

  section('BONUS FEATURE - Radio Mode');
  theater.listenToRadio('101.5');

  section('DEMONSTRATION COMPLETE');

  write('');
  write('');
  write('KEY BENEFITS OF FACADE PATTERN:');
  for (const benefit of KEY_BENEFITS) {
    write(`- ${benefit}`);
  }

  return theater;
}
