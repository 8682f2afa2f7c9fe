/**
 * Type exports for the Quire text editor.
 */

// Buffer types
export type { TextBuffer } from './buffer.ts';

// Command types
export type {
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
} from './commands.ts';

export {
  isCommandKind,
  isMacroCommand,
  validateEditSpec,
} from './commands.ts';

// History types
export type { CommandHistory } from './history.ts';

// Session types
export type {
  LineWriter,
  EditorSessionConfig,
  EditorSession,
} from './session.ts';

// Branded position types
export type { CharOffset, CharLength } from './branded.ts';

export {
  charOffset,
  charLength,
  isValidOffset,
  isValidLength,
  lengthOf,
  clampCharLength,
  ZERO_CHAR_OFFSET,
  ZERO_CHAR_LENGTH,
} from './branded.ts';

// Home theater types
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
} from './theater.ts';
