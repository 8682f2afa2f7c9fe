/**
 * Home theater subsystem components.
 * Each factory reports what it does through the configured writer.
 */

import type { LineWriter } from '../types/session.ts';
import type {
  Amplifier,
  DvdPlayer,
  HomeTheaterComponents,
  PopcornPopper,
  Projector,
  Screen,
  ScreenPosition,
  TheaterComponent,
  TheaterLights,
  TheaterOptions,
} from '../types/theater.ts';

const defaultWrite: LineWriter = (line) => console.log(line);

function writerOf(options: TheaterOptions): LineWriter {
  return options.write ?? defaultWrite;
}

function componentBase(): TheaterComponent {
  return {
    powerStatus: () => 'Component is operational',
  };
}

export function createAmplifier(options: TheaterOptions = {}): Amplifier {
  const write = writerOf(options);
  return {
    ...componentBase(),
    on: () => write('Amplifier: Powering on...'),
    off: () => write('Amplifier: Shutting down...'),
    setVolume: (level) => write(`Amplifier: Setting volume to ${level}`),
    setSurroundSound: () => write('Amplifier: Enabling 5.1 surround sound'),
  };
}

export function createDvdPlayer(options: TheaterOptions = {}): DvdPlayer {
  const write = writerOf(options);
  let movie = '';

  return {
    ...componentBase(),
    get movie() { return movie; },
    on: () => write('DVD Player: Powering on...'),
    off: () => write('DVD Player: Shutting down...'),
    play(title: string): void {
      movie = title;
      write(`DVD Player: Playing '${title}'`);
    },
    // Keeps the title; only play() changes it.
    stop: () => write('DVD Player: Stopping playback'),
    eject: () => write('DVD Player: Ejecting disc'),
  };
}

export function createProjector(options: TheaterOptions = {}): Projector {
  const write = writerOf(options);
  return {
    ...componentBase(),
    on: () => write('Projector: Powering on...'),
    off: () => write('Projector: Shutting down...'),
    setInput: (source) => write(`Projector: Setting input to ${source}`),
    wideScreenMode: () => write('Projector: Setting widescreen mode (16:9)'),
  };
}

export function createTheaterLights(options: TheaterOptions = {}): TheaterLights {
  const write = writerOf(options);
  let brightness = 100;

  return {
    ...componentBase(),
    get brightness() { return brightness; },
    dim(level: number): void {
      brightness = level;
      write(`Theater Lights: Dimming to ${level}%`);
    },
    on(): void {
      brightness = 100;
      write('Theater Lights: Turning on to full brightness');
    },
  };
}

export function createScreen(options: TheaterOptions = {}): Screen {
  const write = writerOf(options);
  let position: ScreenPosition = 'up';

  return {
    ...componentBase(),
    get position() { return position; },
    down(): void {
      position = 'down';
      write('Screen: Lowering screen');
    },
    up(): void {
      position = 'up';
      write('Screen: Raising screen');
    },
  };
}

export function createPopcornPopper(options: TheaterOptions = {}): PopcornPopper {
  const write = writerOf(options);
  return {
    ...componentBase(),
    on: () => write('Popcorn Popper: Starting...'),
    off: () => write('Popcorn Popper: Shutting off'),
    pop: () => write('Popcorn Popper: Popping corn!'),
  };
}

/**
 * Create all six components sharing one writer.
 */
export function createHomeTheaterComponents(options: TheaterOptions = {}): HomeTheaterComponents {
  return {
    amp: createAmplifier(options),
    dvd: createDvdPlayer(options),
    projector: createProjector(options),
    lights: createTheaterLights(options),
    screen: createScreen(options),
    popper: createPopcornPopper(options),
  };
}
