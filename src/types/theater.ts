/**
 * Home theater types for the Quire facade demonstration.
 * Six subsystem components and the facade that sequences them.
 */

import type { LineWriter } from './session.ts';

/**
 * Shared capability of every subsystem component.
 */
export interface TheaterComponent {
  powerStatus(): string;
}

export interface Amplifier extends TheaterComponent {
  on(): void;
  off(): void;
  setVolume(level: number): void;
  setSurroundSound(): void;
}

export interface DvdPlayer extends TheaterComponent {
  /** Title of the last movie played ('' before the first) */
  readonly movie: string;
  on(): void;
  off(): void;
  play(movie: string): void;
  stop(): void;
  eject(): void;
}

export interface Projector extends TheaterComponent {
  on(): void;
  off(): void;
  setInput(source: string): void;
  wideScreenMode(): void;
}

export interface TheaterLights extends TheaterComponent {
  /** Brightness in percent (starts at 100) */
  readonly brightness: number;
  dim(level: number): void;
  on(): void;
}

export type ScreenPosition = 'up' | 'down';

export interface Screen extends TheaterComponent {
  readonly position: ScreenPosition;
  down(): void;
  up(): void;
}

export interface PopcornPopper extends TheaterComponent {
  on(): void;
  off(): void;
  pop(): void;
}

/**
 * The subsystem a facade coordinates.
 */
export interface HomeTheaterComponents {
  readonly amp: Amplifier;
  readonly dvd: DvdPlayer;
  readonly projector: Projector;
  readonly lights: TheaterLights;
  readonly screen: Screen;
  readonly popper: PopcornPopper;
}

/**
 * One call per activity instead of a dozen subsystem calls.
 */
export interface HomeTheaterFacade {
  readonly components: HomeTheaterComponents;

  /**
   * Prepare every component and start the movie.
   */
  watchMovie(movie: string): void;

  /**
   * Stop playback and shut the theater down.
   */
  endMovie(): void;

  /**
   * Light the room and tune the amplifier to a radio station.
   */
  listenToRadio(station: string): void;
}

/**
 * Options shared by the component factories and the facade.
 */
export interface TheaterOptions {
  /** Where status lines go (default: console.log) */
  readonly write?: LineWriter;
}
