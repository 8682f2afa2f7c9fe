/**
 * Home theater facade.
 * Each activity runs a fixed sequence of subsystem calls.
 */

import type {
  HomeTheaterComponents,
  HomeTheaterFacade,
  TheaterOptions,
} from '../types/theater.ts';

const BANNER_RULE = '='.repeat(40);

/**
 * Factory function to create a HomeTheaterFacade over existing components.
 */
export function createHomeTheaterFacade(
  components: HomeTheaterComponents,
  options: TheaterOptions = {}
): HomeTheaterFacade {
  const write = options.write ?? ((line: string) => console.log(line));
  const { amp, dvd, projector, lights, screen, popper } = components;

  function banner(title: string): void {
    write('');
    write(BANNER_RULE);
    write(title);
    write(BANNER_RULE);
    write('');
  }

  function closing(message: string): void {
    write('');
    write(message);
    write('');
  }

  function watchMovie(movie: string): void {
    banner(`Get ready to watch '${movie}'...`);

    popper.on();
    popper.pop();
    lights.dim(10);
    screen.down();
    projector.on();
    projector.wideScreenMode();
    projector.setInput('DVD');
    amp.on();
    amp.setVolume(5);
    amp.setSurroundSound();
    dvd.on();
    dvd.play(movie);

    closing('... Movie is now playing! Enjoy! ...');
  }

  function endMovie(): void {
    banner('Shutting down movie theater...');

    popper.off();
    lights.on();
    screen.up();
    projector.off();
    amp.off();
    dvd.stop();
    dvd.eject();
    dvd.off();

    closing('... Theater shut down complete! ...');
  }

  function listenToRadio(station: string): void {
    banner(`Tuning to radio station ${station}...`);

    lights.on();
    amp.on();
    amp.setVolume(3);
    write(`Radio: Tuned to ${station} FM`);

    closing('... Radio is playing! ...');
  }

  return {
    components,
    watchMovie,
    endMovie,
    listenToRadio,
  };
}
