/**
 * Home theater exports for the Quire facade demonstration.
 */

// Subsystem components
export {
  createAmplifier,
  createDvdPlayer,
  createProjector,
  createTheaterLights,
  createScreen,
  createPopcornPopper,
  createHomeTheaterComponents,
} from './components.ts';

// Facade
export { createHomeTheaterFacade } from './facade.ts';

// Demo
export { runFacadeDemo } from './facade-demo.ts';
