import { runCommandDemo } from './command-demo.ts';
import { runFacadeDemo } from '../theater/facade-demo.ts';

if (process.argv[2] === 'theater') {
  runFacadeDemo();
} else {
  runCommandDemo();
}
