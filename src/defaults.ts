import type { LoggingConfig, PrintConfig } from './config.js';
import { OutputDestination } from './support/output.js';
import { identity } from './support/types/utilities.js';
import { DeepReadonly } from 'ts-essentials';

const defaults = {
  logging: identity<LoggingConfig>({
    level: 'info',
    name: 'stopwatch',
    destination: OutputDestination.Stderr,
  }),
  print: identity<PrintConfig>({
    destination: OutputDestination.Stdout,
  }),
};

export default defaults as DeepReadonly<typeof defaults>;
