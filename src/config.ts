import AjvModule, { JSONSchemaType } from 'ajv';
import YAML from 'yaml';
import { LevelWithSilent } from 'pino';
import * as fs from 'node:fs';
import defaults from './defaults.js';
import { createLogger, setDefaultLogger } from './support/logging.js';
import { OutputDestination, resolveOutput, setDefaultOutput } from './support/output.js';
import { Throwable } from './support/types/utilities.js';

/**
 * Builds the configuration from already parsed input, for example an object
 * literal or a section of a larger settings file. Absent values take the
 * defaults.
 */
export function makeConfig(input: unknown): Config {
  const valid = validateConfigInput(input ?? {});

  return {
    logging: {
      level: valid.logging?.level ?? defaults.logging.level,
      name: valid.logging?.name ?? defaults.logging.name,
      destination: valid.logging?.destination ?? defaults.logging.destination,
    },
    print: {
      destination: valid.print?.destination ?? defaults.print.destination,
    },
  };
}

/**
 * Optional convenience around {@link makeConfig} which reads the input from a
 * YAML file. A missing file counts as an empty one; `false` skips reading
 * altogether. Nothing in the stopwatch itself needs a config file.
 */
export async function readConfig(configPath: string | false) {
  if (configPath === false) {
    return makeConfig({});
  }
  const yaml = await readOptionalFile(configPath);
  return makeConfig(yaml === null ? {} : YAML.parse(yaml));
}

/**
 * Installs the process-wide logger and print output described by `config`.
 */
export function configure(config: Readonly<Config>) {
  setDefaultLogger(createLogger(config.logging));
  setDefaultOutput(resolveOutput(config.print.destination));
}

async function readOptionalFile(path: string) {
  try {
    return await fs.promises.readFile(path, { encoding: 'utf-8' });
  } catch (e: Throwable) {
    if (e.code === 'ENOENT') {
      return null;
    }
    throw e;
  }
}

function validateConfigInput(input: unknown): InputConfig {
  if (validateInput(input)) {
    return input;
  }
  const problems = (validateInput.errors ?? []).map(e => `${e.instancePath} ${e.message}`);
  throw new Error(`Configuration is invalid:\n${problems.join('\n')}`);
}

const logLevels: LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];
const destinations = [OutputDestination.Stdout, OutputDestination.Stderr];

export interface Config {
  logging: Readonly<LoggingConfig>;
  print: Readonly<PrintConfig>;
}

export interface LoggingConfig {
  level: LevelWithSilent;
  name: string;
  destination: OutputDestination;
}

export interface PrintConfig {
  destination: OutputDestination;
}

/**
 * The definition for reading the config file.
 */
export interface InputConfig {
  logging?: InputLoggingConfig | null;
  print?: InputPrintConfig | null;
}

export interface InputLoggingConfig {
  level?: LevelWithSilent | null;
  name?: string | null;
  destination?: OutputDestination | null;
}

export interface InputPrintConfig {
  destination?: OutputDestination | null;
}

const inputSchema: JSONSchemaType<InputConfig> = {
  type: 'object',
  additionalProperties: false,
  properties: {
    logging: {
      type: 'object',
      additionalProperties: false,
      nullable: true,
      properties: {
        level: { type: 'string', nullable: true, enum: logLevels },
        name: { type: 'string', nullable: true, minLength: 1 },
        destination: { type: 'string', nullable: true, enum: destinations },
      },
    },
    print: {
      type: 'object',
      additionalProperties: false,
      nullable: true,
      properties: {
        destination: { type: 'string', nullable: true, enum: destinations },
      },
    },
  },
};

const validateInput = new AjvModule.default({ allErrors: true }).compile(inputSchema);
