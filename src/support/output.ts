/**
 * A text sink for {@link Stopwatch.print}.
 */
export interface Output {
  write(chunk: string): unknown;
}

export enum OutputDestination {
  Stdout = 'stdout',
  Stderr = 'stderr',
}

let defaultOutput: Output = process.stdout;

export function resolveOutput(destination: OutputDestination): Output {
  switch (destination) {
    case OutputDestination.Stdout:
      return process.stdout;
    case OutputDestination.Stderr:
      return process.stderr;
  }
}

export function getDefaultOutput() {
  return defaultOutput;
}

export function setDefaultOutput(output: Output) {
  defaultOutput = output;
}
