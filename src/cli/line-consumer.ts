/**
 * Line Consumer
 *
 * Renders tailed lines for the terminal, optionally prefixed with the path
 * they came from.
 */

export interface LineConsumerOptions {
  /** Prefix lines with "<path>: " (default: true) */
  withFilenames?: boolean;
  /** Destination (default: process.stdout) */
  output?: NodeJS.WritableStream;
}

export class LineConsumer {
  readonly withFilenames: boolean;
  private readonly output: NodeJS.WritableStream;

  constructor(options: LineConsumerOptions = {}) {
    this.withFilenames = options.withFilenames ?? true;
    this.output = options.output ?? process.stdout;
  }

  format(path: string, line: string): string {
    return this.withFilenames ? `${path}: ${line}` : line;
  }

  /**
   * Bound, so it can be handed around as a LineHandler
   */
  readonly onLine = (path: string, line: string): void => {
    this.output.write(`${this.format(path, line)}\n`);
  };
}
