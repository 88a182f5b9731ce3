/**
 * Error types raised by the generator
 */

/**
 * The rendered document could not be written to its destination
 */
export class TimelineWriteError extends Error {
  readonly outputFile: string;

  constructor(outputFile: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write timeline to ${outputFile}: ${reason}`, { cause });
    this.name = 'TimelineWriteError';
    this.outputFile = outputFile;
  }
}
