/**
 * Raised for conditions that stop the slideshow before it starts
 * (bad root directory, nothing to show). The CLI prints the message and exits.
 */
export class SlideshowStartupError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = 'SlideshowStartupError';
    this.exitCode = exitCode;
  }
}
