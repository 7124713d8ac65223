/**
 * Modweave CLI — Output
 *
 * Commands write through a Printer so tests can capture what a command
 * prints. Results go to stdout; diagnostics and load events to stderr.
 */

export interface Printer {
  out(line: string): void;
  err(line: string): void;
}

export const consolePrinter: Printer = {
  out(line) {
    // eslint-disable-next-line no-console
    console.log(line);
  },
  err(line) {
    // eslint-disable-next-line no-console
    console.error(line);
  },
};

/** Collects lines in memory. */
export class BufferPrinter implements Printer {
  readonly stdout: string[] = [];
  readonly stderr: string[] = [];

  out(line: string): void {
    this.stdout.push(line);
  }

  err(line: string): void {
    this.stderr.push(line);
  }
}
