/** Receives one rendered result line at a time. */
export interface LineSink {
  writeLine(line: string): void;
}

export const consoleSink: LineSink = {
  writeLine(line) {
    console.log(line);
  }
};

/** Collects lines in memory; handy for embedding the writer and for tests. */
export class MemorySink implements LineSink {
  readonly lines: string[] = [];

  writeLine(line: string): void {
    this.lines.push(line);
  }
}
