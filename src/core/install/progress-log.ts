/**
 * Append-only record of the status lines produced during one run.
 * Logic never reads it back; it is handed to the presentation layer.
 */
export class ProgressLog {
  private readonly lines: string[] = [];

  constructor(private readonly onAppend?: (line: string) => void) {}

  append(line: string): void {
    this.lines.push(line);
    this.onAppend?.(line);
  }

  entries(): readonly string[] {
    return Object.freeze([...this.lines]);
  }
}
