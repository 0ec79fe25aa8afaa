// ─── Line Cursor ────────────────────────────────────────────────────────────
//
// The line parsers read their input through a cursor that can hand lines
// back (so a block parser can stop at a line that belongs to the next block)
// and can be restarted from the top.

/**
 * Normalize line endings and split into lines. Trailing blank lines are
 * dropped.
 */
export function normalizeSplitText(text: string): string[] {
  const lines = text.replace(/\r\n?/g, '\n').split('\n');
  while (lines.length > 0 && lines[lines.length - 1]!.trim() === '') {
    lines.pop();
  }
  return lines;
}

export class LineCursor implements Iterable<string> {
  private readonly lines: readonly string[];
  private index = 0;
  private readonly pushed: string[] = [];

  constructor(lines: readonly string[]) {
    this.lines = lines;
  }

  static fromText(text: string): LineCursor {
    return new LineCursor(normalizeSplitText(text));
  }

  /** Next line, or undefined at the end. */
  next(): string | undefined {
    if (this.pushed.length > 0) return this.pushed.pop();
    if (this.index >= this.lines.length) return undefined;
    return this.lines[this.index++];
  }

  peek(): string | undefined {
    if (this.pushed.length > 0) return this.pushed[this.pushed.length - 1];
    return this.lines[this.index];
  }

  /** Give a line back; it is the next one returned. */
  push(line: string): void {
    this.pushed.push(line);
  }

  get done(): boolean {
    return this.pushed.length === 0 && this.index >= this.lines.length;
  }

  restart(): void {
    this.index = 0;
    this.pushed.length = 0;
  }

  *[Symbol.iterator](): Iterator<string> {
    let line = this.next();
    while (line !== undefined) {
      yield line;
      line = this.next();
    }
  }
}
