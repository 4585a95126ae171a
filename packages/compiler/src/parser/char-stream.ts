import type { SourceIndex } from "../diagnostics/types.js";

/** UTF-16 offsets of one line, excluding its line break. */
export interface LineRange {
  start: number;
  end: number;
}

export const computeLineOffsets = (source: string): LineRange[] => {
  const lines: LineRange[] = [];
  let start = 0;
  for (let offset = 0; offset < source.length; offset += 1) {
    if (source[offset] === "\n") {
      lines.push({ start, end: offset });
      start = offset + 1;
    }
  }
  lines.push({ start, end: source.length });
  return lines;
};

export class CharStream {
  readonly filePath: string;
  readonly source: string;
  readonly location = {
    offset: 0,
    line: 0,
    column: 0,
  };

  constructor(source: string, filePath: string) {
    this.source = source;
    this.filePath = filePath;
  }

  get hasCharacters(): boolean {
    return this.location.offset < this.source.length;
  }

  /** Position of the next character */
  index(): SourceIndex {
    return { line: this.location.line, column: this.location.column };
  }

  peek(): string | undefined {
    const codePoint = this.source.codePointAt(this.location.offset);
    return codePoint === undefined ? undefined : String.fromCodePoint(codePoint);
  }

  /** Returns the next character and removes it from the queue */
  consume(): string {
    const char = this.peek();
    if (char === undefined) {
      throw new Error("Out of characters");
    }

    this.location.offset += char.length;
    this.location.column += 1;
    if (char === "\n") {
      this.location.line += 1;
      this.location.column = 0;
    }

    return char;
  }

  consumeIf(expected: string): boolean {
    if (this.peek() !== expected) return false;
    this.consume();
    return true;
  }

  lines(): LineRange[] {
    return computeLineOffsets(this.source);
  }
}
