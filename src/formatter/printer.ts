import { IRPath } from '../types';

interface PrinterResultOptions {
  trimTrailingWhitespace: boolean;
  insertFinalNewline: boolean;
}

// A generated line that starts the node at `path`; lines are 1-based
export interface PrinterMark {
  line: number;
  path: IRPath;
}

export class Printer {
  private output: string[] = [];
  private current = '';
  private indentLevel = 0;
  private marks: PrinterMark[] = [];

  constructor(private readonly indentSize: number, private readonly maxBlankLines: number = 1) {}

  reset(): void {
    this.output = [];
    this.current = '';
    this.indentLevel = 0;
    this.marks = [];
  }

  // Appends to the current line, indenting it on its first write
  write(text: string): void {
    if (text.length === 0) {
      return;
    }
    if (this.current.length === 0) {
      this.current = ' '.repeat(this.indentLevel * this.indentSize);
    }
    this.current += text;
  }

  writeLine(text: string = ''): void {
    this.write(text);
    if (this.current.trim().length === 0) {
      this.current = '';
      this.blankLine();
      return;
    }
    this.output.push(this.current);
    this.current = '';
  }

  // Blank lines never lead the output and never run longer than the maximum
  blankLine(): void {
    if (this.current.length > 0) {
      this.writeLine();
      return;
    }
    if (this.output.length === 0 || this.trailingBlankLines() >= this.maxBlankLines) {
      return;
    }
    this.output.push('');
  }

  increaseIndent(): void {
    this.indentLevel += 1;
  }

  decreaseIndent(): void {
    this.indentLevel = Math.max(0, this.indentLevel - 1);
  }

  indented(body: () => void): void {
    this.increaseIndent();
    body();
    this.decreaseIndent();
  }

  // Inserts finished lines before everything written so far
  prepend(lines: readonly string[]): void {
    if (lines.length === 0) {
      return;
    }
    this.output.unshift(...lines);
    this.marks = this.marks.map(mark => ({ line: mark.line + lines.length, path: mark.path }));
  }

  // Records that the next line written starts the node at `path`
  mark(path: IRPath): void {
    this.marks.push({ line: this.output.length + 1, path });
  }

  getCurrentLine(): number {
    return this.output.length + 1;
  }

  getCurrentLineLength(): number {
    return this.current.length;
  }

  getMarks(): readonly PrinterMark[] {
    return this.marks;
  }

  getResult(options: PrinterResultOptions): string {
    const lines = this.current.length > 0 ? [...this.output, this.current] : [...this.output];
    while (lines.length > 0 && lines[lines.length - 1].length === 0) {
      lines.pop();
    }
    let result = lines.join('\n');

    if (options.trimTrailingWhitespace) {
      result = result.replace(/[ \t]+$/gm, '');
    }

    if (options.insertFinalNewline && !result.endsWith('\n')) {
      result += '\n';
    }

    return result;
  }

  private trailingBlankLines(): number {
    let count = 0;
    for (let i = this.output.length - 1; i >= 0 && this.output[i].length === 0; i--) {
      count++;
    }
    return count;
  }
}
