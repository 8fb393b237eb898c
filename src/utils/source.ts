/**
 * Constraint source text
 */

import { type Position, type SourceSpan, position, span } from "./span";

export class SourceFile {
  readonly name: string;
  readonly content: string;
  private lineStarts: number[];

  constructor(name: string, content: string) {
    this.name = name;
    this.content = content;
    this.lineStarts = this.computeLineStarts();
  }

  private computeLineStarts(): number[] {
    const starts = [0];
    for (let i = 0; i < this.content.length; i++) {
      if (this.content[i] === "\n") {
        starts.push(i + 1);
      }
    }
    return starts;
  }

  positionAt(offset: number): Position {
    const clamped = Math.min(Math.max(offset, 0), this.content.length);

    // Binary search for the line
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      if (this.lineStarts[mid] <= clamped) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }

    return position(low + 1, clamped - this.lineStarts[low] + 1, clamped);
  }

  spanAt(start: number, end: number): SourceSpan {
    return span(this.name, this.positionAt(start), this.positionAt(end));
  }

  getLine(lineNumber: number): string {
    if (lineNumber < 1 || lineNumber > this.lineStarts.length) {
      return "";
    }
    const start = this.lineStarts[lineNumber - 1];
    const end =
      lineNumber < this.lineStarts.length
        ? this.lineStarts[lineNumber] - 1
        : this.content.length;
    return this.content.slice(start, end);
  }
}
