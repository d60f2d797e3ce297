/**
 * 入力位置の追跡
 */

export interface Position {
  line: number;
  column: number;
  offset: number;
}

export interface Span {
  start: Position;
  end: Position;
}

export const START_POSITION: Position = { line: 1, column: 1, offset: 0 };

const NEWLINE = 0x0a;

/** UTF-8でのバイト長 */
export function utf8Length(codePoint: number): number {
  if (codePoint < 0x80) return 1;
  if (codePoint < 0x800) return 2;
  if (codePoint < 0x10000) return 3;
  return 4;
}

export function advancePosition(pos: Position, codePoint: number): Position {
  const offset = pos.offset + utf8Length(codePoint);
  if (codePoint === NEWLINE) {
    return { line: pos.line + 1, column: 1, offset };
  }
  return { line: pos.line, column: pos.column + 1, offset };
}

export class PositionTracker {
  private pos: Position;

  constructor(start: Position = START_POSITION) {
    this.pos = start;
  }

  get current(): Position {
    return this.pos;
  }

  advance(codePoint: number): Position {
    this.pos = advancePosition(this.pos, codePoint);
    return this.pos;
  }

  advanceText(text: string): Position {
    for (const ch of text) {
      this.advance(codePointOf(ch));
    }
    return this.pos;
  }
}

export function codePointOf(ch: string): number {
  return ch.codePointAt(0) ?? 0;
}

export function formatPosition(pos: Position): string {
  return `${pos.line}:${pos.column}`;
}
