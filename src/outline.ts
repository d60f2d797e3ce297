/**
 * トークン列を入れ子の深さで字下げして表示する
 */

import { formatPosition } from './pos.js';
import { tokenText } from './printer.js';
import { SexprFormat } from './settings.js';
import { Token } from './token.js';

export interface OutlineOptions {
  format: SexprFormat | string;
  showPosition: boolean;
}

export class TokenOutline {
  private options: OutlineOptions;
  private depth = 0;
  /** トップレベルで開いたリストの数 */
  toplevel = 0;
  /** 開いたリストの総数 */
  entered = 0;

  constructor(options: Partial<OutlineOptions> = {}) {
    this.options = {
      format: 'r7rs',
      showPosition: false,
      ...options,
    };
  }

  /** トークン一つ分の行。開き括弧は外側の深さ、閉じ括弧は対応する開き括弧と同じ深さに置く */
  line(token: Token): string {
    let level = this.depth;
    if (token.type === 'open') {
      if (this.depth === 0) this.toplevel++;
      this.entered++;
      this.depth++;
    } else if (token.type === 'close') {
      this.depth = Math.max(0, this.depth - 1);
      level = this.depth;
    }

    const text = tokenText(token, this.options.format);
    const shown = token.type === 'whitespace' ? JSON.stringify(text) : text;
    const body = `${token.type}\t${shown}`;
    const indent = '  '.repeat(level);
    if (!this.options.showPosition) return indent + body;
    return `${indent}${formatPosition(token.span.start)}-${formatPosition(token.span.end)}\t${body}`;
  }

  summary(): string {
    return `;; count_toplevel = ${this.toplevel}, count_enter = ${this.entered}`;
  }
}
