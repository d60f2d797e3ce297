/**
 * トークン列から値を組み立てる再帰下降パーサー
 *
 * 入れ子はネイティブのコールスタックではなく明示的なフレームのスタックで管理するため、
 * 深さはメモリ量だけで制限され、任意のトークン境界で中断・再開できる。
 */

import { classifyAtom } from './atom.js';
import { ParseError } from './errors.js';
import { Position, Span, formatPosition } from './pos.js';
import { ReaderOptions, ReaderSettings, resolveSettings } from './settings.js';
import {
  CLOSING,
  NEED_MORE_TOKEN,
  NeedMore,
  OPENING,
  OpenBracket,
  QUOTE_PREFIX,
  QuoteMarker,
  Token,
  TokenSource,
  closerOf,
} from './token.js';
import { Sym, Value, improper } from './value.js';

export interface EndOfInput {
  type: 'eof';
}

export const EOF: EndOfInput = { type: 'eof' };

export type ReadResult = Value | EndOfInput | NeedMore;

type Frame =
  | { type: 'list'; bracket: OpenBracket; start: Position; elements: Value[]; dot?: Position; tail?: Value }
  | { type: 'prefix'; marker: QuoteMarker; span: Span }
  | { type: 'skip'; start: Position };

export class Parser {
  readonly settings: ReaderSettings;
  private stack: Frame[] = [];

  constructor(private readonly tokens: TokenSource, options: ReaderOptions = {}) {
    this.settings = resolveSettings(options);
  }

  /**
   * トップレベルの値を一つ読む
   * エラーの場合は読みかけの状態を破棄する（以前に読んだ値には影響しない）
   */
  read(): ReadResult {
    try {
      return this.readValue();
    } catch (err) {
      this.stack = [];
      throw err;
    }
  }

  readAll(): Value[] {
    const values: Value[] = [];
    for (;;) {
      const result = this.read();
      if (result.type === 'need-more') {
        throw new Error('Parser.readAll: token source needs more input');
      }
      if (result.type === 'eof') return values;
      values.push(result);
    }
  }

  private readValue(): ReadResult {
    for (;;) {
      const token = this.tokens.next();
      let value: Value;
      switch (token.type) {
        case 'need-more':
          return NEED_MORE_TOKEN;
        case 'comment':
        case 'whitespace':
          continue;
        case 'eof':
          if (this.stack.length === 0) return EOF;
          throw this.unexpectedEnd(token);
        case 'open':
          this.stack.push({ type: 'list', bracket: token.bracket, start: token.span.start, elements: [] });
          continue;
        case 'close':
          value = this.close(token);
          break;
        case 'quote':
          this.stack.push({ type: 'prefix', marker: token.marker, span: token.span });
          continue;
        case 'datum-comment':
          this.stack.push({ type: 'skip', start: token.span.start });
          continue;
        case 'atom':
          if (token.text === '.' && this.settings.format.dottedPairs) {
            this.dot(token);
            continue;
          }
          value = classifyAtom(token.text, token.span, this.settings.format);
          break;
        case 'string':
          value = { type: 'string', value: token.value, span: token.span };
          break;
        case 'symbol':
          value = { type: 'symbol', symbol: Sym.intern(token.name), span: token.span };
          break;
        case 'char':
          value = { type: 'char', value: token.value, span: token.span };
          break;
        case 'keyword':
          value =
            token.style === 'hash' && !this.settings.format.hashColonIsKeyword
              ? { type: 'symbol', symbol: Sym.uninterned(token.name), span: token.span }
              : { type: 'keyword', name: token.name, style: token.style, span: token.span };
          break;
      }
      const done = this.complete(value, token.span.end);
      if (done) return done;
    }
  }

  /** 読み終えた値を外側のフレームに渡す。トップレベルに達したらその値を返す */
  private complete(value: Value, end: Position): Value | undefined {
    let current = value;
    for (;;) {
      const top = this.stack[this.stack.length - 1];
      if (!top) return current;
      switch (top.type) {
        case 'prefix': {
          this.stack.pop();
          const head: Value = { type: 'symbol', symbol: Sym.intern(top.marker), span: top.span };
          current = { type: 'list', bracket: 'round', elements: [head, current], span: { start: top.span.start, end } };
          continue;
        }
        case 'skip':
          this.stack.pop();
          return undefined;
        case 'list':
          if (top.dot) {
            if (top.tail) {
              throw new ParseError(
                'MalformedDotNotation',
                "expected exactly one datum after '.'",
                current.span?.start ?? top.dot
              );
            }
            top.tail = current;
          } else {
            top.elements.push(current);
          }
          return undefined;
      }
    }
  }

  private dot(token: Token): void {
    const top = this.stack[this.stack.length - 1];
    const pos = token.span.start;
    if (!top || top.type !== 'list') {
      throw new ParseError('MalformedDotNotation', "'.' outside of a list", pos);
    }
    if (top.bracket === 'vector') {
      throw new ParseError('MalformedDotNotation', "'.' is not allowed in a vector", pos);
    }
    if (top.dot) {
      throw new ParseError('MalformedDotNotation', "more than one '.' in a list", pos);
    }
    if (top.elements.length === 0) {
      throw new ParseError('MalformedDotNotation', "'.' without a preceding datum", pos);
    }
    top.dot = pos;
  }

  private close(token: Extract<Token, { type: 'close' }>): Value {
    const top = this.stack[this.stack.length - 1];
    const pos = token.span.start;
    const closing = CLOSING[token.bracket];
    if (!top) {
      throw new ParseError('UnexpectedToken', `unexpected closing '${closing}'`, pos);
    }
    if (top.type === 'prefix') {
      throw new ParseError('UnexpectedToken', `missing datum after '${QUOTE_PREFIX[top.marker]}' before '${closing}'`, pos);
    }
    if (top.type === 'skip') {
      throw new ParseError('UnexpectedToken', `missing datum after '#;' before '${closing}'`, pos);
    }

    const expected = closerOf(top.bracket);
    if (expected !== token.bracket) {
      throw new ParseError(
        'MismatchedBracket',
        `'${OPENING[top.bracket]}' opened at ${formatPosition(top.start)} expects '${CLOSING[expected]}', got '${closing}'`,
        pos
      );
    }
    this.stack.pop();
    const span = { start: top.start, end: token.span.end };

    if (top.dot) {
      if (!top.tail) {
        throw new ParseError('MalformedDotNotation', "missing datum after '.'", top.dot);
      }
      const result = improper(top.elements, top.tail, expected, span);
      if (result.type === 'improper-list' && !this.settings.allowImproperLists) {
        throw new ParseError('MalformedDotNotation', 'improper lists are not allowed', top.dot);
      }
      return result;
    }
    if (top.bracket === 'vector') {
      return { type: 'vector', elements: top.elements, span };
    }
    return { type: 'list', bracket: expected, elements: top.elements, span };
  }

  private unexpectedEnd(token: Token): ParseError {
    const top = this.stack[this.stack.length - 1];
    if (!top) {
      return new ParseError('UnexpectedEndOfInput', 'unexpected end of input', token.span.start);
    }
    switch (top.type) {
      case 'list':
        return new ParseError(
          'UnexpectedEndOfInput',
          `unexpected end of input: missing '${CLOSING[closerOf(top.bracket)]}' for '${OPENING[top.bracket]}'`,
          top.start
        );
      case 'prefix':
        return new ParseError(
          'UnexpectedEndOfInput',
          `unexpected end of input after '${QUOTE_PREFIX[top.marker]}'`,
          top.span.start
        );
      case 'skip':
        return new ParseError('UnexpectedEndOfInput', "unexpected end of input after '#;'", top.start);
    }
  }
}
