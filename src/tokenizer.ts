/**
 * S式のトークナイザー
 *
 * 字句解析は明示的な状態値と一文字ずつ進める `step` 関数で表現する。
 * 入力が途中で尽きた場合は状態を保持したまま `need-more` を返し、
 * 次の `write` の後にそのまま再開できる。
 */

import { CharDecoder, END, NEED_MORE } from './decoder.js';
import { TokenizeError } from './errors.js';
import { Position, PositionTracker, advancePosition, codePointOf } from './pos.js';
import { ReaderOptions, ReaderSettings, SexprFormat, resolveSettings } from './settings.js';
import { ByteSource, pump } from './source.js';
import { NEED_MORE_TOKEN, NeedMore, Token, TokenKind, TokenSource } from './token.js';

type Escape =
  | { mode: 'none' }
  | { mode: 'backslash' }
  | { mode: 'hex'; digits: string; max: number; exact: boolean; terminated: boolean; start: Position }
  | { mode: 'octal'; digits: string }
  | { mode: 'continuation' };

/** `keyword` は `#:|…|`、`colon-keyword` は `:|…|` */
type DelimitedInto = 'string' | 'symbol' | 'keyword' | 'colon-keyword';

export type LexState =
  | { tag: 'idle' }
  | { tag: 'whitespace'; start: Position; text: string }
  | { tag: 'atom'; start: Position; text: string }
  | { tag: 'delimited'; start: Position; delimiter: number; into: DelimitedInto; text: string; escape: Escape }
  | { tag: 'symbol-end'; start: Position; name: string }
  | { tag: 'line-comment'; start: Position; text: string }
  | { tag: 'block-comment'; start: Position; text: string; depth: number; last: number }
  | { tag: 'hash'; start: Position }
  | { tag: 'char'; start: Position; text: string }
  | { tag: 'keyword-start'; start: Position }
  | { tag: 'keyword'; start: Position; text: string }
  | { tag: 'comma'; start: Position };

export interface Step {
  state: LexState;
  /** falseなら同じ文字を次の状態でもう一度処理する */
  consumed: boolean;
  token?: Token;
  error?: TokenizeError;
}

export const IDLE: LexState = { tag: 'idle' };

const ch = codePointOf;

const QUOTE = ch('"');
const BAR = ch('|');
const HASH = ch('#');
const BACKSLASH = ch('\\');
const SEMICOLON = ch(';');
const NEWLINE = ch('\n');
const AT = ch('@');
const COLON = ch(':');

const DELIMITERS = new Set([...'()[]{}";\'`,|'].map(ch));

const WHITESPACE = /^\s$/u;

export function isWhitespace(c: number): boolean {
  if (c === 0x20 || (c >= 0x09 && c <= 0x0d)) return true;
  return c > 0x7f && WHITESPACE.test(String.fromCodePoint(c));
}

/** アトムを終わらせる文字 */
export function isDelimiter(c: number): boolean {
  return isWhitespace(c) || DELIMITERS.has(c);
}

const STRING_ESCAPES: Record<string, string> = {
  a: '\x07',
  b: '\x08',
  t: '\t',
  n: '\n',
  r: '\r',
  v: '\x0b',
  f: '\x0c',
  '0': '\0',
  '\\': '\\',
  '"': '"',
  "'": "'",
  '|': '|',
};

const CHAR_NAMES: Record<string, string> = {
  alarm: '\x07',
  backspace: '\x08',
  delete: '\x7f',
  rubout: '\x7f',
  escape: '\x1b',
  altmode: '\x1b',
  newline: '\n',
  linefeed: '\n',
  null: '\0',
  nul: '\0',
  page: '\x0c',
  return: '\r',
  space: ' ',
  tab: '\t',
};

const HEX = /^[0-9a-fA-F]+$/;

function isOctalDigit(c: number): boolean {
  return c >= 0x30 && c <= 0x37;
}

function isHexDigit(c: number): boolean {
  return (c >= 0x30 && c <= 0x39) || (c >= 0x41 && c <= 0x46) || (c >= 0x61 && c <= 0x66);
}

/** 16進文字列をUnicodeスカラー値に変換する（不正ならundefined） */
function hexToScalar(hex: string): string | undefined {
  if (!HEX.test(hex) || hex.length > 8) return undefined;
  const code = parseInt(hex, 16);
  if (code > 0x10ffff || (code >= 0xd800 && code <= 0xdfff)) return undefined;
  return String.fromCodePoint(code);
}

function resolveCharName(text: string): string | undefined {
  if ([...text].length === 1) return text;
  const named = CHAR_NAMES[text];
  if (named !== undefined) return named;
  const first = text[0];
  if (first === 'x' || first === 'u' || first === 'U') {
    return hexToScalar(text.slice(1));
  }
  return undefined;
}

function token(kind: TokenKind, start: Position, end: Position): Token {
  return { ...kind, span: { start, end } };
}

function emit(kind: TokenKind, start: Position, end: Position, consumed: boolean): Step {
  return { state: IDLE, consumed, token: token(kind, start, end) };
}

function fail(kind: TokenizeError['kind'], message: string, pos: Position, consumed: boolean): Step {
  return { state: IDLE, consumed, error: new TokenizeError(kind, message, pos) };
}

function keep(state: LexState): Step {
  return { state, consumed: true };
}

function describeDelimited(into: DelimitedInto): string {
  switch (into) {
    case 'string':
      return 'string';
    case 'symbol':
      return '|symbol|';
    case 'keyword':
    case 'colon-keyword':
      return 'keyword';
  }
}

/**
 * 一文字（またはEND）を与えて状態を一つ進める
 * @param here 文字 `c` の位置
 * @param after `c` を消費した後の位置
 */
export function step(
  state: LexState,
  c: number | typeof END,
  here: Position,
  after: Position,
  format: SexprFormat
): Step {
  switch (state.tag) {
    case 'idle':
      return stepIdle(c, here, after);

    case 'whitespace':
      if (c !== END && isWhitespace(c)) {
        return keep({ ...state, text: state.text + String.fromCodePoint(c) });
      }
      return emit({ type: 'whitespace', text: state.text }, state.start, here, false);

    case 'atom':
      if (c === BAR && state.text === ':' && format.colonKeywords === 'prefix') {
        return keep({ tag: 'delimited', start: state.start, delimiter: BAR, into: 'colon-keyword', text: '', escape: { mode: 'none' } });
      }
      if (c === END || isDelimiter(c)) {
        return emit({ type: 'atom', text: state.text }, state.start, here, false);
      }
      return keep({ ...state, text: state.text + String.fromCodePoint(c) });

    case 'comma':
      if (c === AT) {
        return emit({ type: 'quote', marker: 'unquote-splicing' }, state.start, after, true);
      }
      return emit({ type: 'quote', marker: 'unquote' }, state.start, here, false);

    case 'line-comment':
      if (c === END || c === NEWLINE) {
        return emit({ type: 'comment', style: 'line', text: state.text }, state.start, here, false);
      }
      return keep({ ...state, text: state.text + String.fromCodePoint(c) });

    case 'block-comment':
      return stepBlockComment(state, c, after);

    case 'hash':
      return stepHash(state, c, after);

    case 'char':
      if (state.text === '') {
        if (c === END) {
          return fail('InvalidCharacterLiteral', 'missing character after #\\', state.start, false);
        }
        return keep({ ...state, text: String.fromCodePoint(c) });
      }
      if (c === END || isDelimiter(c)) {
        const value = resolveCharName(state.text);
        if (value === undefined) {
          return fail('InvalidCharacterLiteral', `invalid character literal #\\${state.text}`, state.start, false);
        }
        return emit({ type: 'char', value }, state.start, here, false);
      }
      return keep({ ...state, text: state.text + String.fromCodePoint(c) });

    case 'keyword-start':
      if (c === BAR) {
        return keep({ tag: 'delimited', start: state.start, delimiter: BAR, into: 'keyword', text: '', escape: { mode: 'none' } });
      }
      if (c === END || isDelimiter(c)) {
        return fail('InvalidHashSyntax', 'missing keyword name after #:', state.start, false);
      }
      return keep({ tag: 'keyword', start: state.start, text: String.fromCodePoint(c) });

    case 'keyword':
      if (c === END || isDelimiter(c)) {
        return emit({ type: 'keyword', name: state.text, style: 'hash' }, state.start, here, false);
      }
      return keep({ ...state, text: state.text + String.fromCodePoint(c) });

    case 'delimited':
      return stepDelimited(state, c, here, after, format);

    case 'symbol-end':
      if (c === COLON) {
        return emit({ type: 'keyword', name: state.name, style: 'suffix' }, state.start, after, true);
      }
      return emit({ type: 'symbol', name: state.name }, state.start, here, false);
  }
}

function stepIdle(c: number | typeof END, here: Position, after: Position): Step {
  if (c === END) {
    return { state: IDLE, consumed: false, token: token({ type: 'eof' }, here, here) };
  }
  if (isWhitespace(c)) {
    return keep({ tag: 'whitespace', start: here, text: String.fromCodePoint(c) });
  }

  switch (String.fromCodePoint(c)) {
    case '(':
      return emit({ type: 'open', bracket: 'round' }, here, after, true);
    case '[':
      return emit({ type: 'open', bracket: 'square' }, here, after, true);
    case '{':
      return emit({ type: 'open', bracket: 'curly' }, here, after, true);
    case ')':
      return emit({ type: 'close', bracket: 'round' }, here, after, true);
    case ']':
      return emit({ type: 'close', bracket: 'square' }, here, after, true);
    case '}':
      return emit({ type: 'close', bracket: 'curly' }, here, after, true);
    case "'":
      return emit({ type: 'quote', marker: 'quote' }, here, after, true);
    case '`':
      return emit({ type: 'quote', marker: 'quasiquote' }, here, after, true);
    case ',':
      return keep({ tag: 'comma', start: here });
    case ';':
      return keep({ tag: 'line-comment', start: here, text: '' });
    case '#':
      return keep({ tag: 'hash', start: here });
    case '"':
      return keep({ tag: 'delimited', start: here, delimiter: QUOTE, into: 'string', text: '', escape: { mode: 'none' } });
    case '|':
      return keep({ tag: 'delimited', start: here, delimiter: BAR, into: 'symbol', text: '', escape: { mode: 'none' } });
    default:
      return keep({ tag: 'atom', start: here, text: String.fromCodePoint(c) });
  }
}

function stepHash(state: { tag: 'hash'; start: Position }, c: number | typeof END, after: Position): Step {
  if (c === END) {
    return fail('InvalidHashSyntax', "lone '#' at end of input", state.start, false);
  }
  switch (String.fromCodePoint(c)) {
    case '\\':
      return keep({ tag: 'char', start: state.start, text: '' });
    case '|':
      return keep({ tag: 'block-comment', start: state.start, text: '', depth: 1, last: 0 });
    case ';':
      return emit({ type: 'datum-comment' }, state.start, after, true);
    case '(':
      return emit({ type: 'open', bracket: 'vector' }, state.start, after, true);
    case ':':
      return keep({ tag: 'keyword-start', start: state.start });
  }
  if (isDelimiter(c)) {
    return fail('InvalidHashSyntax', `invalid '#' syntax before '${String.fromCodePoint(c)}'`, state.start, false);
  }
  // #t #f #true #false #x1F など。分類はアトム層で行う
  return keep({ tag: 'atom', start: state.start, text: '#' + String.fromCodePoint(c) });
}

function stepBlockComment(
  state: Extract<LexState, { tag: 'block-comment' }>,
  c: number | typeof END,
  after: Position
): Step {
  if (c === END) {
    return fail('UnterminatedComment', 'unterminated block comment', state.start, false);
  }
  const text = state.text + String.fromCodePoint(c);
  if (c === HASH && state.last === BAR) {
    if (state.depth === 1) {
      return emit({ type: 'comment', style: 'block', text: text.slice(0, -2) }, state.start, after, true);
    }
    return keep({ ...state, text, depth: state.depth - 1, last: 0 });
  }
  if (c === BAR && state.last === HASH) {
    return keep({ ...state, text, depth: state.depth + 1, last: 0 });
  }
  return keep({ ...state, text, last: c });
}

function stepDelimited(
  state: Extract<LexState, { tag: 'delimited' }>,
  c: number | typeof END,
  here: Position,
  after: Position,
  format: SexprFormat
): Step {
  if (c === END) {
    return fail('UnterminatedString', `unterminated ${describeDelimited(state.into)}`, state.start, false);
  }
  const escape = state.escape;
  switch (escape.mode) {
    case 'none':
      if (c === BACKSLASH) {
        return keep({ ...state, escape: { mode: 'backslash' } });
      }
      if (c === state.delimiter) {
        // Gambitでは `|a b|:` がキーワード
        if (state.into === 'symbol' && format.colonKeywords === 'suffix') {
          return keep({ tag: 'symbol-end', start: state.start, name: state.text });
        }
        return emit(delimitedToken(state.into, state.text), state.start, after, true);
      }
      return keep({ ...state, text: state.text + String.fromCodePoint(c) });

    case 'backslash': {
      if (format.octalEscapes && isOctalDigit(c)) {
        return keep({ ...state, escape: { mode: 'octal', digits: String.fromCodePoint(c) } });
      }
      const e = String.fromCodePoint(c);
      const simple = STRING_ESCAPES[e];
      if (simple !== undefined) {
        return keep({ ...state, text: state.text + simple, escape: { mode: 'none' } });
      }
      switch (e) {
        case 'x':
          return keep({
            ...state,
            escape: {
              mode: 'hex',
              digits: '',
              max: format.hexEscapeMaxDigits,
              exact: false,
              terminated: format.hexEscapeTerminated,
              start: here,
            },
          });
        case 'u':
        case 'U':
          return keep({
            ...state,
            escape: { mode: 'hex', digits: '', max: e === 'u' ? 4 : 8, exact: true, terminated: false, start: here },
          });
        case '\n':
          return keep({ ...state, escape: { mode: 'continuation' } });
      }
      return fail('InvalidEscape', `invalid escape '\\${e}'`, here, true);
    }

    case 'hex':
      return stepHexEscape(state, escape, c);

    case 'octal':
      // 1〜3桁。8進でない文字が来たらそこで終わる
      if (isOctalDigit(c)) {
        const digits = escape.digits + String.fromCodePoint(c);
        if (digits.length < 3) return keep({ ...state, escape: { mode: 'octal', digits } });
        return keep({ ...state, text: state.text + octalToChar(digits), escape: { mode: 'none' } });
      }
      return { state: { ...state, text: state.text + octalToChar(escape.digits), escape: { mode: 'none' } }, consumed: false };

    case 'continuation':
      if (c === 0x20 || c === 0x09) return keep(state);
      return { state: { ...state, escape: { mode: 'none' } }, consumed: false };
  }
}

function octalToChar(digits: string): string {
  return String.fromCodePoint(parseInt(digits, 8));
}

function completeHex(
  state: Extract<LexState, { tag: 'delimited' }>,
  escape: Extract<Escape, { mode: 'hex' }>,
  consumed: boolean
): Step {
  const scalar = hexToScalar(escape.digits);
  if (scalar === undefined) {
    return fail('InvalidEscape', `invalid hex escape '${escape.digits}'`, escape.start, consumed);
  }
  return { state: { ...state, text: state.text + scalar, escape: { mode: 'none' } }, consumed };
}

function stepHexEscape(
  state: Extract<LexState, { tag: 'delimited' }>,
  escape: Extract<Escape, { mode: 'hex' }>,
  c: number
): Step {
  if (escape.terminated && c === SEMICOLON) {
    return completeHex(state, escape, true);
  }
  if (isHexDigit(c) && escape.digits.length < escape.max) {
    const next = { ...escape, digits: escape.digits + String.fromCodePoint(c) };
    if (!next.terminated && next.digits.length === next.max) {
      return completeHex(state, next, true);
    }
    return keep({ ...state, escape: next });
  }
  if (escape.exact || escape.terminated || escape.digits === '') {
    return fail('InvalidEscape', 'malformed hex escape', escape.start, true);
  }
  // 桁数可変のエスケープは16進でない文字で終わる
  return completeHex(state, escape, false);
}

function delimitedToken(into: DelimitedInto, text: string): TokenKind {
  switch (into) {
    case 'string':
      return { type: 'string', value: text };
    case 'symbol':
      return { type: 'symbol', name: text };
    case 'keyword':
      return { type: 'keyword', name: text, style: 'hash' };
    case 'colon-keyword':
      return { type: 'keyword', name: text, style: 'prefix' };
  }
}

/**
 * プル型のトークナイザー
 *
 * `next()` はトークン（EOFを含む）か `need-more` を返し、不正な入力では例外を投げる。
 */
export class Tokenizer implements TokenSource {
  readonly settings: ReaderSettings;
  private state: LexState = IDLE;
  private tracker = new PositionTracker();

  constructor(private readonly decoder: CharDecoder = new CharDecoder(), options: ReaderOptions = {}) {
    this.settings = resolveSettings(options);
  }

  write(chunk: Uint8Array | string): void {
    this.decoder.write(chunk);
  }

  end(): void {
    this.decoder.end();
  }

  get position(): Position {
    return this.tracker.current;
  }

  next(): Token | NeedMore {
    for (;;) {
      const c = this.decoder.peek();
      if (c === NEED_MORE) return NEED_MORE_TOKEN;

      const here = this.tracker.current;
      const after = c === END ? here : advancePosition(here, c);
      const result = step(this.state, c, here, after, this.settings.format);

      if (result.consumed && c !== END) {
        this.decoder.take();
        this.tracker.advance(c);
      }
      if (result.error) {
        this.state = IDLE;
        throw result.error;
      }
      this.state = result.state;

      if (result.token) {
        if (result.token.type === 'comment' && !this.settings.comments) continue;
        if (result.token.type === 'whitespace' && !this.settings.whitespace) continue;
        return result.token;
      }
    }
  }
}

/** 文字列全体をトークン列にする（EOFトークンは含まない） */
export function* tokenizeString(text: string, options: ReaderOptions = {}): Generator<Token> {
  const tokenizer = new Tokenizer(new CharDecoder(), options);
  tokenizer.write(text);
  tokenizer.end();
  for (;;) {
    const t = tokenizer.next();
    if (t.type === 'need-more') {
      throw new Error('Tokenizer requested more input after end');
    }
    if (t.type === 'eof') return;
    yield t;
  }
}

/** 非同期のバイト列ソースからトークンを読み出す */
export function tokenizeStream(source: ByteSource, options: ReaderOptions = {}): AsyncGenerator<Token> {
  const tokenizer = new Tokenizer(new CharDecoder(), options);
  return pump(source, tokenizer, () => {
    const t = tokenizer.next();
    return t.type === 'eof' ? undefined : t;
  });
}
