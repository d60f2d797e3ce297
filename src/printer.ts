/**
 * 値をトークン列・テキストに戻すプリンター
 * 出力は遅延生成されるので、全体を文字列にせずにストリームへ書き出せる
 */

import { once } from 'events';
import { readsAsSymbol } from './atom.js';
import { PositionTracker } from './pos.js';
import { SexprFormat, lookupFormat } from './settings.js';
import { CLOSING, KeywordStyle, OPENING, QUOTE_PREFIX, QuoteMarker, Token, TokenKind } from './token.js';
import { isDelimiter, isWhitespace } from './tokenizer.js';
import { Leaf, Value } from './value.js';

export interface PrintOptions {
  format: SexprFormat | string;
  /** `(quote x)` を `'x` と書く */
  abbreviateQuotes: boolean;
}

interface ResolvedPrintOptions {
  format: SexprFormat;
  abbreviateQuotes: boolean;
}

function resolvePrintOptions(options: Partial<PrintOptions>): ResolvedPrintOptions {
  return {
    abbreviateQuotes: options.abbreviateQuotes ?? false,
    format: lookupFormat(options.format),
  };
}

const CHAR_OUTPUT_NAMES: Record<string, string> = {
  '\x07': 'alarm',
  '\x08': 'backspace',
  '\x7f': 'delete',
  '\x1b': 'escape',
  '\n': 'newline',
  '\0': 'null',
  '\r': 'return',
  ' ': 'space',
  '\t': 'tab',
};

const QUOTE_MARKERS: QuoteMarker[] = ['quote', 'quasiquote', 'unquote', 'unquote-splicing'];

function isControl(cp: number): boolean {
  return cp < 0x20 || cp === 0x7f;
}

function hexEscape(cp: number, format: SexprFormat): string {
  const hex = cp.toString(16);
  return format.hexEscapeTerminated ? `\\x${hex};` : `\\u${hex.padStart(4, '0')}`;
}

/** `"..."` や `|...|` の中身をエスケープする */
export function escapeDelimited(text: string, delimiter: '"' | '|', format: SexprFormat): string {
  let out = '';
  for (const c of text) {
    const cp = c.codePointAt(0) ?? 0;
    if (c === '\\' || c === delimiter) {
      out += '\\' + c;
    } else if (c === '\n') {
      out += '\\n';
    } else if (c === '\t') {
      out += '\\t';
    } else if (c === '\r') {
      out += '\\r';
    } else if (isControl(cp)) {
      out += hexEscape(cp, format);
    } else {
      out += c;
    }
  }
  return out;
}

function hasDelimiter(name: string): boolean {
  for (const c of name) {
    if (isDelimiter(c.codePointAt(0) ?? 0)) return true;
  }
  return false;
}

function keywordText(name: string, style: KeywordStyle, format: SexprFormat): string {
  const plain = name !== '' && !hasDelimiter(name);
  const quoted = `|${escapeDelimited(name, '|', format)}|`;
  switch (style) {
    case 'hash':
      return '#:' + (plain ? name : quoted);
    case 'prefix':
      return ':' + (plain ? name : quoted);
    case 'suffix':
      return (plain && !name.startsWith('#') ? name : quoted) + ':';
  }
}

/** その書式で読めるキーワードの綴り。読めなければ書式本来の綴りにする */
function keywordStyleFor(style: KeywordStyle, format: SexprFormat): KeywordStyle {
  const readable = style === 'hash' ? format.hashColonIsKeyword : format.colonKeywords === style;
  if (readable) return style;
  return format.colonKeywords === 'none' ? 'hash' : format.colonKeywords;
}

function charText(value: string): string {
  const named = CHAR_OUTPUT_NAMES[value];
  if (named !== undefined) return named;
  const cp = value.codePointAt(0) ?? 0;
  if (isControl(cp) || isWhitespace(cp)) return 'x' + cp.toString(16);
  return value;
}

/** トークン一つ分のソーステキスト */
export function tokenText(token: TokenKind, format: SexprFormat | string = 'r7rs'): string {
  const fmt = lookupFormat(format);
  switch (token.type) {
    case 'open':
      return OPENING[token.bracket];
    case 'close':
      return CLOSING[token.bracket];
    case 'atom':
      return token.text;
    case 'string':
      return `"${escapeDelimited(token.value, '"', fmt)}"`;
    case 'symbol':
      return `|${escapeDelimited(token.name, '|', fmt)}|`;
    case 'char':
      return '#\\' + charText(token.value);
    case 'keyword':
      return keywordText(token.name, token.style, fmt);
    case 'quote':
      return QUOTE_PREFIX[token.marker];
    case 'datum-comment':
      return '#;';
    case 'comment':
      return token.style === 'line' ? ';' + token.text : `#|${token.text}|#`;
    case 'whitespace':
      return token.text;
    case 'eof':
      return '';
  }
}

function quoteForm(value: Value): { marker: QuoteMarker; datum: Value } | undefined {
  if (value.type !== 'list' || value.bracket !== 'round' || value.elements.length !== 2) return undefined;
  const [head, datum] = value.elements;
  if (head.type !== 'symbol') return undefined;
  const marker = QUOTE_MARKERS.find((m) => m === head.symbol.name);
  if (!marker) return undefined;
  // `,@x` と読まれてしまう
  if (marker === 'unquote' && datum.type === 'symbol' && datum.symbol.name.startsWith('@')) return undefined;
  return { marker, datum };
}

function leafToken(value: Leaf, format: SexprFormat): TokenKind {
  switch (value.type) {
    case 'boolean':
      return { type: 'atom', text: value.value ? '#t' : '#f' };
    case 'integer':
      return { type: 'atom', text: value.value.toString() };
    case 'symbol': {
      const name = value.symbol.name;
      if (!value.symbol.interned) return { type: 'keyword', name, style: 'hash' };
      return readsAsSymbol(name, format) && !hasDelimiter(name)
        ? { type: 'atom', text: name }
        : { type: 'symbol', name };
    }
    case 'keyword':
      return { type: 'keyword', name: value.name, style: keywordStyleFor(value.style, format) };
    case 'char':
      return { type: 'char', value: value.value };
    case 'string':
      return { type: 'string', value: value.value };
  }
}

type Work = { kind: 'value'; value: Value } | { kind: 'token'; token: TokenKind };

/**
 * 値をトークン列に展開する（位置なし）
 * 深い入れ子でもコールスタックを使わないように明示的なスタックで辿る
 */
function* structuralTokens(value: Value, options: ResolvedPrintOptions): Generator<TokenKind> {
  const stack: Work[] = [{ kind: 'value', value }];
  const pushElements = (elements: Value[]) => {
    for (let i = elements.length - 1; i >= 0; i--) {
      stack.push({ kind: 'value', value: elements[i] });
    }
  };

  for (let work = stack.pop(); work; work = stack.pop()) {
    if (work.kind === 'token') {
      yield work.token;
      continue;
    }
    const v = work.value;
    switch (v.type) {
      case 'list': {
        const quoted = options.abbreviateQuotes ? quoteForm(v) : undefined;
        if (quoted) {
          stack.push({ kind: 'value', value: quoted.datum });
          yield { type: 'quote', marker: quoted.marker };
          break;
        }
        stack.push({ kind: 'token', token: { type: 'close', bracket: v.bracket } });
        pushElements(v.elements);
        yield { type: 'open', bracket: v.bracket };
        break;
      }
      case 'improper-list':
        stack.push({ kind: 'token', token: { type: 'close', bracket: v.bracket } });
        stack.push({ kind: 'value', value: v.tail });
        stack.push({ kind: 'token', token: { type: 'atom', text: '.' } });
        pushElements(v.elements);
        yield { type: 'open', bracket: v.bracket };
        break;
      case 'vector':
        stack.push({ kind: 'token', token: { type: 'close', bracket: 'round' } });
        pushElements(v.elements);
        yield { type: 'open', bracket: 'vector' };
        break;
      default:
        yield leafToken(v, options.format);
    }
  }
}

function separator(prev: TokenKind | undefined, next: TokenKind): string {
  if (!prev || prev.type === 'open' || prev.type === 'quote') return '';
  if (next.type === 'close') return '';
  return ' ';
}

interface Laid {
  separator: string;
  text: string;
  token: Token;
}

function* layout(values: Iterable<Value>, options: ResolvedPrintOptions): Generator<Laid> {
  const tracker = new PositionTracker();
  let first = true;
  for (const value of values) {
    let prev: TokenKind | undefined;
    for (const kind of structuralTokens(value, options)) {
      const sep = prev ? separator(prev, kind) : first ? '' : '\n';
      tracker.advanceText(sep);
      const start = tracker.current;
      const text = tokenText(kind, options.format);
      const end = tracker.advanceText(text);
      yield { separator: sep, text, token: { ...kind, span: { start, end } } };
      prev = kind;
    }
    first = false;
  }
}

/** 出力上の位置付きトークン列 */
export function* printTokens(value: Value, options: Partial<PrintOptions> = {}): Generator<Token> {
  for (const laid of layout([value], resolvePrintOptions(options))) {
    yield laid.token;
  }
}

/** テキスト片を遅延生成する。トップレベルの値は改行で区切る */
export function* printChunks(values: Iterable<Value>, options: Partial<PrintOptions> = {}): Generator<string> {
  for (const laid of layout(values, resolvePrintOptions(options))) {
    yield laid.separator + laid.text;
  }
}

export function printToString(value: Value, options: Partial<PrintOptions> = {}): string {
  return printAllToString([value], options);
}

export function printAllToString(values: Iterable<Value>, options: Partial<PrintOptions> = {}): string {
  let out = '';
  for (const chunk of printChunks(values, options)) {
    out += chunk;
  }
  return out;
}

/** ストリームに書き出す（drainを待ってバックプレッシャーに従う） */
export async function writeValues(
  out: NodeJS.WritableStream,
  values: Iterable<Value>,
  options: Partial<PrintOptions> = {}
): Promise<void> {
  let wrote = false;
  for (const chunk of printChunks(values, options)) {
    wrote = true;
    if (!out.write(chunk)) {
      await once(out, 'drain');
    }
  }
  if (wrote && !out.write('\n')) {
    await once(out, 'drain');
  }
}
