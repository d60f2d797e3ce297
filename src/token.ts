/**
 * トークンの定義
 */

import { Span } from './pos.js';

export type ListBracket = 'round' | 'square' | 'curly';
export type OpenBracket = ListBracket | 'vector';

export type QuoteMarker = 'quote' | 'quasiquote' | 'unquote' | 'unquote-splicing';

export type CommentStyle = 'line' | 'block';

/** キーワードの綴り: `#:foo` / `:foo` / `foo:` */
export type KeywordStyle = 'hash' | 'prefix' | 'suffix';

export type TokenKind =
  | { type: 'open'; bracket: OpenBracket }
  | { type: 'close'; bracket: ListBracket }
  | { type: 'atom'; text: string }
  | { type: 'string'; value: string }
  | { type: 'symbol'; name: string }
  | { type: 'char'; value: string }
  | { type: 'keyword'; name: string; style: KeywordStyle }
  | { type: 'quote'; marker: QuoteMarker }
  | { type: 'datum-comment' }
  | { type: 'comment'; style: CommentStyle; text: string }
  | { type: 'whitespace'; text: string }
  | { type: 'eof' };

export type Token = TokenKind & { span: Span };

/** 入力待ち（エラーでもEOFでもない） */
export interface NeedMore {
  type: 'need-more';
}

export const NEED_MORE_TOKEN: NeedMore = { type: 'need-more' };

export interface TokenSource {
  next(): Token | NeedMore;
}

export const OPENING: Record<OpenBracket, string> = {
  round: '(',
  square: '[',
  curly: '{',
  vector: '#(',
};

export const CLOSING: Record<ListBracket, string> = {
  round: ')',
  square: ']',
  curly: '}',
};

/** 閉じ括弧の種類（ベクタは丸括弧で閉じる） */
export function closerOf(bracket: OpenBracket): ListBracket {
  return bracket === 'vector' ? 'round' : bracket;
}

export const QUOTE_PREFIX: Record<QuoteMarker, string> = {
  quote: "'",
  quasiquote: '`',
  unquote: ',',
  'unquote-splicing': ',@',
};
