/**
 * 読み書きの設定（方言ごとのフォーマット）
 */

export type ColonKeywords = 'none' | 'prefix' | 'suffix';

export interface SexprFormat {
  name: string;
  /** `(a . b)` 記法を受け付けるか */
  dottedPairs: boolean;
  /** `#true` / `#false` */
  longBooleans: boolean;
  /** `\x41;` のように `;` で終わる16進エスケープか */
  hexEscapeTerminated: boolean;
  hexEscapeMaxDigits: number;
  /** `:foo` (prefix) や `foo:` (suffix) をキーワードとして読むか */
  colonKeywords: ColonKeywords;
  /** falseなら `#:foo` はインターンされないシンボル */
  hashColonIsKeyword: boolean;
  /** 文字列中の `\101` のような1〜3桁の8進エスケープ */
  octalEscapes: boolean;
}

export const R7RS_FORMAT: SexprFormat = {
  name: 'r7rs',
  dottedPairs: true,
  longBooleans: true,
  hexEscapeTerminated: true,
  hexEscapeMaxDigits: 8,
  colonKeywords: 'none',
  hashColonIsKeyword: true,
  octalEscapes: false,
};

export const GUILE_FORMAT: SexprFormat = {
  name: 'guile',
  dottedPairs: true,
  longBooleans: true,
  hexEscapeTerminated: true,
  hexEscapeMaxDigits: 2,
  colonKeywords: 'prefix',
  hashColonIsKeyword: true,
  octalEscapes: false,
};

export const GAMBIT_FORMAT: SexprFormat = {
  name: 'gambit',
  dottedPairs: true,
  longBooleans: false,
  hexEscapeTerminated: false,
  hexEscapeMaxDigits: 8,
  colonKeywords: 'suffix',
  hashColonIsKeyword: false,
  octalEscapes: true,
};

export const FORMATS: Record<string, SexprFormat> = {
  r7rs: R7RS_FORMAT,
  guile: GUILE_FORMAT,
  gambit: GAMBIT_FORMAT,
};

export interface ReaderSettings {
  format: SexprFormat;
  /** コメントをトークンとして報告する（readでは常に捨てる） */
  comments: boolean;
  /** 空白の連続をトークンとして報告する（readでは常に捨てる） */
  whitespace: boolean;
  /** falseなら `(a . b)` のような非真リストをエラーにする */
  allowImproperLists: boolean;
}

export interface ReaderOptions {
  format?: SexprFormat | string;
  comments?: boolean;
  whitespace?: boolean;
  allowImproperLists?: boolean;
}

export function lookupFormat(format: SexprFormat | string | undefined): SexprFormat {
  if (format === undefined) return R7RS_FORMAT;
  if (typeof format !== 'string') return format;
  const found = FORMATS[format];
  if (!found) {
    throw new Error(`Unknown format: ${format} (expected one of ${Object.keys(FORMATS).join(', ')})`);
  }
  return found;
}

export function resolveSettings(options: ReaderOptions = {}): ReaderSettings {
  return {
    comments: false,
    whitespace: false,
    allowImproperLists: true,
    ...options,
    format: lookupFormat(options.format),
  };
}
