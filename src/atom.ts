/**
 * アトム文字列の分類（整数・真偽値・キーワード・シンボル）
 */

import { TokenizeError } from './errors.js';
import { Span } from './pos.js';
import { SexprFormat } from './settings.js';
import { Sym, Value } from './value.js';

const DECIMAL = /^([+-]?)([0-9]+)$/;

const RADIX: Record<string, { prefix: string; digits: RegExp }> = {
  x: { prefix: '0x', digits: /^([+-]?)([0-9a-fA-F]+)$/ },
  o: { prefix: '0o', digits: /^([+-]?)([0-7]+)$/ },
  b: { prefix: '0b', digits: /^([+-]?)([01]+)$/ },
  d: { prefix: '', digits: DECIMAL },
};

const ONLY_DOTS = /^\.+$/;

function signed(sign: string, magnitude: bigint): bigint {
  return sign === '-' ? -magnitude : magnitude;
}

/** 厳密な整数の文法に一致すれば値を返す */
export function parseInteger(text: string): bigint | undefined {
  const m = DECIMAL.exec(text);
  if (!m) return undefined;
  return signed(m[1], BigInt(m[2]));
}

function classifyHash(text: string, span: Span, format: SexprFormat): Value {
  const lower = text.toLowerCase();
  if (lower === '#t' || (format.longBooleans && lower === '#true')) {
    return { type: 'boolean', value: true, span };
  }
  if (lower === '#f' || (format.longBooleans && lower === '#false')) {
    return { type: 'boolean', value: false, span };
  }
  const radix = RADIX[lower[1]];
  if (radix) {
    const m = radix.digits.exec(text.slice(2));
    if (!m) {
      throw new TokenizeError('InvalidNumberSyntax', `invalid number syntax ${text}`, span.start);
    }
    return { type: 'integer', value: signed(m[1], BigInt(radix.prefix + m[2])), span };
  }
  throw new TokenizeError('InvalidHashSyntax', `unknown '#' syntax ${text}`, span.start);
}

function keywordName(text: string, format: SexprFormat): string | undefined {
  if (text.length < 2) return undefined;
  switch (format.colonKeywords) {
    case 'prefix':
      return text.startsWith(':') ? text.slice(1) : undefined;
    case 'suffix':
      return text.endsWith(':') ? text.slice(0, -1) : undefined;
    case 'none':
      return undefined;
  }
}

/**
 * 数値の文法を先に試し、一致しなければ真偽値・キーワード・シンボルとして扱う
 */
export function classifyAtom(text: string, span: Span, format: SexprFormat): Value {
  if (text.startsWith('#')) {
    return classifyHash(text, span, format);
  }
  const n = parseInteger(text);
  if (n !== undefined) {
    return { type: 'integer', value: n, span };
  }
  const name = keywordName(text, format);
  if (name !== undefined && format.colonKeywords !== 'none') {
    return { type: 'keyword', name, style: format.colonKeywords, span };
  }
  if (ONLY_DOTS.test(text) && text !== '...') {
    throw new TokenizeError('InvalidNumberSyntax', `'${text}' is neither a number nor a symbol`, span.start);
  }
  return { type: 'symbol', symbol: Sym.intern(text), span };
}

/** シンボル名がそのまま書いても同じシンボルとして読めるか */
export function readsAsSymbol(name: string, format: SexprFormat): boolean {
  if (name === '' || name.startsWith('#')) return false;
  if (parseInteger(name) !== undefined) return false;
  if (keywordName(name, format) !== undefined) return false;
  return !(ONLY_DOTS.test(name) && name !== '...');
}
