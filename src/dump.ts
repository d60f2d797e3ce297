/**
 * 値の構造ダンプ
 *
 * すべての値を種類タグ付きのリストに変換する。文字列やシンボルは文字コードの列になるので、
 * 別の実装が出力したダンプとテキストの書式に依存せずに比較できる。
 */

import { Leaf, Value, int, list, rebuild, sym } from './value.js';

function codes(text: string): Value[] {
  return [...text].map((c) => int(c.codePointAt(0) ?? 0));
}

function tagged(tag: string, rest: Value[]): Value {
  return list([sym(tag), ...rest]);
}

function dumpLeaf(value: Leaf): Value {
  switch (value.type) {
    case 'boolean':
      return sym(value.value ? 'true' : 'false');
    case 'char':
      return tagged('integer->char', codes(value.value));
    case 'keyword':
      // `:foo` と `#:foo` は keyword1、`foo:` は keyword2
      return tagged(value.style === 'suffix' ? 'keyword2' : 'keyword1', codes(value.name));
    case 'string':
      return tagged('string', codes(value.value));
    case 'symbol':
      return tagged(value.symbol.interned ? 'symbol' : 'uninterned-symbol', codes(value.symbol.name));
    case 'integer':
      return tagged('number', [int(value.value)]);
  }
}

export function dump(value: Value): Value {
  return rebuild(value, dumpLeaf, (v, dumped) => {
    switch (v.type) {
      case 'list':
        return list([sym('list'), ...dumped], v.bracket);
      case 'improper-list':
        return list([sym('improper-list'), ...dumped], v.bracket);
      case 'vector':
        return tagged('vector', dumped);
    }
  });
}
