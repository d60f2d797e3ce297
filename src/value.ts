/**
 * S式の値（構文木）の定義
 */

import { Span } from './pos.js';
import { KeywordStyle, ListBracket } from './token.js';

/**
 * インターンされたシンボル
 * 同じ名前なら常に同じオブジェクトなので `===` で比較できる
 */
export class Sym {
  private static readonly table = new Map<string, Sym>();

  private constructor(readonly name: string, readonly interned: boolean) {}

  static intern(name: string): Sym {
    let sym = Sym.table.get(name);
    if (!sym) {
      sym = new Sym(name, true);
      Sym.table.set(name, sym);
    }
    return sym;
  }

  /** 表に登録しないシンボル（Gambitの `#:foo`） */
  static uninterned(name: string): Sym {
    return new Sym(name, false);
  }

  static get internedCount(): number {
    return Sym.table.size;
  }

  toString(): string {
    return this.name;
  }
}

export type Value =
  | { type: 'boolean'; value: boolean; span?: Span }
  | { type: 'integer'; value: bigint; span?: Span }
  | { type: 'symbol'; symbol: Sym; span?: Span }
  | { type: 'keyword'; name: string; style: KeywordStyle; span?: Span }
  | { type: 'char'; value: string; span?: Span }
  | { type: 'string'; value: string; span?: Span }
  | { type: 'list'; bracket: ListBracket; elements: Value[]; span?: Span }
  | { type: 'improper-list'; bracket: ListBracket; elements: Value[]; tail: Value; span?: Span }
  | { type: 'vector'; elements: Value[]; span?: Span };

export function boolean(value: boolean): Value {
  return { type: 'boolean', value };
}

export function int(value: bigint | number): Value {
  return { type: 'integer', value: BigInt(value) };
}

export function sym(name: string): Value {
  return { type: 'symbol', symbol: Sym.intern(name) };
}

/** `style` は綴り（`#:foo` / `:foo` / `foo:`）で、等価性には関わらない */
export function keyword(name: string, style: KeywordStyle = 'hash'): Value {
  return { type: 'keyword', name, style };
}

export function char(value: string): Value {
  if ([...value].length !== 1) {
    throw new Error(`char: expected exactly one character, got ${JSON.stringify(value)}`);
  }
  return { type: 'char', value };
}

export function str(value: string): Value {
  return { type: 'string', value };
}

export function list(elements: Value[], bracket: ListBracket = 'round'): Value {
  return { type: 'list', bracket, elements };
}

export function vector(elements: Value[]): Value {
  return { type: 'vector', elements };
}

/**
 * ドット対リストを作る
 * 末尾が非真リストなら平坦化し、丸括弧の真リストなら結合して真リストにする
 */
export function improper(elements: Value[], tail: Value, bracket: ListBracket = 'round', span?: Span): Value {
  if (elements.length === 0) {
    throw new Error('improper: a dotted list needs at least one element before the tail');
  }
  switch (tail.type) {
    case 'improper-list':
      return withSpan({ type: 'improper-list', bracket, elements: [...elements, ...tail.elements], tail: tail.tail }, span);
    case 'list':
      if (tail.bracket === 'round') {
        return withSpan({ type: 'list', bracket, elements: [...elements, ...tail.elements] }, span);
      }
      break;
  }
  return withSpan({ type: 'improper-list', bracket, elements, tail }, span);
}

function withSpan(value: Value, span: Span | undefined): Value {
  return span ? { ...value, span } : value;
}

export function isSymbol(value: Value, name?: string): value is Extract<Value, { type: 'symbol' }> {
  return value.type === 'symbol' && (name === undefined || value.symbol === Sym.intern(name));
}

function sameSymbol(a: Sym, b: Sym): boolean {
  if (a === b) return true;
  return !a.interned && !b.interned && a.name === b.name;
}

/** 葉同士の比較。コンテナ同士なら形だけ比べる */
function sameNode(a: Value, b: Value): boolean {
  switch (a.type) {
    case 'boolean':
      return b.type === 'boolean' && b.value === a.value;
    case 'integer':
      return b.type === 'integer' && b.value === a.value;
    case 'char':
      return b.type === 'char' && b.value === a.value;
    case 'string':
      return b.type === 'string' && b.value === a.value;
    case 'symbol':
      return b.type === 'symbol' && sameSymbol(a.symbol, b.symbol);
    case 'keyword':
      return b.type === 'keyword' && b.name === a.name;
    case 'list':
      return b.type === 'list' && b.bracket === a.bracket && b.elements.length === a.elements.length;
    case 'improper-list':
      return b.type === 'improper-list' && b.bracket === a.bracket && b.elements.length === a.elements.length;
    case 'vector':
      return b.type === 'vector' && b.elements.length === a.elements.length;
  }
}

/** 子の値（非真リストの末尾は最後） */
export function children(value: Value): Value[] {
  switch (value.type) {
    case 'list':
    case 'vector':
      return value.elements;
    case 'improper-list':
      return [...value.elements, value.tail];
    default:
      return [];
  }
}

/**
 * 構造的等価性（位置情報とキーワードの綴りは無視する）
 * 深い入れ子でも比較できるように明示的なスタックで辿る
 */
export function equals(a: Value, b: Value): boolean {
  const stack: [Value, Value][] = [[a, b]];
  for (let pair = stack.pop(); pair; pair = stack.pop()) {
    const [x, y] = pair;
    if (!sameNode(x, y)) return false;
    const xs = children(x);
    const ys = children(y);
    for (let i = xs.length - 1; i >= 0; i--) {
      stack.push([xs[i], ys[i]]);
    }
  }
  return true;
}

export type Container = Extract<Value, { type: 'list' | 'improper-list' | 'vector' }>;
export type Leaf = Exclude<Value, Container>;

type Rebuild = { kind: 'enter'; value: Value } | { kind: 'exit'; value: Container };

/**
 * 木を帰りがけ順に作り直す
 * `leaf` は葉を、`node` は子を作り直した結果を受け取ってコンテナを組み立てる
 */
export function rebuild<T>(value: Value, leaf: (value: Leaf) => T, node: (value: Container, children: T[]) => T): T {
  const work: Rebuild[] = [{ kind: 'enter', value }];
  const results: T[] = [];
  for (let item = work.pop(); item; item = work.pop()) {
    if (item.kind === 'exit') {
      const count = children(item.value).length;
      const built = results.splice(results.length - count, count);
      results.push(node(item.value, built));
      continue;
    }
    const v = item.value;
    if (v.type === 'list' || v.type === 'improper-list' || v.type === 'vector') {
      work.push({ kind: 'exit', value: v });
      const kids = children(v);
      for (let i = kids.length - 1; i >= 0; i--) {
        work.push({ kind: 'enter', value: kids[i] });
      }
    } else {
      results.push(leaf(v));
    }
  }
  const [result] = results;
  return result;
}

function stripLeaf(value: Leaf): Value {
  switch (value.type) {
    case 'boolean':
      return { type: 'boolean', value: value.value };
    case 'integer':
      return { type: 'integer', value: value.value };
    case 'symbol':
      return { type: 'symbol', symbol: value.symbol };
    case 'keyword':
      return { type: 'keyword', name: value.name, style: value.style };
    case 'char':
      return { type: 'char', value: value.value };
    case 'string':
      return { type: 'string', value: value.value };
  }
}

/** 位置情報を取り除いたコピー */
export function stripSpans(value: Value): Value {
  return rebuild<Value>(value, stripLeaf, (v, kids) => {
    switch (v.type) {
      case 'list':
        return { type: 'list', bracket: v.bracket, elements: kids };
      case 'improper-list':
        return { type: 'improper-list', bracket: v.bracket, elements: kids.slice(0, -1), tail: kids[kids.length - 1] };
      case 'vector':
        return { type: 'vector', elements: kids };
    }
  });
}
