import { expect, test } from "vitest";
import { ParseError, TokenizeError } from "../src/errors.js";
import { Parser } from "../src/parser.js";
import { Reader, readAllString, readString } from "../src/reader.js";
import { ReaderOptions } from "../src/settings.js";
import { Token, TokenSource } from "../src/token.js";
import { Value, improper, int, keyword, list, str, stripSpans, sym, vector } from "../src/value.js";
import { thrown } from "./helpers.js";

function parse(text: string, options: ReaderOptions = {}): Value {
  const value = readString(text, options);
  if (!value) throw new Error(`no value in ${JSON.stringify(text)}`);
  return stripSpans(value);
}

test("プロパーリスト", () => {
  expect(parse("(a b c)")).toEqual(list([sym("a"), sym("b"), sym("c")]));
});

test("ドット対", () => {
  expect(parse("(1 . 2)")).toEqual({
    type: "improper-list",
    bracket: "round",
    elements: [int(1)],
    tail: int(2),
  });
});

test("整数", () => {
  expect(parse("42")).toEqual(int(42));
  expect(parse("-7")).toEqual(int(-7));
  expect(parse("+5")).toEqual(int(5));
  expect(parse("123456789012345678901234567890")).toEqual(int(123456789012345678901234567890n));
  expect(parse("#x-1F")).toEqual(int(-31));
  expect(parse("#b101")).toEqual(int(5));
  expect(parse("#o17")).toEqual(int(15));
});

test("整数の文法に合わないアトムはシンボル", () => {
  expect(parse("1.5")).toEqual(sym("1.5"));
  expect(parse("1+")).toEqual(sym("1+"));
  expect(parse("...")).toEqual(sym("..."));
  expect(parse("-")).toEqual(sym("-"));
});

test("真偽値", () => {
  expect(readAllString("#t #f #true #FALSE").map(stripSpans)).toEqual([
    { type: "boolean", value: true },
    { type: "boolean", value: false },
    { type: "boolean", value: true },
    { type: "boolean", value: false },
  ]);
});

test("閉じていない文字列", () => {
  const err = thrown(() => readString('"ab'));
  expect(err).toBeInstanceOf(TokenizeError);
  expect(err).toMatchObject({ kind: "UnterminatedString", pos: { line: 1, column: 1, offset: 0 } });
});

test("入れ子のリストの途中で入力が終わる", () => {
  const err = thrown(() => readString("(a (b)"));
  expect(err).toBeInstanceOf(ParseError);
  expect(err).toMatchObject({ kind: "UnexpectedEndOfInput", pos: { line: 1, column: 1, offset: 0 } });
});

test("先頭のコメントは位置にだけ影響する", () => {
  const value = readString("; comment\n(a)");
  expect(value && stripSpans(value)).toEqual(list([sym("a")]));
  expect(value?.span).toEqual({
    start: { line: 2, column: 1, offset: 10 },
    end: { line: 2, column: 4, offset: 13 },
  });
});

test("要素ごとの位置", () => {
  const value = readString("(a bb)");
  expect(value?.type).toBe("list");
  if (value?.type !== "list") return;
  expect(value.span).toEqual({ start: { line: 1, column: 1, offset: 0 }, end: { line: 1, column: 7, offset: 6 } });
  expect(value.elements[1].span).toEqual({
    start: { line: 1, column: 4, offset: 3 },
    end: { line: 1, column: 6, offset: 5 },
  });
});

test("クォートは二要素のリストになる", () => {
  expect(parse("'a")).toEqual(list([sym("quote"), sym("a")]));
  expect(parse("`(a ,b ,@c)")).toEqual(
    list([
      sym("quasiquote"),
      list([sym("a"), list([sym("unquote"), sym("b")]), list([sym("unquote-splicing"), sym("c")])]),
    ])
  );
  expect(parse("''a")).toEqual(list([sym("quote"), list([sym("quote"), sym("a")])]));
  expect(readString("'a")?.span).toEqual({
    start: { line: 1, column: 1, offset: 0 },
    end: { line: 1, column: 3, offset: 2 },
  });
});

test("データコメントは次の値を一つ読み飛ばす", () => {
  expect(parse("(a #;(b c) d)")).toEqual(list([sym("a"), sym("d")]));
  expect(parse("#; #;a b c")).toEqual(sym("c"));
  expect(parse("(x #;'y)")).toEqual(list([sym("x")]));
  expect(readString("#;a")).toBeUndefined();
});

test("括弧の種類", () => {
  expect(parse("[a {b}]")).toEqual(list([sym("a"), list([sym("b")], "curly")], "square"));
  expect(parse("#(1 \"s\")")).toEqual(vector([int(1), str("s")]));
  expect(parse("#:k")).toEqual(keyword("k"));
});

test("対応しない閉じ括弧", () => {
  const err = thrown(() => readString("(a]"));
  expect(err).toMatchObject({ kind: "MismatchedBracket", pos: { line: 1, column: 3, offset: 2 } });
  expect(err).toHaveProperty("message", "'(' opened at 1:1 expects ')', got ']'");
  expect(thrown(() => readString("#(a]"))).toMatchObject({ kind: "MismatchedBracket" });
});

test("開き括弧のない閉じ括弧", () => {
  expect(thrown(() => readString(" )"))).toMatchObject({
    kind: "UnexpectedToken",
    pos: { line: 1, column: 2, offset: 1 },
  });
  expect(thrown(() => readString("(')"))).toMatchObject({ kind: "UnexpectedToken" });
});

test("ドット記法の誤り", () => {
  expect(thrown(() => readString("(. a)"))).toMatchObject({ kind: "MalformedDotNotation", pos: { offset: 1 } });
  expect(thrown(() => readString("(a . b c)"))).toMatchObject({ kind: "MalformedDotNotation", pos: { offset: 7 } });
  expect(thrown(() => readString("(a .)"))).toMatchObject({ kind: "MalformedDotNotation", pos: { offset: 3 } });
  expect(thrown(() => readString("(a . b . c)"))).toMatchObject({ kind: "MalformedDotNotation", pos: { offset: 7 } });
  expect(thrown(() => readString("#(a . b)"))).toMatchObject({ kind: "MalformedDotNotation", pos: { offset: 4 } });
  expect(thrown(() => readString("."))).toMatchObject({ kind: "MalformedDotNotation" });
});

test("ドットの後のリストは平坦化される", () => {
  expect(parse("(a . (b c))")).toEqual(list([sym("a"), sym("b"), sym("c")]));
  expect(parse("(a . (b . c))")).toEqual(improper([sym("a"), sym("b")], sym("c")));
  expect(parse("[a . b]")).toEqual(improper([sym("a")], sym("b"), "square"));
});

test("非真リストを禁止する設定", () => {
  const options = { allowImproperLists: false };
  expect(thrown(() => readString("(a . b)", options))).toMatchObject({
    kind: "MalformedDotNotation",
    pos: { offset: 3 },
  });
  expect(parse("(a . (b))", options)).toEqual(list([sym("a"), sym("b")]));
});

test("ドットだけのアトムは数値でもシンボルでもない", () => {
  expect(thrown(() => readString(".."))).toMatchObject({ kind: "InvalidNumberSyntax" });
  expect(thrown(() => readString("#xZZ"))).toMatchObject({ kind: "InvalidNumberSyntax" });
  expect(thrown(() => readString("#foo"))).toMatchObject({ kind: "InvalidHashSyntax" });
});

test("フォーマットごとのキーワード", () => {
  expect(parse(":foo")).toEqual(sym(":foo"));
  expect(parse(":foo", { format: "guile" })).toEqual(keyword("foo", "prefix"));
  expect(parse("foo:", { format: "gambit" })).toEqual(keyword("foo", "suffix"));
  expect(parse("|a b|:", { format: "gambit" })).toEqual(keyword("a b", "suffix"));
  expect(parse(":|a b|", { format: "guile" })).toEqual(keyword("a b", "prefix"));
  expect(parse(":", { format: "guile" })).toEqual(sym(":"));
  expect(thrown(() => readString("#true", { format: "gambit" }))).toMatchObject({ kind: "InvalidHashSyntax" });
});

test("シンボルはインターンされる", () => {
  const a = parse("abc");
  const b = parse("abc");
  expect(a.type === "symbol" && b.type === "symbol" && a.symbol === b.symbol).toBe(true);
});

test("深い入れ子でもコールスタックを使わない", () => {
  const depth = 100000;
  const value = readString("(".repeat(depth) + ")".repeat(depth));
  let levels = 0;
  for (let v = value; v?.type === "list"; v = v.elements[0]) {
    levels++;
  }
  expect(levels).toBe(depth);
});

test("入力を少しずつ与えて読む", () => {
  const reader = new Reader();
  reader.write("(a ");
  expect(reader.read()).toEqual({ type: "need-more" });
  reader.write("b) 7");
  const first = reader.read();
  expect(first.type !== "need-more" && first.type !== "eof" && stripSpans(first)).toEqual(list([sym("a"), sym("b")]));
  expect(reader.read()).toEqual({ type: "need-more" });
  reader.end();
  const second = reader.read();
  expect(second.type !== "need-more" && second.type !== "eof" && stripSpans(second)).toEqual(int(7));
  expect(reader.read()).toEqual({ type: "eof" });
});

test("一つのフォームの失敗は前後のフォームに影響しない", () => {
  const reader = new Reader();
  reader.write("(a) (b] (c)");
  reader.end();
  const first = reader.read();
  expect(first.type).toBe("list");
  expect(() => reader.read()).toThrow(ParseError);
  const third = reader.read();
  expect(third.type !== "need-more" && third.type !== "eof" && stripSpans(third)).toEqual(list([sym("c")]));
  expect(first.type !== "need-more" && first.type !== "eof" && stripSpans(first)).toEqual(list([sym("a")]));
});

test("任意のトークン列からも読める", () => {
  const at = { line: 1, column: 1, offset: 0 };
  const span = { start: at, end: at };
  const queue: Token[] = [
    { type: "open", bracket: "round", span },
    { type: "atom", text: "x", span },
    { type: "comment", style: "line", text: "ignored", span },
    { type: "string", value: "y", span },
    { type: "close", bracket: "round", span },
    { type: "eof", span },
  ];
  const source: TokenSource = {
    next: () => queue.shift() ?? { type: "eof", span },
  };
  const parser = new Parser(source);
  expect(parser.readAll().map(stripSpans)).toEqual([list([sym("x"), str("y")])]);
});

test("Gambitでは #:foo はインターンされないシンボル", () => {
  const value = parse("#:g", { format: "gambit" });
  expect(value).toMatchObject({ type: "symbol", symbol: { name: "g", interned: false } });
  expect(value.type === "symbol" && value.symbol === parse("#:g", { format: "gambit" }).symbol).toBe(false);
  expect(parse("#:g", { format: "guile" })).toEqual(keyword("g"));
});

test("空白トークンを報告する設定でも値は変わらない", () => {
  expect(parse(" (a\tb) ", { whitespace: true })).toEqual(list([sym("a"), sym("b")]));
});
