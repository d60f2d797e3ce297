import { expect, test } from "vitest";
import { dump } from "../src/dump.js";
import { printToString } from "../src/printer.js";
import { readString } from "../src/reader.js";
import { isSymbol } from "../src/value.js";
import { ReaderOptions } from "../src/settings.js";

function dumped(text: string, options: ReaderOptions = {}): string {
  const value = readString(text, options);
  if (!value) throw new Error(`no value in ${JSON.stringify(text)}`);
  return printToString(dump(value));
}

test("リストと葉の値のダンプ", () => {
  expect(dumped('(a "hi" 1 #t #f)')).toBe("(list (symbol 97) (string 104 105) (number 1) true false)");
});

test("非真リストとベクタのダンプ", () => {
  expect(dumped("(1 . #\\a)")).toBe("(improper-list (number 1) (integer->char 97))");
  expect(dumped("#(x #:k)")).toBe("(vector (symbol 120) (keyword1 107))");
});

test("括弧の種類はダンプにも残る", () => {
  expect(dumped("[a {}]")).toBe("[list (symbol 97) {list}]");
});

test("文字列はコードポイントの列になる", () => {
  expect(dumped('"λ😀"')).toBe("(string 955 128512)");
  expect(dumped("100000000000000000000")).toBe("(number 100000000000000000000)");
  expect(dumped('""')).toBe("(string)");
});

test("キーワードは綴りごとにkeyword1とkeyword2になる", () => {
  expect(dumped("(:a b:)", { format: "guile" })).toBe("(list (keyword1 97) (symbol 98 58))");
  expect(dumped("(:a b:)", { format: "gambit" })).toBe("(list (symbol 58 97) (keyword2 98))");
  expect(dumped("#:a", { format: "gambit" })).toBe("(uninterned-symbol 97)");
});

test("深い入れ子のダンプ", () => {
  const depth = 100000;
  const value = readString("(".repeat(depth) + "1" + ")".repeat(depth));
  let levels = 0;
  let v = value && dump(value);
  while (v?.type === "list" && isSymbol(v.elements[0], "list")) {
    expect(v.elements).toHaveLength(2);
    levels++;
    v = v.elements[1];
  }
  expect(levels).toBe(depth);
  expect(v && printToString(v)).toBe("(number 1)");
});
