import { mkdtempSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { expect, test } from "vitest";
import { DecodeError, IoError, ParseError } from "../src/errors.js";
import { readFile, readStream } from "../src/reader.js";
import { FORMATS, lookupFormat, resolveSettings } from "../src/settings.js";
import { int, list, str, stripSpans, sym, vector } from "../src/value.js";
import { bytes, chunks, collect, rejected } from "./helpers.js";

test("ストリームから値を順に読む", async () => {
  const values = await collect(readStream(chunks("(a", " b)", bytes(" λ"), ' "x"')));
  expect(values.map(stripSpans)).toEqual([list([sym("a"), sym("b")]), sym("λ"), str("x")]);
});

test("途中のフォームでエラーになっても先に読んだ値は有効", async () => {
  const values = readStream(chunks("(a) 1 (b"));
  expect((await values.next()).value).toMatchObject({ type: "list" });
  expect((await values.next()).value).toMatchObject(int(1));
  const err = await rejected(() => values.next());
  expect(err).toBeInstanceOf(ParseError);
  expect(err).toMatchObject({ kind: "UnexpectedEndOfInput", pos: { line: 1, column: 7, offset: 6 } });
});

test("ソースの失敗はIoErrorになる", async () => {
  const cause = new Error("disk on fire");
  async function* failing(): AsyncGenerator<string> {
    yield "(a)";
    throw cause;
  }
  const values = readStream(failing());
  expect((await values.next()).value).toMatchObject({ type: "list" });
  const err = await rejected(() => values.next());
  expect(err).toBeInstanceOf(IoError);
  expect(err).toMatchObject({ message: "I/O error: disk on fire", cause, pos: { line: 1, column: 4, offset: 3 } });
});

test("不正なUTF-8はDecodeErrorになる", async () => {
  const err = await rejected(() => collect(readStream(chunks(new Uint8Array([0x28, 0x61, 0xff])))));
  expect(err).toBeInstanceOf(DecodeError);
  expect(err).toMatchObject({ byteOffset: 2 });
});

test("途中で読むのをやめるとソースも閉じられる", async () => {
  let closed = false;
  async function* source(): AsyncGenerator<string> {
    try {
      yield "(a) (b)";
      yield "(c)";
    } finally {
      closed = true;
    }
  }
  for await (const value of readStream(source())) {
    expect(value.type).toBe("list");
    break;
  }
  expect(closed).toBe(true);
});

test("ファイルから読む", async () => {
  const dir = mkdtempSync(join(tmpdir(), "sexpr-"));
  const path = join(dir, "sample.scm");
  writeFileSync(path, "; 例\n(define (square x) (* x x))\n#(1 2)\n");
  const values = await readFile(path);
  expect(values).toHaveLength(2);
  expect(stripSpans(values[1])).toEqual(vector([int(1), int(2)]));
  expect(values[1].span?.start).toEqual({ line: 3, column: 1, offset: 34 });
});

test("存在しないファイル", async () => {
  const err = await rejected(() => readFile(join(tmpdir(), "sexpr-missing", "none.scm")));
  if (!(err instanceof IoError)) throw err;
  expect(err.message).toMatch(/^I\/O error: ENOENT/);
  expect(err.where("none.scm")).toMatch(/ at none\.scm:1:1$/);
});

test("フォーマットの設定", () => {
  expect(lookupFormat(undefined)).toBe(FORMATS.r7rs);
  expect(lookupFormat("guile").colonKeywords).toBe("prefix");
  expect(() => lookupFormat("clojure")).toThrow("Unknown format: clojure (expected one of r7rs, guile, gambit)");
  expect(resolveSettings({ format: "gambit" })).toEqual({
    format: FORMATS.gambit,
    comments: false,
    allowImproperLists: true,
  });
});
