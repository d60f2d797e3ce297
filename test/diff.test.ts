import { expect, test } from "vitest";
import { StructuralDiff } from "../src/diff.js";
import { readString } from "../src/reader.js";
import { Value, int, list, sym } from "../src/value.js";

function read(text: string): Value {
  const value = readString(text);
  if (!value) throw new Error(`no value in ${JSON.stringify(text)}`);
  return value;
}

function diff(left: string, right: string) {
  return new StructuralDiff().diff(read(left), read(right));
}

test("構造的差分", () => {
  const operations = diff("(+ 1 2)", "(+ 1 3)");
  expect(operations.map((op) => op.type)).toEqual(["equal", "equal", "replace"]);
  expect(operations[2]).toMatchObject({ oldValue: int(2), newValue: int(3), path: [2] });
});

test("同じ値は一つのequalになる", () => {
  expect(diff("(a (b))", "(a\n  (b))")).toMatchObject([{ type: "equal" }]);
});

test("要素の挿入と削除", () => {
  expect(diff("(a b)", "(a x b)")).toMatchObject([
    { type: "equal" },
    { type: "insert", value: sym("x"), path: [1] },
    { type: "equal" },
  ]);
  expect(diff("(a x b)", "(a b)")).toMatchObject([
    { type: "equal" },
    { type: "delete", value: sym("x"), path: [1] },
    { type: "equal" },
  ]);
  expect(diff("(a)", "(a b c)")).toMatchObject([
    { type: "equal" },
    { type: "insert", path: [1] },
    { type: "insert", path: [2] },
  ]);
});

test("入れ子の差分はパスで位置を示す", () => {
  const operations = diff("(f (g 1))", "(f (g 2))");
  expect(operations.map((op) => op.type)).toEqual(["equal", "equal", "replace"]);
  expect(operations[2]).toMatchObject({ path: [1, 1] });
});

test("括弧の種類が違えば全体を置換", () => {
  expect(diff("[a]", "(a)")).toMatchObject([{ type: "replace", path: [] }]);
  expect(diff("#(a)", "(a)")).toMatchObject([{ type: "replace", path: [] }]);
});

test("非真リストの末尾は最後の要素の次の位置", () => {
  expect(diff("(a . b)", "(a . c)")).toMatchObject([
    { type: "equal" },
    { type: "replace", oldValue: sym("b"), newValue: sym("c"), path: [1] },
  ]);
});

test("複雑なS式の差分", () => {
  const operations = diff(
    "(defun factorial (n) (if (= n 0) 1 (* n (factorial (- n 1)))))",
    "(defun factorial (n) (if (<= n 1) 1 (* n (factorial (- n 1)))))"
  );
  expect(operations.filter((op) => op.type === "replace")).toMatchObject([
    { oldValue: sym("="), newValue: sym("<="), path: [3, 1, 0] },
    { oldValue: int(0), newValue: int(1), path: [3, 1, 2] },
  ]);
});

test("深い入れ子の差分も操作の順序を保つ", () => {
  const depth = 3000;
  let left: Value = sym("a");
  let right: Value = sym("a");
  for (let i = 0; i < depth; i++) {
    left = list([left]);
    right = list([right, sym("z")]);
  }
  const operations = new StructuralDiff().diff(left, right);
  expect(operations).toHaveLength(depth + 1);
  expect(operations[0]).toMatchObject({ type: "equal", left: sym("a") });
  expect(operations[1]).toMatchObject({ type: "insert", value: sym("z"), path: [...Array<number>(depth - 1).fill(0), 1] });
  expect(operations[depth]).toMatchObject({ type: "insert", value: sym("z"), path: [1] });
});
