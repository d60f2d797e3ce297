/**
 * 構造的なS式の差分計算
 * 二つの値の木を比較し、要素単位の挿入・削除・置換を求める
 */

import { Value, equals } from './value.js';

export type DiffOperation =
  | { type: 'equal'; left: Value; right: Value }
  | { type: 'insert'; value: Value; path: number[] }
  | { type: 'delete'; value: Value; path: number[] }
  | { type: 'replace'; oldValue: Value; newValue: Value; path: number[] };

type Sequence = Extract<Value, { type: 'list' | 'improper-list' | 'vector' }>;

function isSequence(value: Value): value is Sequence {
  return value.type === 'list' || value.type === 'improper-list' || value.type === 'vector';
}

/** 同じ種類・同じ括弧のリスト同士なら要素ごとに比較できる */
function sameShape(left: Sequence, right: Sequence): boolean {
  if (left.type !== right.type) return false;
  if (left.type === 'vector' || right.type === 'vector') return true;
  return left.bracket === right.bracket;
}

/** 出力する操作か、これから比べる値の組 */
type Work = { kind: 'op'; op: DiffOperation } | { kind: 'pair'; left: Value; right: Value; path: number[] };

export class StructuralDiff {
  /**
   * 2つのS式の構造的な差分を計算
   * 深い入れ子でも動くように、比べる組は明示的なスタックに積む
   */
  diff(left: Value, right: Value): DiffOperation[] {
    const operations: DiffOperation[] = [];
    const stack: Work[] = [{ kind: 'pair', left, right, path: [] }];

    for (let work = stack.pop(); work; work = stack.pop()) {
      if (work.kind === 'op') {
        operations.push(work.op);
        continue;
      }
      // 操作の順序を保つため逆順に積む
      const steps = this.diffPair(work.left, work.right, work.path);
      for (let i = steps.length - 1; i >= 0; i--) {
        stack.push(steps[i]);
      }
    }
    return operations;
  }

  private diffPair(left: Value, right: Value, path: number[]): Work[] {
    if (equals(left, right)) {
      return [{ kind: 'op', op: { type: 'equal', left, right } }];
    }

    if (!isSequence(left) || !isSequence(right) || !sameShape(left, right)) {
      return [{ kind: 'op', op: { type: 'replace', oldValue: left, newValue: right, path: [...path] } }];
    }

    const steps = this.diffElements(left.elements, right.elements, path);

    // 非真リストの末尾は最後の要素の次の位置として扱う
    if (left.type === 'improper-list' && right.type === 'improper-list') {
      steps.push({ kind: 'pair', left: left.tail, right: right.tail, path: [...path, left.elements.length] });
    }
    return steps;
  }

  private diffElements(leftElements: Value[], rightElements: Value[], path: number[]): Work[] {
    const steps: Work[] = [];
    const push = (op: DiffOperation) => steps.push({ kind: 'op', op });

    // Myers' diff algorithm の簡易版
    const lcs = this.longestCommonSubsequence(leftElements, rightElements);

    let leftIndex = 0;
    let rightIndex = 0;
    let lcsIndex = 0;

    while (leftIndex < leftElements.length || rightIndex < rightElements.length) {
      const l = leftElements[leftIndex];
      const r = rightElements[rightIndex];
      const common = lcs[lcsIndex];
      const hasLeft = leftIndex < leftElements.length;
      const hasRight = rightIndex < rightElements.length;

      if (common && hasLeft && hasRight && equals(l, r) && equals(l, common)) {
        push({ type: 'equal', left: l, right: r });
        leftIndex++;
        rightIndex++;
        lcsIndex++;
      } else if (common && hasLeft && hasRight && equals(l, common)) {
        // 右側に要素が挿入された
        push({ type: 'insert', value: r, path: [...path, rightIndex] });
        rightIndex++;
      } else if (common && hasLeft && hasRight && equals(r, common)) {
        // 左側から要素が削除された
        push({ type: 'delete', value: l, path: [...path, leftIndex] });
        leftIndex++;
      } else if (hasLeft && hasRight) {
        steps.push({ kind: 'pair', left: l, right: r, path: [...path, leftIndex] });
        leftIndex++;
        rightIndex++;
      } else if (hasLeft) {
        push({ type: 'delete', value: l, path: [...path, leftIndex] });
        leftIndex++;
      } else {
        push({ type: 'insert', value: r, path: [...path, rightIndex] });
        rightIndex++;
      }
    }
    return steps;
  }

  private longestCommonSubsequence(left: Value[], right: Value[]): Value[] {
    const m = left.length;
    const n = right.length;
    const dp: number[][] = Array.from({ length: m + 1 }, () => Array<number>(n + 1).fill(0));

    for (let i = 1; i <= m; i++) {
      for (let j = 1; j <= n; j++) {
        if (equals(left[i - 1], right[j - 1])) {
          dp[i][j] = dp[i - 1][j - 1] + 1;
        } else {
          dp[i][j] = Math.max(dp[i - 1][j], dp[i][j - 1]);
        }
      }
    }

    // バックトラック
    const lcs: Value[] = [];
    let i = m;
    let j = n;

    while (i > 0 && j > 0) {
      if (equals(left[i - 1], right[j - 1])) {
        lcs.unshift(left[i - 1]);
        i--;
        j--;
      } else if (dp[i - 1][j] > dp[i][j - 1]) {
        i--;
      } else {
        j--;
      }
    }

    return lcs;
  }
}
