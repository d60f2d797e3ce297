/**
 * 差分結果の視覚化
 */

import { DiffOperation } from './diff.js';
import { PrintOptions, printToString } from './printer.js';
import { Value } from './value.js';

export interface RenderOptions {
  colorOutput: boolean;
  showPath: boolean;
  compact: boolean;
  print: Partial<PrintOptions>;
}

type Op<T extends DiffOperation['type']> = Extract<DiffOperation, { type: T }>;

const GREEN = '\x1b[32m';
const RED = '\x1b[31m';
const CYAN = '\x1b[36m';
const RESET = '\x1b[0m';

export class DiffRenderer {
  private options: RenderOptions;

  constructor(options: Partial<RenderOptions> = {}) {
    this.options = {
      colorOutput: true,
      showPath: true,
      compact: false,
      print: {},
      ...options,
    };
  }

  render(operations: DiffOperation[]): string {
    const lines: string[] = [];

    for (const op of operations) {
      if (op.type === 'equal' && this.options.compact) continue;
      lines.push(this.renderOperation(op));
    }

    return lines.join('\n');
  }

  private text(value: Value): string {
    return printToString(value, this.options.print);
  }

  private paint(color: string, text: string): string {
    return this.options.colorOutput ? `${color}${text}${RESET}` : text;
  }

  private pathSuffix(path: number[]): string {
    return this.options.showPath ? ` @${path.join('.')}` : '';
  }

  private renderEqual(op: Op<'equal'>): string {
    return `  ${this.text(op.left)}`;
  }

  private renderInsert(op: Op<'insert'>): string {
    return this.paint(GREEN, `+ ${this.text(op.value)}`) + this.pathSuffix(op.path);
  }

  private renderDelete(op: Op<'delete'>): string {
    return this.paint(RED, `- ${this.text(op.value)}`) + this.pathSuffix(op.path);
  }

  private renderReplace(op: Op<'replace'>): string {
    const suffix = this.pathSuffix(op.path);
    return [
      this.paint(RED, `- ${this.text(op.oldValue)}`) + suffix,
      this.paint(GREEN, `+ ${this.text(op.newValue)}`) + suffix,
    ].join('\n');
  }

  /**
   * 構造的な差分を階層的に表示
   */
  renderStructural(operations: DiffOperation[]): string {
    const lines: string[] = [];

    // パス別に操作をグループ化
    const grouped = this.groupByPath(operations);

    for (const [pathKey, ops] of grouped) {
      const path = pathKey === '' ? [] : pathKey.split('.').map(Number);
      if (path.length > 0) {
        lines.push(this.renderPath(path));
      }

      const indent = '  '.repeat(path.length + 1);
      for (const op of ops) {
        if (op.type === 'equal' && this.options.compact) continue;
        for (const line of this.renderOperation(op).split('\n')) {
          lines.push(indent + line);
        }
      }
    }

    return lines.join('\n');
  }

  private groupByPath(operations: DiffOperation[]): Map<string, DiffOperation[]> {
    const grouped = new Map<string, DiffOperation[]>();

    for (const op of operations) {
      const pathKey = op.type === 'equal' ? '' : op.path.slice(0, -1).join('.');
      const group = grouped.get(pathKey);
      if (group) {
        group.push(op);
      } else {
        grouped.set(pathKey, [op]);
      }
    }

    return grouped;
  }

  private renderPath(path: number[]): string {
    const indent = '  '.repeat(path.length);
    return indent + this.paint(CYAN, `[${path.join('.')}]`);
  }

  private renderOperation(op: DiffOperation): string {
    switch (op.type) {
      case 'equal':
        return this.renderEqual(op);
      case 'insert':
        return this.renderInsert(op);
      case 'delete':
        return this.renderDelete(op);
      case 'replace':
        return this.renderReplace(op);
    }
  }
}
