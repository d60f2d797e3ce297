#!/usr/bin/env node

/**
 * S式ツールのコマンドライン
 *
 *   sexpr tokens <file> [--pos] [--comments] [--whitespace]
 *   sexpr print <file> [--quotes]
 *   sexpr dump <file>
 *   sexpr diff <a> <b> [--structural] [--compact] [--no-color]
 */

import { createReadStream } from 'fs';
import { parseArgs } from 'util';
import { StructuralDiff } from './diff.js';
import { dump } from './dump.js';
import { SexprError } from './errors.js';
import { TokenOutline } from './outline.js';
import { PrintOptions, writeValues } from './printer.js';
import { readFile, readStream } from './reader.js';
import { DiffRenderer } from './renderer.js';
import { ReaderOptions, lookupFormat } from './settings.js';
import { tokenizeStream } from './tokenizer.js';
import { Value, list } from './value.js';

const USAGE = `Usage: sexpr <command> [options] <file...>

Commands:
  tokens <file>     トークン列を表示
  print <file>      読み込んだ値を再出力
  dump <file>       種類タグ付きの構造ダンプを出力
  diff <a> <b>      二つのファイルの構造的な差分を表示

Options:
  --format <name>   r7rs | guile | gambit (default: r7rs)
  --pos             トークンの位置を表示 (tokens)
  --comments        コメントもトークンとして表示 (tokens)
  --whitespace      空白もトークンとして表示 (tokens)
  --quotes          (quote x) を 'x と出力 (print)
  --structural      差分を階層的に表示 (diff)
  --compact         一致した部分を省略 (diff)
  --no-color        色を付けない (diff)
  -h, --help        このヘルプを表示`;

/** ファイル名付きのメッセージで終了させるエラー */
class CommandError extends Error {}

interface CommandContext {
  files: string[];
  reader: ReaderOptions;
  print: Partial<PrintOptions>;
  flags: {
    pos: boolean;
    structural: boolean;
    compact: boolean;
    color: boolean;
  };
}

async function inFile<T>(file: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (err) {
    if (err instanceof SexprError) {
      throw new CommandError(err.where(file), { cause: err });
    }
    throw err;
  }
}

function requireFiles(ctx: CommandContext, count: number, command: string): void {
  if (ctx.files.length !== count) {
    throw new CommandError(`${command}: expected ${count} file argument(s), got ${ctx.files.length}`);
  }
}

async function tokensCommand(ctx: CommandContext): Promise<void> {
  requireFiles(ctx, 1, 'tokens');
  const [file] = ctx.files;
  const outline = new TokenOutline({ format: lookupFormat(ctx.reader.format), showPosition: ctx.flags.pos });
  await inFile(file, async () => {
    for await (const token of tokenizeStream(createReadStream(file), ctx.reader)) {
      console.log(outline.line(token));
    }
  });
  console.log(outline.summary());
}

async function printCommand(
  ctx: CommandContext,
  command: string,
  transform: (value: Value) => Value
): Promise<void> {
  requireFiles(ctx, 1, command);
  const [file] = ctx.files;
  await inFile(file, async () => {
    for await (const value of readStream(createReadStream(file), ctx.reader)) {
      await writeValues(process.stdout, [transform(value)], ctx.print);
    }
  });
}

async function diffCommand(ctx: CommandContext): Promise<void> {
  requireFiles(ctx, 2, 'diff');
  const [leftFile, rightFile] = ctx.files;
  const left = await inFile(leftFile, () => readFile(leftFile, ctx.reader));
  const right = await inFile(rightFile, () => readFile(rightFile, ctx.reader));

  const operations = new StructuralDiff().diff(list(left), list(right));
  if (operations.every((op) => op.type === 'equal')) {
    console.log('No differences');
    return;
  }

  const renderer = new DiffRenderer({
    colorOutput: ctx.flags.color,
    compact: ctx.flags.compact,
    print: ctx.print,
  });
  console.log(ctx.flags.structural ? renderer.renderStructural(operations) : renderer.render(operations));
}

async function main(argv: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      format: { type: 'string' },
      pos: { type: 'boolean' },
      comments: { type: 'boolean' },
      whitespace: { type: 'boolean' },
      quotes: { type: 'boolean' },
      structural: { type: 'boolean' },
      compact: { type: 'boolean' },
      'no-color': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  const [command, ...files] = positionals;
  if (values.help || command === undefined) {
    console.log(USAGE);
    return;
  }

  const format = lookupFormat(values.format);
  const ctx: CommandContext = {
    files,
    reader: { format, comments: values.comments ?? false, whitespace: values.whitespace ?? false },
    print: { format, abbreviateQuotes: values.quotes ?? false },
    flags: {
      pos: values.pos ?? false,
      structural: values.structural ?? false,
      compact: values.compact ?? false,
      color: !(values['no-color'] ?? false) && process.stdout.isTTY === true,
    },
  };

  switch (command) {
    case 'tokens':
      return tokensCommand(ctx);
    case 'print':
      return printCommand(ctx, 'print', (value) => value);
    case 'dump':
      return printCommand(ctx, 'dump', dump);
    case 'diff':
      return diffCommand(ctx);
    default:
      throw new CommandError(`unknown command '${command}'\n\n${USAGE}`);
  }
}

main(process.argv.slice(2)).catch((err: unknown) => {
  console.error(`error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
