/**
 * バイト列 → 文字 → トークン → 値 のパイプライン
 */

import { createReadStream } from 'fs';
import { CharDecoder } from './decoder.js';
import { Parser, ReadResult } from './parser.js';
import { Position } from './pos.js';
import { ReaderOptions, ReaderSettings } from './settings.js';
import { ByteSource, pump } from './source.js';
import { Tokenizer } from './tokenizer.js';
import { Value } from './value.js';

export class Reader {
  readonly tokenizer: Tokenizer;
  private parser: Parser;

  constructor(options: ReaderOptions = {}) {
    this.tokenizer = new Tokenizer(new CharDecoder(), options);
    this.parser = new Parser(this.tokenizer, options);
  }

  get settings(): ReaderSettings {
    return this.parser.settings;
  }

  get position(): Position {
    return this.tokenizer.position;
  }

  write(chunk: Uint8Array | string): void {
    this.tokenizer.write(chunk);
  }

  end(): void {
    this.tokenizer.end();
  }

  /** 値・EOF・入力待ちのいずれかを返す */
  read(): ReadResult {
    return this.parser.read();
  }
}

function completeReader(text: string, options: ReaderOptions): Parser {
  const tokenizer = new Tokenizer(new CharDecoder(), options);
  tokenizer.write(text);
  tokenizer.end();
  return new Parser(tokenizer, options);
}

/** 最初の値を読む。入力が空ならundefined */
export function readString(text: string, options: ReaderOptions = {}): Value | undefined {
  const result = completeReader(text, options).read();
  if (result.type === 'need-more') {
    throw new Error('readString: reader requested more input after end');
  }
  return result.type === 'eof' ? undefined : result;
}

export function readAllString(text: string, options: ReaderOptions = {}): Value[] {
  return completeReader(text, options).readAll();
}

/**
 * ストリームから値を順に読む
 * 途中の値でエラーになっても、それまでに返した値はそのまま有効
 */
export function readStream(source: ByteSource, options: ReaderOptions = {}): AsyncGenerator<Value> {
  const reader = new Reader(options);
  return pump(source, reader, () => {
    const result = reader.read();
    return result.type === 'eof' ? undefined : result;
  });
}

export async function readFile(path: string, options: ReaderOptions = {}): Promise<Value[]> {
  const values: Value[] = [];
  for await (const value of readStream(createReadStream(path), options)) {
    values.push(value);
  }
  return values;
}
