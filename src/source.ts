/**
 * 非同期の入力ソースから逐次読み込むための共通処理
 */

import { IoError } from './errors.js';
import { Position } from './pos.js';
import { NeedMore } from './token.js';

/** Node.jsの Readable やファイルストリームを含む、チャンク列の入力 */
export type ByteSource = AsyncIterable<Uint8Array | string>;

export interface ChunkSink {
  write(chunk: Uint8Array | string): void;
  end(): void;
  readonly position: Position;
}

export function isNeedMore(item: { type: string }): item is NeedMore {
  return item.type === 'need-more';
}

/**
 * `next()` が入力待ちを返すたびにソースから次のチャンクを流し込む。
 * `next()` がundefinedを返したら終了。途中で反復をやめた場合はソースも閉じる。
 */
export async function* pump<T extends { type: string }>(
  source: ByteSource,
  sink: ChunkSink,
  next: () => T | NeedMore | undefined
): AsyncGenerator<T> {
  const iterator = source[Symbol.asyncIterator]();
  let exhausted = false;
  try {
    for (;;) {
      const item = next();
      if (item === undefined) return;
      if (isNeedMore(item)) {
        let chunk: IteratorResult<Uint8Array | string>;
        try {
          chunk = await iterator.next();
        } catch (err) {
          exhausted = true;
          throw new IoError(sink.position, err);
        }
        if (chunk.done) {
          exhausted = true;
          sink.end();
        } else {
          sink.write(chunk.value);
        }
        continue;
      }
      yield item;
    }
  } finally {
    if (!exhausted) {
      await iterator.return?.();
    }
  }
}
