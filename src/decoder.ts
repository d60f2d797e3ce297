/**
 * バイト列からUnicodeスカラー値への逐次デコーダー
 * マルチバイト列がチャンク境界で分割されていても扱える
 */

import { DecodeError } from './errors.js';
import { PositionTracker, codePointOf } from './pos.js';

export const END = Symbol('end');
export const NEED_MORE = Symbol('need-more');

export type CharResult = number | typeof END | typeof NEED_MORE;

export class CharDecoder {
  private chars: number[] = [];
  private head = 0;
  private ended = false;
  private failure: DecodeError | undefined;

  // 未完成のマルチバイト列
  private needed = 0;
  private pending = 0;
  private codePoint = 0;
  private lower = 0x80;
  private upper = 0xbf;
  private sequenceStart = 0;

  private bytesSeen = 0;
  private tracker = new PositionTracker();

  write(chunk: Uint8Array | string): void {
    if (this.ended) {
      throw new Error('CharDecoder: write after end');
    }
    if (this.failure) return;
    if (typeof chunk === 'string') {
      this.writeText(chunk);
    } else {
      this.writeBytes(chunk);
    }
  }

  end(): void {
    if (this.ended) return;
    this.ended = true;
    if (!this.failure && this.needed > 0) {
      this.fail(this.sequenceStart, 'truncated multi-byte sequence at end of input');
    }
  }

  peek(): CharResult {
    if (this.head < this.chars.length) {
      return this.chars[this.head];
    }
    if (this.failure) throw this.failure;
    return this.ended ? END : NEED_MORE;
  }

  take(): CharResult {
    const c = this.peek();
    if (typeof c === 'number') {
      this.head++;
      this.compact();
    }
    return c;
  }

  private compact(): void {
    if (this.head >= 1024 && this.head * 2 >= this.chars.length) {
      this.chars = this.chars.slice(this.head);
      this.head = 0;
    }
  }

  private writeText(text: string): void {
    if (this.needed > 0) {
      this.fail(this.sequenceStart, 'incomplete multi-byte sequence before text chunk');
      return;
    }
    for (const ch of text) {
      const cp = codePointOf(ch);
      if (cp >= 0xd800 && cp <= 0xdfff) {
        this.fail(this.bytesSeen, 'lone surrogate in text chunk');
        return;
      }
      this.emit(cp);
    }
  }

  private writeBytes(bytes: Uint8Array): void {
    for (let i = 0; i < bytes.length; i++) {
      const b = bytes[i];
      const offset = this.bytesSeen + this.pending;
      if (this.needed === 0) {
        if (b <= 0x7f) {
          this.emit(b);
          continue;
        }
        this.sequenceStart = this.bytesSeen;
        if (b >= 0xc2 && b <= 0xdf) {
          this.needed = 1;
          this.codePoint = b & 0x1f;
        } else if (b >= 0xe0 && b <= 0xef) {
          if (b === 0xe0) this.lower = 0xa0;
          if (b === 0xed) this.upper = 0x9f;
          this.needed = 2;
          this.codePoint = b & 0x0f;
        } else if (b >= 0xf0 && b <= 0xf4) {
          if (b === 0xf0) this.lower = 0x90;
          if (b === 0xf4) this.upper = 0x8f;
          this.needed = 3;
          this.codePoint = b & 0x07;
        } else {
          this.fail(offset, `unexpected byte 0x${b.toString(16)}`);
          return;
        }
        this.pending = 1;
        continue;
      }
      if (b < this.lower || b > this.upper) {
        this.fail(offset, `unexpected byte 0x${b.toString(16)} in multi-byte sequence`);
        return;
      }
      this.lower = 0x80;
      this.upper = 0xbf;
      this.codePoint = (this.codePoint << 6) | (b & 0x3f);
      this.pending++;
      this.needed--;
      if (this.needed === 0) {
        this.pending = 0;
        this.emit(this.codePoint);
      }
    }
  }

  private emit(codePoint: number): void {
    this.chars.push(codePoint);
    this.tracker.advance(codePoint);
    this.bytesSeen = this.tracker.current.offset;
  }

  private fail(byteOffset: number, detail: string): void {
    this.failure = new DecodeError(byteOffset, this.tracker.current, detail);
  }
}
