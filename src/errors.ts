/**
 * 読み込みエラーの型
 */

import { Position, formatPosition } from './pos.js';

export abstract class SexprError extends Error {
  constructor(message: string, public readonly pos: Position, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /** `message at file:line:column` 形式の位置付きメッセージ */
  where(source?: string): string {
    const location = formatPosition(this.pos);
    return source ? `${this.message} at ${source}:${location}` : `${this.message} at ${location}`;
  }
}

export class IoError extends SexprError {
  constructor(pos: Position, cause: unknown) {
    super(`I/O error: ${cause instanceof Error ? cause.message : String(cause)}`, pos, { cause });
  }
}

export class DecodeError extends SexprError {
  constructor(public readonly byteOffset: number, pos: Position, detail: string) {
    super(`invalid UTF-8 at byte ${byteOffset}: ${detail}`, pos);
  }
}

export type TokenizeErrorKind =
  | 'UnterminatedString'
  | 'UnterminatedComment'
  | 'InvalidCharacterLiteral'
  | 'InvalidNumberSyntax'
  | 'InvalidEscape'
  | 'InvalidHashSyntax';

export class TokenizeError extends SexprError {
  constructor(public readonly kind: TokenizeErrorKind, message: string, pos: Position) {
    super(message, pos);
  }
}

export type ParseErrorKind =
  | 'UnexpectedToken'
  | 'MismatchedBracket'
  | 'UnexpectedEndOfInput'
  | 'MalformedDotNotation';

export class ParseError extends SexprError {
  constructor(public readonly kind: ParseErrorKind, message: string, pos: Position) {
    super(message, pos);
  }
}
