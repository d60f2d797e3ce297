/**
 * ストリーミングS式リーダー/プリンターのメインエクスポート
 */

export * from './pos.js';
export { CharDecoder, END, NEED_MORE } from './decoder.js';
export type { CharResult } from './decoder.js';
export * from './errors.js';
export * from './settings.js';
export * from './token.js';
export type { LexState, Step } from './tokenizer.js';
export { IDLE, Tokenizer, isDelimiter, isWhitespace, step, tokenizeStream, tokenizeString } from './tokenizer.js';
export * from './value.js';
export { classifyAtom, parseInteger, readsAsSymbol } from './atom.js';
export { EOF, Parser } from './parser.js';
export type { EndOfInput, ReadResult } from './parser.js';
export { isNeedMore } from './source.js';
export type { ByteSource } from './source.js';
export * from './reader.js';
export * from './printer.js';
export { dump } from './dump.js';
export { StructuralDiff } from './diff.js';
export type { DiffOperation } from './diff.js';
export { TokenOutline } from './outline.js';
export type { OutlineOptions } from './outline.js';
export { DiffRenderer } from './renderer.js';
export type { RenderOptions } from './renderer.js';
