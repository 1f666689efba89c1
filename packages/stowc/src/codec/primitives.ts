/**
 * Codec primitives: the SCALE encoding of scalars, compact integers and
 * length-prefixed sequences. All fixed-width integers are little-endian.
 */

import {
  compactFromU8a,
  compactToU8a,
  nToU8a,
  stringToU8a,
  u8aConcat,
  u8aToBigInt,
} from "@polkadot/util";

import { Error as CodecError, ErrorCode } from "./errors.js";

export interface IntegerFormat {
  bits: number;
  signed: boolean;
}

/**
 * Accumulates encoded chunks
 */
export class Output {
  private chunks: Uint8Array[] = [];

  push(bytes: Uint8Array): void {
    this.chunks.push(bytes);
  }

  finish(): Uint8Array {
    return u8aConcat(...this.chunks);
  }
}

/**
 * Cursor over bytes being decoded
 */
export class Input {
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {}

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  read(length: number): Uint8Array {
    if (length > this.remaining) {
      throw new CodecError(
        ErrorCode.UNEXPECTED_END,
        `Expected ${length} more byte${length === 1 ? "" : "s"} at offset ${this.offset}, found ${this.remaining}`,
      );
    }
    const slice = this.bytes.subarray(this.offset, this.offset + length);
    this.offset += length;
    return slice;
  }

  readByte(): number {
    return this.read(1)[0];
  }

  /**
   * The whole input must have been consumed
   */
  finish(): void {
    if (this.remaining > 0) {
      throw new CodecError(
        ErrorCode.TRAILING_BYTES,
        `${this.remaining} trailing byte${this.remaining === 1 ? "" : "s"} after decoded value`,
      );
    }
  }

  /**
   * Undecoded bytes, without advancing
   */
  peekRest(): Uint8Array {
    return this.bytes.subarray(this.offset);
  }

  skip(length: number): void {
    this.read(length);
  }
}

export function encodeInteger(
  output: Output,
  value: number | bigint,
  format: IntegerFormat,
): void {
  const big = typeof value === "bigint" ? value : toBigInt(value);
  const [min, max] = bounds(format);

  if (big < min || big > max) {
    throw new CodecError(
      ErrorCode.INVALID_VALUE,
      `${big} is out of range for ${formatName(format)}`,
    );
  }

  output.push(
    nToU8a(big, {
      bitLength: format.bits,
      isLe: true,
      isNegative: format.signed,
    }),
  );
}

/**
 * Integers of up to 32 bits decode to numbers, wider ones to bigints
 */
export function decodeInteger(
  input: Input,
  format: IntegerFormat,
): number | bigint {
  const value = u8aToBigInt(input.read(format.bits / 8), {
    isLe: true,
    isNegative: format.signed,
  });
  return format.bits > 32 ? value : Number(value);
}

export function encodeBool(output: Output, value: boolean): void {
  output.push(new Uint8Array([value ? 1 : 0]));
}

export function decodeBool(input: Input): boolean {
  const byte = input.readByte();
  if (byte > 1) {
    throw new CodecError(
      ErrorCode.INVALID_ENCODING,
      `Invalid boolean byte 0x${byte.toString(16).padStart(2, "0")}`,
    );
  }
  return byte === 1;
}

export function encodeCompact(output: Output, value: number | bigint): void {
  if (value < 0) {
    throw new CodecError(
      ErrorCode.INVALID_VALUE,
      `Compact integers are unsigned, got ${value}`,
    );
  }
  output.push(compactToU8a(value));
}

export function decodeCompact(input: Input): bigint {
  const [length, value] = compactFromU8a(input.peekRest());
  if (length === 0) {
    throw new CodecError(
      ErrorCode.UNEXPECTED_END,
      "Expected a compact integer, found no bytes",
    );
  }
  input.skip(length);
  return BigInt(value.toString());
}

/**
 * Compact-encoded length of a sequence
 */
export function decodeLength(input: Input): number {
  const length = decodeCompact(input);
  if (length > BigInt(input.remaining)) {
    throw new CodecError(
      ErrorCode.UNEXPECTED_END,
      `Sequence length ${length} exceeds the ${input.remaining} remaining bytes`,
    );
  }
  return Number(length);
}

export function encodeStr(output: Output, value: string): void {
  const bytes = stringToU8a(value);
  encodeCompact(output, bytes.length);
  output.push(bytes);
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

export function decodeStr(input: Input): string {
  const length = decodeLength(input);
  const bytes = input.read(length);
  try {
    return utf8.decode(bytes);
  } catch {
    throw new CodecError(
      ErrorCode.INVALID_ENCODING,
      `String of ${length} byte${length === 1 ? "" : "s"} is not valid UTF-8`,
    );
  }
}

function toBigInt(value: number): bigint {
  if (!Number.isSafeInteger(value)) {
    throw new CodecError(
      ErrorCode.INVALID_VALUE,
      `${value} is not a safe integer; use a bigint`,
    );
  }
  return BigInt(value);
}

function bounds({ bits, signed }: IntegerFormat): [bigint, bigint] {
  const width = BigInt(bits);
  if (signed) {
    return [-(1n << (width - 1n)), (1n << (width - 1n)) - 1n];
  }
  return [0n, (1n << width) - 1n];
}

function formatName({ bits, signed }: IntegerFormat): string {
  return `${signed ? "i" : "u"}${bits}`;
}
