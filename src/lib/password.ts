import { bytesToBigInt, keccak256, numberToBytes } from "viem";
import {
  EncodingRangeError,
  HashConfigurationError,
  InvalidInputError,
} from "./errors";

export const WORD_BYTES = 32;
export const DIGEST_BYTES = 32;
export const MAX_WORD = (1n << BigInt(WORD_BYTES * 8)) - 1n;

export type Hasher = (bytes: Uint8Array) => Uint8Array;

export const keccak256Hasher: Hasher = (bytes) => keccak256(bytes, "bytes");

function toBigInt(value: unknown, name: string): bigint {
  if (typeof value !== "bigint" && typeof value !== "number") {
    throw new InvalidInputError(`${name} must be a bigint or number, got ${typeof value}`);
  }
  if (typeof value === "number" && !Number.isSafeInteger(value)) {
    throw new InvalidInputError(`${name} must be an integer, got ${value}`);
  }
  const n = BigInt(value);
  if (n < 0n) {
    throw new InvalidInputError(`${name} must be non-negative, got ${n}`);
  }
  return n;
}

/**
 * Encode an unsigned integer as a 32-byte big-endian word, left-padded
 * with zeros.
 */
export function encodeUint256(value: bigint): Uint8Array {
  if (value < 0n || value > MAX_WORD) {
    throw new EncodingRangeError(
      `value ${value} does not fit in ${WORD_BYTES} unsigned bytes`
    );
  }
  return numberToBytes(value, { size: WORD_BYTES });
}

/**
 * Derive the password for a stored base value and its salt:
 * keccak256(uint256(baseValue + salt)) read back as a big-endian integer.
 */
export function derivePassword(
  baseValue: bigint | number,
  salt: bigint | number,
  hasher: Hasher = keccak256Hasher
): bigint {
  const combined = toBigInt(baseValue, "baseValue") + toBigInt(salt, "salt");
  const encoded = encodeUint256(combined);

  let digest: unknown;
  try {
    digest = hasher(encoded);
  } catch (err) {
    throw new HashConfigurationError("hasher failed", { cause: err });
  }
  if (!(digest instanceof Uint8Array)) {
    throw new HashConfigurationError("hasher did not return a Uint8Array");
  }
  if (digest.length !== DIGEST_BYTES) {
    throw new HashConfigurationError(
      `expected a ${DIGEST_BYTES}-byte digest, got ${digest.length} bytes`
    );
  }
  return bytesToBigInt(digest);
}
