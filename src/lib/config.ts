import { InvalidInputError } from "./errors";

export interface ClaimConfig {
  baseValue: bigint;
  salt: bigint;
}

export type Env = Record<string, string | undefined>;

const DECIMAL = /^-?\d+$/;
const HEX = /^0x[0-9a-f]+$/i;

/** Parse a decimal or 0x-prefixed hex integer. Sign is left to the caller. */
export function parseInteger(raw: string, name: string): bigint {
  const value = raw.trim();
  if (!DECIMAL.test(value) && !HEX.test(value)) {
    throw new InvalidInputError(`${name} is not an integer: "${raw}"`);
  }
  return BigInt(value);
}

export function loadClaimConfig(argv: string[], env: Env): ClaimConfig {
  if (argv.length === 2) {
    return {
      baseValue: parseInteger(argv[0], "base value"),
      salt: parseInteger(argv[1], "salt"),
    };
  }
  if (argv.length !== 0) {
    throw new InvalidInputError(
      `expected <base-value> <salt>, got ${argv.length} argument(s)`
    );
  }

  const baseValue = env.PASSWORD_BASE_VALUE || "";
  const salt = env.PASSWORD_SALT || "";
  if (!baseValue || !salt) {
    throw new InvalidInputError(
      "PASSWORD_BASE_VALUE and PASSWORD_SALT are required when no arguments are given"
    );
  }
  return {
    baseValue: parseInteger(baseValue, "PASSWORD_BASE_VALUE"),
    salt: parseInteger(salt, "PASSWORD_SALT"),
  };
}
