import type { Logger } from "pino";
import { loadClaimConfig, type Env } from "../lib/config";
import { DerivationError, type DerivationErrorCode } from "../lib/errors";
import { createLogger } from "../lib/logger";
import { derivePassword, keccak256Hasher, type Hasher } from "../lib/password";

export const EXIT_CODES: Record<DerivationErrorCode, number> = {
  invalid_input: 2,
  encoding_range: 3,
  hash_configuration: 4,
};

export interface ClaimOptions {
  argv: string[];
  env: Env;
  stdout: { write(chunk: string): unknown };
  logger?: Logger;
  hasher?: Hasher;
}

export function formatPassword(password: bigint): string {
  return `Password: ${password.toString()}`;
}

/**
 * Read the two inputs, derive the password and print it. Returns the
 * process exit code; nothing is printed on failure.
 */
export function runClaim({
  argv,
  env,
  stdout,
  logger = createLogger("claim", env.LOG_LEVEL),
  hasher = keccak256Hasher,
}: ClaimOptions): number {
  try {
    const { baseValue, salt } = loadClaimConfig(argv, env);
    const password = derivePassword(baseValue, salt, hasher);
    stdout.write(`${formatPassword(password)}\n`);
    logger.debug("password derived");
    return 0;
  } catch (err) {
    if (err instanceof DerivationError) {
      logger.error({ code: err.code }, err.message);
      return EXIT_CODES[err.code];
    }
    logger.fatal({ err }, "unexpected error");
    return 1;
  }
}
