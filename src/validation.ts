/**
 * Input validation utilities for pipeline-docker.
 *
 * Parsers for CLI option values; each throws ValidationError on bad input.
 *
 * Dependency direction:
 *   This module imports from: errors.ts
 *   It should NOT import from: cli, plugin, commands
 */

import { split } from "shlex";

import { ValidationError } from "./errors.js";

const INTEGER_PATTERN = /^\d+$/;

/** Largest UID/GID a Linux kernel accepts. */
const MAX_NUMERIC_ID = 4294967295;

/**
 * Parse a TCP port number (1-65535).
 *
 * @throws ValidationError if the value is not an integer in range.
 */
export function parsePort(value: string): number {
  const port = INTEGER_PATTERN.test(value.trim()) ? Number(value.trim()) : NaN;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ValidationError(`Invalid port '${value}'. Expected an integer between 1 and 65535.`);
  }
  return port;
}

/**
 * Parse a numeric user or group ID.
 *
 * @throws ValidationError if the value is not an integer in 0..2^32-1.
 */
export function parseNumericId(value: string): number {
  const id = INTEGER_PATTERN.test(value.trim()) ? Number(value.trim()) : NaN;
  if (!Number.isInteger(id) || id > MAX_NUMERIC_ID) {
    throw new ValidationError(`Invalid ID '${value}'. Expected an integer between 0 and ${MAX_NUMERIC_ID}.`);
  }
  return id;
}

/**
 * Split a `--docker-args` string into tokens using POSIX shell quoting rules.
 *
 * Only quotes and backslashes are interpreted: `#`, `&`, `|`, `;` and `$VAR`
 * references stay in the token as typed.
 *
 * @throws ValidationError if a quote is left open.
 */
export function splitArgs(value: string): string[] {
  try {
    return split(value);
  } catch (e) {
    throw new ValidationError(
      `Cannot split docker arguments '${value}': ${e instanceof Error ? e.message : String(e)}`
    );
  }
}
