import { TTL_UNITS, type TtlUnit } from "../configs";
import { InvalidArgumentError } from "./errors";

const TTL_PATTERN = /^(\d+)([a-zA-Z]*)$/;

function isTtlUnit(unit: string): unit is TtlUnit {
  return Object.prototype.hasOwnProperty.call(TTL_UNITS, unit);
}

/**
 * "<n><unit>" → milliseconds, unit one of s, m, d.
 * "0s" is valid and expires immediately.
 */
export function parseTtl(token: string): number {
  const match = TTL_PATTERN.exec(token);
  if (!match) {
    throw new InvalidArgumentError(
      `Invalid TTL '${token}': expected a non-negative integer followed by s, m or d`,
      { token }
    );
  }

  const [, digits, unit] = match;
  if (!isTtlUnit(unit)) {
    throw new InvalidArgumentError(
      `Invalid TTL unit '${unit || "(none)"}' in '${token}': use s, m or d`,
      { token }
    );
  }

  const amount = Number(digits);
  const ms = amount * TTL_UNITS[unit];
  if (!Number.isSafeInteger(ms)) {
    throw new InvalidArgumentError(`TTL '${token}' is out of range`, { token });
  }
  return ms;
}
