import { InvalidArgumentError } from "commander";

/**
 * Commander parser for --timeout
 */
export function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isInteger(seconds) || seconds < 0) {
    throw new InvalidArgumentError("Timeout must be a whole number of seconds.");
  }
  return seconds;
}
