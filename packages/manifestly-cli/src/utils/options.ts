import { InvalidArgumentError } from "commander";

/** Option parser for positive integers, e.g. --chunk-size */
export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Not a positive integer.");
  }
  return parsed;
}

