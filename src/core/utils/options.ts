import { InvalidArgumentError } from "commander";

export function parseIntegerOption(value: string, label = "number"): number {
  const normalized = String(value ?? "").trim();
  if (!/^-?\d+$/.test(normalized)) {
    throw new InvalidArgumentError(`${label} must be an integer, got: ${value}`);
  }

  const parsed = Number(normalized);
  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError(`${label} is out of supported range: ${value}`);
  }
  return parsed;
}

export function parseDaysOption(value: string): number {
  const parsed = parseIntegerOption(value, "days");
  if (parsed <= 0) {
    throw new InvalidArgumentError(`days must be a positive integer, got: ${value}`);
  }
  return parsed;
}

export function parseThresholdOption(value: string): number {
  const parsed = parseIntegerOption(value, "days");
  if (parsed < 0) {
    throw new InvalidArgumentError(`days must not be negative, got: ${value}`);
  }
  return parsed;
}
