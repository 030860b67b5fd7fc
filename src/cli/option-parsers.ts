export function parseIntOption(value: string): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new Error(`Expected an integer, got: ${value}`);
  }
  return Number.parseInt(trimmed, 10);
}

export function parsePositiveIntOption(value: string): number {
  const parsed = parseIntOption(value);
  if (parsed < 1) {
    throw new Error(`Expected a positive integer, got: ${value}`);
  }
  return parsed;
}

/** Accumulates a repeatable option such as `--domain a --domain b`. */
export function collectOption(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}
