export class MalformedGroundTruthError extends Error {
  readonly file: string;
  readonly missing: string[];

  constructor(file: string, missing: string[]) {
    super(`Ground-truth file ${file} is missing: ${missing.join(", ")}`);
    this.name = "MalformedGroundTruthError";
    this.file = file;
    this.missing = missing;
  }
}

export class StoreUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreUnavailableError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class BatchLimitError extends Error {
  constructor(size: number, limit: number) {
    super(`Batch of ${size} ids exceeds the store limit of ${limit}`);
    this.name = "BatchLimitError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
