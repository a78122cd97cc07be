export type UpdaterErrorCode = "CONFIG" | "FORMAT" | "COLUMN_RESOLUTION" | "TRANSPORT";

export class UpdaterError extends Error {
  readonly code: UpdaterErrorCode;

  constructor(code: UpdaterErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends UpdaterError {
  constructor(message: string) {
    super("CONFIG", message);
  }
}

export class FormatError extends UpdaterError {
  constructor(message: string) {
    super("FORMAT", message);
  }
}

export class ColumnResolutionError extends UpdaterError {
  readonly labels: string[];
  readonly dayIndex: number;

  constructor(labels: string[], dayIndex: number) {
    super(
      "COLUMN_RESOLUTION",
      `Invalid day index for one or more columns (${labels.join(", ")} on day ${dayIndex + 1}). Please check the sheet headers.`
    );
    this.labels = labels;
    this.dayIndex = dayIndex;
  }
}

export class TransportError extends UpdaterError {
  constructor(message: string, cause?: unknown) {
    super("TRANSPORT", message, { cause });
  }
}

export function formatError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
