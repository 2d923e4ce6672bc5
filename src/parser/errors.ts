export class CqasmParseError extends Error {
  readonly errors: readonly string[];

  constructor(message: string, errors: readonly string[]) {
    super(message);
    this.name = "CqasmParseError";
    this.errors = errors;
  }
}

/** Raised inside the scanner; converted into a result error by the helper. */
export class CqasmScannerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CqasmScannerError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
