export class MeshParseError extends Error {
  readonly line: number | undefined;

  constructor(message: string, line?: number) {
    super(line != null ? `Line ${line}: ${message}` : message);
    this.name = "MeshParseError";
    this.line = line;
  }
}

/** Raised by the loading stage when no model can be produced for an input. */
export class ModelUnavailableError extends Error {
  readonly input: string;

  constructor(input: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Model unavailable for ${input}: ${reason}`, { cause });
    this.name = "ModelUnavailableError";
    this.input = input;
  }
}
