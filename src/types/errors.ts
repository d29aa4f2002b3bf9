export enum StageErrorType {
  TRANSPORT = "TRANSPORT",
  FORMAT = "FORMAT",
}

export class StageError extends Error {
  constructor(
    message: string,
    public type: StageErrorType,
    public details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = "StageError";
  }
}

/**
 * The AI service could not be reached, timed out or refused the credentials.
 */
export class TransportError extends StageError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, StageErrorType.TRANSPORT, details);
    this.name = "TransportError";
  }
}

/**
 * A reply arrived but could not be turned into the expected entity. The raw
 * reply is kept so it can be shown to the user.
 */
export class FormatError extends StageError {
  constructor(
    message: string,
    public raw: string,
    details: Record<string, unknown> = {}
  ) {
    super(message, StageErrorType.FORMAT, details);
    this.name = "FormatError";
  }
}

export function isStageError(error: unknown): error is StageError {
  return error instanceof StageError;
}
