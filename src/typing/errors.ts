export type TypingStoreErrorCode = "NOT_FOUND" | "BAD_INPUT";

const STATUS_BY_CODE: Record<TypingStoreErrorCode, number> = {
  NOT_FOUND: 404,
  BAD_INPUT: 400,
};

export interface TypingStoreErrorOptions {
  sessionId?: string;
  cause?: unknown;
}

export class TypingStoreError extends Error {
  public readonly code: TypingStoreErrorCode;
  public readonly status: number;
  public readonly sessionId?: string;

  constructor(code: TypingStoreErrorCode, message: string, options?: TypingStoreErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "TypingStoreError";
    this.code = code;
    this.status = STATUS_BY_CODE[code];
    this.sessionId = options?.sessionId;
  }
}

export function isTypingStoreError(value: unknown): value is TypingStoreError {
  return value instanceof TypingStoreError;
}

export function sessionNotFound(sessionId: string): TypingStoreError {
  return new TypingStoreError("NOT_FOUND", "session not found", { sessionId });
}

export function badInput(message: string, sessionId?: string): TypingStoreError {
  return new TypingStoreError("BAD_INPUT", message, { sessionId });
}
