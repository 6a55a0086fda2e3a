export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

export class CapacityExceededError extends Error {
  readonly limit: number;
  readonly actual: number;

  constructor(message: string, limit: number, actual: number) {
    super(message);
    this.name = "CapacityExceededError";
    this.limit = limit;
    this.actual = actual;
  }
}

export const isNodeErrorWithCode = (
  error: unknown,
  code: string
): error is NodeJS.ErrnoException => {
  return error instanceof Error && "code" in error && error.code === code;
};

export const getErrorMessage = (error: unknown): string => {
  if (error instanceof Error && error.message.trim()) {
    return error.message;
  }

  return String(error);
};
