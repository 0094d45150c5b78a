export type Output = {
  appendLine(value: string): void;
  appendError(value: string): void;
};

export function createConsoleOutput(): Output {
  return {
    appendLine: (value) => console.log(value),
    appendError: (value) => console.error(value)
  };
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause !== undefined ? ` (cause: ${describeError(error.cause)})` : '';
    return `${error.message}${cause}`;
  }
  return String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
