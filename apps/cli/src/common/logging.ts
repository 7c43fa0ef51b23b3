const MAX_ERROR_STACK_LENGTH = 4 * 1024;
const MAX_CAUSE_DEPTH = 5;

export type StructuredError = {
  type: "error" | "non_error";
  name?: string;
  message: string;
  code?: string;
  stack?: string;
};

function truncateErrorStack(stack: string | undefined): string | undefined {
  if (!stack || stack.length <= MAX_ERROR_STACK_LENGTH) {
    return stack;
  }

  const omittedChars = stack.length - MAX_ERROR_STACK_LENGTH;
  return `${stack.slice(0, MAX_ERROR_STACK_LENGTH)}... [truncated ${omittedChars} chars]`;
}

/**
 * Finds the most specific error code on an error or its cause chain.
 *
 * axios reports `ECONNREFUSED` on the error itself while undici nests the socket error
 * under `cause`, so both shapes are walked (bounded to avoid cyclic causes).
 */
export function errorCodeOf(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < MAX_CAUSE_DEPTH && current instanceof Error; depth++) {
    if ("code" in current && current.code !== null && current.code !== undefined && String(current.code) !== "") {
      return String(current.code);
    }
    current = current.cause;
  }
  return undefined;
}

/**
 * Serializes thrown values into structured log fields.
 */
export function toStructuredError(error: unknown): StructuredError {
  if (error instanceof Error) {
    return {
      type: "error",
      name: error.name,
      message: error.message,
      code: errorCodeOf(error),
      stack: truncateErrorStack(error.stack),
    };
  }

  return {
    type: "non_error",
    message: typeof error === "string" ? error : `Non-Error thrown: ${String(error)}`,
  };
}
