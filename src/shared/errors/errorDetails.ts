export type ErrorDetails = {
  name?: string;
  message: string;
  stack?: string;
};

/**
 * Flattens unknown throwables into log-friendly fields.
 */
export const toErrorDetails = (error: unknown): ErrorDetails => {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
};

/**
 * Extracts a human-readable message from typed boundary errors and throwables alike.
 */
export const describeFailure = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }

  if (
    error &&
    typeof error === "object" &&
    "message" in error &&
    typeof error.message === "string"
  ) {
    return error.message;
  }

  return String(error);
};
