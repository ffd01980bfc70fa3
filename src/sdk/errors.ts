/**
 * Human-readable message for a thrown value. Includes the cause of a failed
 * fetch, which otherwise only says "fetch failed".
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.cause instanceof Error
      ? `${error.message} (${error.cause.message})`
      : error.message;
  }
  return typeof error === "string" ? error : "Unknown error";
}
