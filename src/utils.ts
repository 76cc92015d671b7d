import type { JsonObject } from "./types.js";

/** Tests if a value is a plain JSON object (not null, not an array) */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Tests if a value is a string with at least one non-whitespace character */
export function isNonBlankString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

/**
 * Executes a database operation with retry logic for transaction conflicts
 * @param operation - Async function that performs the database operation
 * @param maxRetries - Maximum number of retry attempts (default: 3)
 * @returns Promise resolving to the operation result
 */
export async function executeWithRetry<T>(
  operation: () => Promise<T>,
  maxRetries: number = 3,
): Promise<T> {
  let retryCount = 0;

  while (true) {
    try {
      return await operation();
    } catch (error) {
      // Check if this is a transaction conflict that can be retried
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      const isRetryable =
        errorMessage.includes("Transaction conflict") ||
        errorMessage.includes("Failed to execute prepared statement");

      if (isRetryable && retryCount < maxRetries) {
        retryCount++;
        // Exponential backoff
        await new Promise((resolve) =>
          setTimeout(resolve, Math.pow(2, retryCount) * 10),
        );
        continue;
      }
      throw error; // Not retryable, or out of retries
    }
  }
}
