/**
 * Error helpers shared by the command layer
 */

/**
 * Extract a printable message from an unknown thrown value
 */
export function extractErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
