/**
 * Print debug information to stderr, keeping stdout free for command output.
 */
export function printDebug(label: string, data: unknown): void {
  console.error(`[DEBUG] ${label}:`, JSON.stringify(data, null, 2));
}
