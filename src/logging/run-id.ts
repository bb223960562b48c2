/**
 * Run ID generation.
 *
 * Every Serializer tags its log lines with a short run ID so that lines
 * from interleaved acquisitions can be told apart. The CLI also sets a
 * process-wide ID for lines logged outside any run.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique run ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

let processRunId: string | null = null;

/**
 * Initialize the process-wide run ID. Call once at startup.
 */
export function initRunId(): string {
  processRunId = generateRunId();
  return processRunId;
}

/**
 * Get the process-wide run ID, or null if not initialized.
 */
export function getRunId(): string | null {
  return processRunId;
}
