import { randomUUID } from 'crypto';

/**
 * Generate a short request ID for tracing one HTTP call through the logs.
 * Uses first 8 chars of a UUID for brevity.
 */
export function generateRequestId(): string {
  return randomUUID().slice(0, 8);
}
