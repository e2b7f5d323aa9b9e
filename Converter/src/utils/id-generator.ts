/**
 * ID generators using Node's built-in crypto.
 */

import { randomUUID } from 'node:crypto';

/** Unique scratch file stem; collisions are treated as impossible */
export function generateScratchId(): string {
  return randomUUID();
}

export function generateCorrelationId(): string {
  return randomUUID();
}
