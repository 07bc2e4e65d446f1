// src/parser/types.ts

import type { ArgumentError } from '../utils/errors.js';

/**
 * Result of one parse: the populated instance, or the failure that stopped
 * the walk. A failed parse never exposes the half-filled instance.
 */
export type ParseOutcome<T> =
  | { success: true; options: T }
  | { success: false; error: ArgumentError };
