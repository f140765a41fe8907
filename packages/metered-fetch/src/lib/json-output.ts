/**
 * JSON output utilities for machine-readable CLI output.
 * Provides consistent schemas and output helpers.
 */

import { isJsonMode } from "./cli-context.js";
import type { ResolvedConfig } from "./config.js";

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
  meta?: {
    duration?: number;
    version?: string;
  };
}

/** A command that ran to the end but did not succeed, e.g. a failed transfer */
export interface JsonFailure<T> {
  success: false;
  data: T;
}

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export interface FetchResultJson {
  url: string;
  file: string;
  area: string;
  offset: number;
  status: "completed" | "failed" | "cancelled";
  bytesWritten: number;
  fileGrowth: number;
  error?: {
    kind: string;
    code: string;
    message: string;
  };
}

export interface UsageShowJson {
  area: string;
  bytesConsumed: number;
  /** null when the area has no quota */
  quotaBytes: number | null;
  headroom: number | null;
  updatedAt?: string;
}

export interface UsageRebuildJson {
  area: string;
  bytesConsumed: number;
  previousBytesConsumed: number | null;
}

export interface ConfigShowJson {
  effective: ResolvedConfig;
  sources: string[];
}

export interface ConfigCheckJson {
  path: string;
  status: "valid" | "invalid" | "missing";
  error?: string;
}

export interface ConfigLocationJson {
  scope: "user" | "system";
  path: string;
  exists: boolean;
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T, meta?: JsonSuccess<T>["meta"]): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
    ...(meta && { meta }),
  };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Output the result of an unsuccessful run to stdout. The error itself is
 * rendered on stderr.
 */
export function outputFailure<T>(data: T): void {
  const result: JsonFailure<T> = { success: false, data };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Conditionally output JSON or return false for human output.
 * Use this to check if JSON mode is enabled before outputting.
 */
export function maybeOutputJson<T>(data: T, meta?: JsonSuccess<T>["meta"]): boolean {
  if (isJsonMode()) {
    outputSuccess(data, meta);
    return true;
  }
  return false;
}
