import { CLIError, errorMessage } from "./types.js";

/**
 * Error catalog - factory functions for creating CLIErrors with helpful context.
 * Each function produces a consistent, user-friendly error message.
 */

// ============================================================================
// Storage Area Errors
// ============================================================================

export function areaNotFound(area: string): CLIError {
  return new CLIError("AREA_NOT_FOUND", `Storage area "${area}" doesn't exist`, {
    suggestion: "Create the directory first, then initialise its usage record",
    example: `metered-fetch usage rebuild ${area}`,
  });
}

export function pathEscapesArea(path: string, area: string): CLIError {
  return new CLIError("AREA_PATH_ESCAPE", `"${path}" is outside the storage area`, {
    suggestion: "Target files must live inside the area directory",
    details: area,
  });
}

export function reservedPath(path: string): CLIError {
  return new CLIError("AREA_PATH_ESCAPE", `"${path}" is reserved for the usage record`, {
    suggestion: "Pick another file name",
  });
}

export function usageRecordMissing(area: string): CLIError {
  return new CLIError("USAGE_RECORD_MISSING", `No usage record in "${area}"`, {
    suggestion: "Compute the area's current usage once before writing into it",
    example: `metered-fetch usage rebuild ${area}`,
  });
}

export function usageRecordInvalid(path: string, details?: string): CLIError {
  return new CLIError("USAGE_RECORD_INVALID", `Usage record "${path}" is unreadable`, {
    suggestion: "Rebuild it from the files in the area",
    details,
  });
}

// ============================================================================
// Validation Errors
// ============================================================================

export function invalidOption(option: string, value: string, expected: string): CLIError {
  return new CLIError("VALIDATION_INVALID_OPTION", `Invalid value for ${option}: "${value}"`, {
    suggestion: `Expected ${expected}`,
  });
}

export function configInvalid(details: string): CLIError {
  return new CLIError("VALIDATION_CONFIG_INVALID", "Your config file has errors", {
    suggestion: "Check the file against the example config",
    example: "metered-fetch config validate",
    details,
  });
}

// ============================================================================
// Network Errors
// ============================================================================

export function networkOffline(url: string, details?: string): CLIError {
  return new CLIError("NETWORK_OFFLINE", `Can't reach ${url}`, {
    suggestion: "Check your internet connection and try again",
    details,
  });
}

export function networkTimeout(url: string, timeoutMs: number): CLIError {
  return new CLIError("NETWORK_TIMEOUT", `No response from ${url} within ${timeoutMs}ms`, {
    suggestion: "Raise the limit with --timeout",
  });
}

// ============================================================================
// Generic Error
// ============================================================================

/** Wrap anything thrown that is not already a CLIError */
export function unknownError(error: unknown): CLIError {
  return new CLIError("UNKNOWN_ERROR", errorMessage(error), { cause: error });
}

// ============================================================================
// HTTP Status Code Mapping
// ============================================================================

/**
 * Convert an unsuccessful HTTP response to a CLIError.
 */
export function fromHttpStatus(status: number, statusText: string, url: string): CLIError {
  const label = `${status}${statusText ? ` ${statusText}` : ""}`;

  switch (status) {
    case 401:
    case 403:
      return new CLIError("HTTP_STATUS", `Access to ${url} was refused (${label})`, {
        suggestion: "Pass credentials with --auth user:password",
      });
    case 404:
    case 410:
      return new CLIError("HTTP_STATUS", `Nothing to download at ${url} (${label})`, {
        suggestion: "Check the URL is correct",
      });
    default:
      if (status >= 300 && status < 400) {
        return new CLIError("HTTP_STATUS", `Redirect from ${url} was not followed (${label})`, {
          suggestion: "Allow redirects or use the final URL",
        });
      }
      if (status >= 500) {
        return new CLIError("HTTP_STATUS", `Server error from ${url} (${label})`, {
          suggestion: "The server might be busy. Try again in a moment",
        });
      }
      return new CLIError("HTTP_STATUS", `Request to ${url} failed (${label})`);
  }
}
