/**
 * Sanitizes error messages before returning them to API clients.
 * Keeps backend hostnames, connection strings and network error codes out
 * of responses.
 */

const SENSITIVE_PATTERNS = [
  /at\s+\S+\s+\(.*:\d+:\d+\)/,  // stack traces
  /\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/, // IPv4
  /rediss?:\/\//i, // connection strings
  /ECONNREFUSED|ENOTFOUND|ETIMEDOUT|ECONNRESET/i, // Node network errors
];

export function sanitizeErrorMessage(err: unknown, statusCode: number): string {
  if (statusCode >= 500) {
    return "Internal server error";
  }

  const message = err instanceof Error ? err.message : String(err);

  for (const pattern of SENSITIVE_PATTERNS) {
    if (pattern.test(message)) {
      return "Request failed";
    }
  }

  return message;
}
