/**
 * PII Sanitization for Safe Logging
 *
 * Replaces phone numbers and shared secrets with '[REDACTED]' before a
 * rejected webhook body is written to the logs.
 *
 * Design decisions:
 * - Arrays are replaced with '[Array(N)]' summaries (never iterated into,
 *   because array elements could contain numbers or tokens)
 * - uniqueid and status are NOT redacted (needed to correlate log lines)
 * - Depth limit of 10 prevents infinite recursion on circular-ish structures
 */

/** Set of field names whose values must never appear in logs */
export const PII_FIELDS: ReadonlySet<string> = new Set([
  'phone',
  'rawPhone',
  'callerNumber',
  'calleeNumber',
  'rawNumber',
  'from',
  'to',
  'secret',
  'token',
]);

const MAX_DEPTH = 10;
const REDACTED = '[REDACTED]';

/**
 * Recursively sanitize a value for safe logging.
 *
 * - Primitives pass through unchanged
 * - PII field values are replaced with '[REDACTED]'
 * - Arrays are replaced with '[Array(N)]' (never iterated)
 * - Objects deeper than MAX_DEPTH are replaced with '[Object]'
 */
export function sanitizeForLog(obj: unknown, depth = 0): unknown {
  if (obj === null || obj === undefined || typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return `[Array(${obj.length})]`;
  }

  if (depth >= MAX_DEPTH) {
    return '[Object]';
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = PII_FIELDS.has(key) ? REDACTED : sanitizeForLog(value, depth + 1);
  }
  return result;
}
