/**
 * Query Parameter Parsing
 *
 * NaN-safe integer parsing for route query parameters such as ?limit=.
 */

const NON_NEGATIVE_INTEGER = /^\d+$/;

/**
 * Parse a non-negative integer query value and clamp it to [min, max].
 * Anything that is not a plain run of digits yields the default.
 *
 * @example
 * parseQueryInt(c.req.query("limit"), 12, 1, 240)
 * parseQueryInt("abc", 12, 1, 240)  // 12
 * parseQueryInt("500", 12, 1, 240)  // 240
 * parseQueryInt("0", 12, 1, 240)    // 1
 * parseQueryInt("-5", 12, 1, 240)   // 12
 */
export function parseQueryInt(
  value: string | undefined,
  defaultValue: number,
  min?: number,
  max?: number
): number {
  if (value === undefined || !NON_NEGATIVE_INTEGER.test(value.trim())) {
    return defaultValue;
  }

  let result = Number(value.trim());
  if (min !== undefined && result < min) result = min;
  if (max !== undefined && result > max) result = max;
  return result;
}
