/**
 * Formatting utilities for summary messages.
 *
 * Formatters return a fallback string for missing or non-finite values.
 */

/**
 * Format a yen amount with thousands separators.
 * @example formatYen(300000) // "¥300,000"
 */
export const formatYen = (v: number, fallback = "N/A"): string =>
  Number.isFinite(v) ? `¥${Math.round(v).toLocaleString("en-US")}` : fallback;

/**
 * Format a yen amount with an explicit sign.
 * @example formatSignedYen(90000) // "+¥90,000"
 */
export const formatSignedYen = (v: number, fallback = "N/A"): string => {
  if (!Number.isFinite(v)) return fallback;
  const sign = v >= 0 ? "+" : "-";
  return `${sign}${formatYen(Math.abs(v))}`;
};

/**
 * Format a reading that may be unavailable.
 * @example formatReading(35.2) // "35.20"
 */
export const formatReading = (v: number | null, digits = 2, fallback = "N/A"): string =>
  v !== null && Number.isFinite(v) ? v.toFixed(digits) : fallback;

/**
 * Date as YYYY-MM-DD (UTC).
 */
export const formatDate = (date: Date): string => date.toISOString().slice(0, 10);
