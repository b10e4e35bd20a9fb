/**
 * Shared formatting utilities for event messages and reports.
 *
 * Amounts across the engine are in £mm. Non-finite values return a fallback string.
 */

/**
 * Format an amount held in £mm, switching to £bn from 1,000mm.
 * @param v - Value in £mm (e.g., 2500 for £2.50bn)
 * @param fallback - String to return if value is not finite
 */
export const formatMm = (v: number, fallback = 'N/A'): string => {
  if (!Number.isFinite(v)) return fallback;
  return Math.abs(v) >= 1000 ? `£${(v / 1000).toFixed(2)}bn` : `£${v.toFixed(1)}mm`;
};

/**
 * Format an amount held in £mm as £bn.
 * @param v - Value in £mm
 * @param digits - Number of decimal places
 * @param fallback - String to return if value is not finite
 */
export const formatBn = (v: number, digits = 2, fallback = 'N/A'): string =>
  Number.isFinite(v) ? `£${(v / 1000).toFixed(digits)}bn` : fallback;

/**
 * Format a decimal as a percentage.
 * @param v - Decimal value (e.g., 0.05 for 5%)
 * @param digits - Number of decimal places
 * @param fallback - String to return if value is not finite
 */
export const formatPct = (v: number, digits = 2, fallback = 'N/A'): string =>
  Number.isFinite(v) ? `${(v * 100).toFixed(digits)}%` : fallback;

/**
 * Format a decimal as a percentage with +/- sign prefix.
 * @param v - Decimal value (e.g., 0.05 for +5%)
 * @param digits - Number of decimal places
 * @param fallback - String to return if value is not finite
 */
export const formatSignedPct = (v: number, digits = 2, fallback = 'N/A'): string => {
  if (!Number.isFinite(v)) return fallback;
  const sign = v >= 0 ? '+' : '';
  return `${sign}${(v * 100).toFixed(digits)}%`;
};

/**
 * Format a number as a multiplier with 'x' suffix.
 * @param v - Multiplier value (e.g., 1.5 for 1.50x)
 * @param digits - Number of decimal places
 * @param fallback - String to return if value is not finite
 */
export const formatMultiple = (v: number, digits = 2, fallback = 'N/A'): string =>
  Number.isFinite(v) ? `${v.toFixed(digits)}x` : fallback;
