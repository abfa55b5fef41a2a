import type { Dimensions } from './types.js';

/**
 * Code-unit string comparison. Locale independent so output order is stable
 * across hosts. Absent values sort first.
 */
export function compareText(a: string | undefined, b: string | undefined): number {
  if (a === b) return 0;
  if (a === undefined) return -1;
  if (b === undefined) return 1;
  return a < b ? -1 : 1;
}

export function compareDimensions(a: Dimensions, b: Dimensions): number {
  return (
    compareText(a.category, b.category) ||
    compareText(a.manufacturer, b.manufacturer) ||
    compareText(a.state, b.state)
  );
}

/**
 * Orders by period label, then category, manufacturer and state.
 * Labels are fixed-width (YYYY-MM, YYYY-QN) so text order is chronological.
 */
export function compareSeriesPoints<T extends Dimensions & { period?: string }>(a: T, b: T): number {
  return compareText(a.period, b.period) || compareDimensions(a, b);
}

/**
 * Serializes the dimension values of a point into a map key.
 */
export const dimensionKey = (dims: Dimensions): string =>
  JSON.stringify([dims.category ?? null, dims.manufacturer ?? null, dims.state ?? null]);

/**
 * Copies only the dimension fields that are present.
 */
export const pickDimensions = (dims: Dimensions): Dimensions => ({
  ...(dims.category !== undefined && { category: dims.category }),
  ...(dims.manufacturer !== undefined && { manufacturer: dims.manufacturer }),
  ...(dims.state !== undefined && { state: dims.state }),
});
