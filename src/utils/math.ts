import { SIZE_EPSILON } from '../config/constants.js';

/**
 * Round a number to specified decimal places
 */
export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

/**
 * Round down to a number of decimals.
 * A small epsilon absorbs binary representation error so 0.3 * 10 does not floor to 2.
 */
export function floorToDecimals(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.floor(value * factor + SIZE_EPSILON) / factor;
}

/**
 * Round to a number of significant figures
 */
export function roundToSignificant(value: number, figures: number): number {
  if (value === 0) {
    return 0;
  }
  return Number(value.toPrecision(figures));
}

/**
 * Treat tiny residues as zero
 */
export function isEffectivelyZero(value: number): boolean {
  return Math.abs(value) < SIZE_EPSILON;
}

/**
 * Calculate mean of a series; zero for an empty series
 */
export function mean(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}
