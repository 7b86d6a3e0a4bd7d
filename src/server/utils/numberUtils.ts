/**
 * Round half away from zero on the positive axis (2.5 -> 3, 10381.05 -> 10381).
 * Forecast quantities are never negative, so this is the round-half-up policy used
 * for forecast units and confidence bounds.
 */
export function roundHalfUp(value: number): number {
  return Math.floor(value + 0.5);
}

/**
 * Round to a fixed number of decimals (half up)
 */
export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.sign(value) * roundHalfUp(Math.abs(value) * factor) / factor;
}

/**
 * Arithmetic mean; 0 for an empty sequence
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Clamp a value into [min, max]
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
