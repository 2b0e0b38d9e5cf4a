import { SimulationError } from '../errors.js';

export const clamp = (value: number, min: number, max: number): number =>
  Math.max(min, Math.min(max, value));

export const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

export const mean = (values: readonly number[]): number =>
  values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;

/**
 * Throws when a derived value is NaN or infinite so the tick is abandoned
 * before anything is committed.
 */
export const assertFinite = (value: number, label: string, entityId?: string): number => {
  if (!Number.isFinite(value)) {
    throw new SimulationError(`${label} is not finite (${value})`, 'NON_FINITE_VALUE', entityId);
  }
  return value;
};
