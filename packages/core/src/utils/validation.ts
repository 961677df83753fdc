import { ValidationError } from '../errors';

export function validatePaginationValue(value: number, field: 'limit' | 'offset'): void {
  if (!Number.isInteger(value)) {
    throw new ValidationError(`${field} must be an integer, got ${value}`, field);
  }
}

export function validateFiniteNumber(value: number, field: string): void {
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${field} must be a finite number, got ${value}`, field);
  }
}
