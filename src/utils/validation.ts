import { ValidationError } from '../errors';

/**
 * Narrow `value` to one of `allowed`, or throw a ValidationError naming the parameter
 */
export function assertOneOf<T extends string>(
  parameter: string,
  value: unknown,
  allowed: readonly T[]
): T {
  const match = allowed.find(candidate => candidate === value);
  if (match === undefined) {
    throw new ValidationError(parameter, value, allowed);
  }
  return match;
}
