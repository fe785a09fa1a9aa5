/**
 * Validation for profile constraints and endpoint states.
 *
 * Invalid inputs are rejected when a profile is built, so a bad limit never
 * turns into NaN or Infinity inside the phase math.
 */

import { z } from 'zod';
import { ValidationError } from '../errors.js';
import {
  PROFILE_EPSILON,
  type ProfileConstraints,
  type ProfileState,
  type SymmetricConstraints,
} from './types.js';

const finiteNumber = () =>
  z
    .number({ invalid_type_error: 'must be a number', required_error: 'is required' })
    .finite({ message: 'must be finite' });

const positiveLimit = () => finiteNumber().positive({ message: 'must be greater than zero' });

export const ConstraintsSchema = z.object({
  maxVelocity: positiveLimit(),
  maxAcceleration: positiveLimit(),
  maxDeceleration: positiveLimit(),
});

export const SymmetricConstraintsSchema = z.object({
  maxVelocity: positiveLimit(),
  maxAcceleration: positiveLimit(),
});

export const StateSchema = z.object({
  position: finiteNumber(),
  velocity: finiteNumber(),
});

function parseOrThrow<T>(schema: z.ZodType<T>, value: unknown, prefix?: string): T {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }
  const issue = result.error.issues[0];
  const path = [prefix, ...issue.path.map(String)].filter(Boolean).join('.');
  const field = path.length > 0 ? path : undefined;
  throw new ValidationError(field ? `${field} ${issue.message}` : issue.message, field);
}

/** Parse asymmetric constraints, throwing {@link ValidationError} on the first bad field. */
export function validateConstraints(value: unknown): ProfileConstraints {
  return parseOrThrow(ConstraintsSchema, value);
}

export function validateSymmetricConstraints(value: unknown): SymmetricConstraints {
  return parseOrThrow(SymmetricConstraintsSchema, value);
}

/**
 * Parse a state, prefixing error fields with `label` (e.g. `target.velocity`).
 */
export function validateState(value: unknown, label: string): ProfileState {
  return parseOrThrow(StateSchema, value, label);
}

export function constraintsEqual(a: ProfileConstraints, b: ProfileConstraints): boolean {
  return (
    Math.abs(a.maxVelocity - b.maxVelocity) < PROFILE_EPSILON &&
    Math.abs(a.maxAcceleration - b.maxAcceleration) < PROFILE_EPSILON &&
    Math.abs(a.maxDeceleration - b.maxDeceleration) < PROFILE_EPSILON
  );
}

export function formatConstraints(constraints: ProfileConstraints): string {
  return (
    `Constraints[maxVelocity: ${constraints.maxVelocity}, ` +
    `maxAcceleration: ${constraints.maxAcceleration}, ` +
    `maxDeceleration: ${constraints.maxDeceleration}]`
  );
}
