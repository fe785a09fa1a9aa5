/**
 * Shared data types for motion profiles.
 */

/** Tolerance used when comparing profile values computed in floating point. */
export const PROFILE_EPSILON = 1e-4;

/** A position and velocity pair: an endpoint, or a sampled setpoint. */
export interface ProfileState {
  readonly position: number;
  readonly velocity: number;
}

/** Kinematic limits for an asymmetric profile. All values are magnitudes. */
export interface ProfileConstraints {
  readonly maxVelocity: number;
  readonly maxAcceleration: number;
  readonly maxDeceleration: number;
}

/** Kinematic limits where acceleration and deceleration share one magnitude. */
export interface SymmetricConstraints {
  readonly maxVelocity: number;
  readonly maxAcceleration: number;
}

/** Direction of travel, +1 toward increasing position. */
export type Direction = 1 | -1;
