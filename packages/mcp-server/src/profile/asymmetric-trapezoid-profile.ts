/**
 * Asymmetric trapezoid velocity profile.
 *
 * Moves from an initial state to a target state while keeping velocity,
 * acceleration and deceleration within separate limits. The velocity curve
 * is a trapezoid (accelerate, coast, decelerate) or, when there is not
 * enough distance to reach the velocity limit, a triangle.
 *
 * Usage:
 *
 * ```ts
 * const profile = new AsymmetricTrapezoidProfile(
 *   { maxVelocity: 2, maxAcceleration: 4, maxDeceleration: 1 },
 *   { position: 10, velocity: 0 },
 * );
 * // once per control cycle
 * const setpoint = profile.sample(elapsedSeconds);
 * ```
 */

import { ValidationError } from '../errors.js';
import { validateConstraints, validateState } from './constraints.js';
import { MotionProfile } from './motion-profile.js';
import { ProfilePhase } from './phase.js';
import { createState, ZERO_STATE } from './state.js';
import type { Direction, ProfileConstraints, ProfileState } from './types.js';

/** Output of {@link planAsymmetricTrapezoid}. */
export interface TrapezoidPlan {
  /** Validated limit magnitudes, with unknown keys dropped. */
  constraints: ProfileConstraints;
  direction: Direction;
  /** Initial state with its velocity clamped to the velocity limit. */
  initial: ProfileState;
  /** Target state with its velocity clamped to the velocity limit. */
  target: ProfileState;
  phases: ProfilePhase[];
}

/**
 * Solve the accelerate/coast/decelerate breakdown for a move.
 *
 * All signed quantities are multiplied by the direction of travel so the
 * derivation below reads as if the move were toward increasing position.
 */
export function planAsymmetricTrapezoid(
  constraints: ProfileConstraints,
  target: ProfileState,
  initial: ProfileState = ZERO_STATE,
): TrapezoidPlan {
  const limits = validateConstraints(constraints);
  const goal = validateState(target, 'target');
  const start = validateState(initial, 'initial');

  const distance = goal.position - start.position;
  if (distance === 0 && goal.velocity !== 0) {
    throw new ValidationError(
      'target.velocity must be zero when the target position equals the initial position',
      'target.velocity',
    );
  }

  const direction: Direction = distance < 0 ? -1 : 1;
  const maxVelocity = limits.maxVelocity * direction;
  const accel = limits.maxAcceleration * direction;
  let decel = -limits.maxDeceleration * direction;

  // The initial velocity may point away from the target; the target velocity
  // is expected to point along the direction of travel.
  const clamp = (velocity: number) =>
    direction === 1 ? Math.min(velocity, maxVelocity) : Math.max(velocity, maxVelocity);
  const v0 = clamp(start.velocity);
  const vT = clamp(goal.velocity);

  let accelTime = (maxVelocity - v0) / accel;
  let accelPos = v0 * accelTime + 0.5 * accel * accelTime * accelTime;

  let decelTime = (vT - maxVelocity) / decel;
  let decelPos = maxVelocity * decelTime + 0.5 * decel * decelTime * decelTime;

  let coastPos = distance - (accelPos + decelPos);
  let coastTime = coastPos / maxVelocity;

  if (coastPos * direction < 0) {
    // The velocity limit cannot be reached without overshooting, so the
    // acceleration and deceleration ramps meet early. Total displacement is
    // the sum of three integrals: accelerating to the peak, decelerating back
    // down to v0, then decelerating from v0 to vT. Since the second ramp
    // lasts -accel·accelTime/decel and the third -vDiff/decel, the sum is a
    // quadratic in accelTime alone.
    const vDiff = v0 - vT;
    const a = 0.5 * accel - (accel * accel) / (2 * decel);
    const b = v0 - (v0 * accel) / decel;
    const c = -((vDiff * vDiff) / (2 * decel) + (vT * vDiff) / decel + distance);

    // The other root always has the wrong sign for this direction.
    const discriminant = Math.max(0, b * b - 4 * a * c);
    accelTime = (-b + direction * Math.sqrt(discriminant)) / (2 * a);
    decelTime = -((accel / decel) * accelTime + vDiff / decel);

    accelPos = v0 * accelTime + 0.5 * accel * accelTime * accelTime;
    decelPos = vT * decelTime - 0.5 * decel * decelTime * decelTime;
    coastTime = 0;
    coastPos = 0;

    if (decelTime < 0) {
      // vT is higher than anything reachable: accelerate the whole way.
      accelPos = distance;
      accelTime = (-v0 + direction * Math.sqrt(Math.max(0, v0 * v0 + 2 * accel * distance))) / accel;
      decelTime = 0;
      decelPos = 0;
    } else if (accelTime < 0) {
      // vT is lower than anything reachable: brake harder than the limit so
      // the move still ends on the target position at vT.
      decelPos = distance;
      decelTime = (2 * decelPos) / (v0 + vT);
      decel = (vT - v0) / decelTime;
      accelTime = 0;
      accelPos = 0;
    }
  }

  const candidates = [
    new ProfilePhase(accelTime, accelPos, accel, v0),
    new ProfilePhase(coastTime, coastPos, 0, maxVelocity),
    new ProfilePhase(decelTime, decelPos, decel, v0 + accelTime * accel),
  ];

  return {
    constraints: limits,
    direction,
    initial: createState(start.position, v0),
    target: createState(goal.position, vT),
    phases: candidates.filter(phase => phase.duration > 0),
  };
}

export class AsymmetricTrapezoidProfile extends MotionProfile {
  readonly constraints: ProfileConstraints;
  readonly direction: Direction;
  readonly target: ProfileState;

  /**
   * @param constraints - Velocity, acceleration and deceleration magnitudes
   * @param target - Desired state when the profile completes
   * @param initial - Starting state, usually the mechanism's current state
   * @throws ValidationError if a limit is not strictly positive or a state is not finite
   */
  constructor(constraints: ProfileConstraints, target: ProfileState, initial: ProfileState = ZERO_STATE) {
    const plan = planAsymmetricTrapezoid(constraints, target, initial);
    super(plan.initial, plan.phases);
    this.constraints = Object.freeze(plan.constraints);
    this.direction = plan.direction;
    this.target = plan.target;
  }

  /**
   * Time from the start of the profile until `position` is first reached.
   *
   * Positions behind the start return 0; positions at or past the target
   * return {@link totalTime}.
   */
  timeLeftUntil(position: number): number {
    let remaining = position - this.initialState.position;
    if (remaining * this.direction <= 0) {
      return 0;
    }

    let time = 0;
    for (const phase of this.phases) {
      if ((remaining - phase.displacement) * this.direction < 0) {
        return time + this.timeWithinPhase(phase, remaining);
      }
      time += phase.duration;
      remaining -= phase.displacement;
    }
    return time;
  }

  private timeWithinPhase(phase: ProfilePhase, displacement: number): number {
    if (phase.isCoast) {
      return displacement / phase.initialVelocity;
    }
    const v0 = phase.initialVelocity;
    const root = Math.sqrt(Math.max(0, v0 * v0 + 2 * phase.acceleration * displacement));
    return (-v0 + this.direction * root) / phase.acceleration;
  }
}
