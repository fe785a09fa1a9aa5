/**
 * Symmetric trapezoid velocity profile: the special case of
 * {@link AsymmetricTrapezoidProfile} where acceleration and deceleration
 * share one limit.
 */

import { AsymmetricTrapezoidProfile } from './asymmetric-trapezoid-profile.js';
import { validateSymmetricConstraints } from './constraints.js';
import { ZERO_STATE } from './state.js';
import type { ProfileConstraints, ProfileState, SymmetricConstraints } from './types.js';

export function toAsymmetricConstraints(constraints: SymmetricConstraints): ProfileConstraints {
  const { maxVelocity, maxAcceleration } = validateSymmetricConstraints(constraints);
  return { maxVelocity, maxAcceleration, maxDeceleration: maxAcceleration };
}

export class TrapezoidProfile extends AsymmetricTrapezoidProfile {
  constructor(constraints: SymmetricConstraints, target: ProfileState, initial: ProfileState = ZERO_STATE) {
    super(toAsymmetricConstraints(constraints), target, initial);
  }
}
