export { PROFILE_EPSILON } from './types.js';
export type { Direction, ProfileConstraints, ProfileState, SymmetricConstraints } from './types.js';
export { ZERO_STATE, createState, statesEqual, formatState } from './state.js';
export {
  ConstraintsSchema,
  SymmetricConstraintsSchema,
  StateSchema,
  validateConstraints,
  validateSymmetricConstraints,
  validateState,
  constraintsEqual,
  formatConstraints,
} from './constraints.js';
export { ProfilePhase } from './phase.js';
export { MotionProfile } from './motion-profile.js';
export { AsymmetricTrapezoidProfile, planAsymmetricTrapezoid } from './asymmetric-trapezoid-profile.js';
export type { TrapezoidPlan } from './asymmetric-trapezoid-profile.js';
export { TrapezoidProfile, toAsymmetricConstraints } from './trapezoid-profile.js';
