/**
 * A motion profile: an ordered list of constant-acceleration phases plus the
 * state they start from.
 *
 * Profiles are most often used as the setpoint feed for a feedback
 * controller, sampled once per control cycle. This class builds a profile out
 * of caller-supplied phases; the trapezoid planners extend it to build one
 * out of constraints and endpoint states.
 */

import { ValidationError } from '../errors.js';
import { ProfilePhase } from './phase.js';
import { createState, ZERO_STATE } from './state.js';
import type { ProfileState } from './types.js';

export class MotionProfile {
  protected readonly phases: readonly ProfilePhase[];
  readonly initialState: ProfileState;

  /**
   * @param initialState - State at time zero
   * @param phases - Phases in chronological order. Zero-length phases are dropped.
   */
  constructor(initialState: ProfileState, phases: readonly ProfilePhase[] = []) {
    for (const [index, phase] of phases.entries()) {
      if (!Number.isFinite(phase.duration) || phase.duration < 0) {
        throw new ValidationError(
          `phases[${index}].duration must be a finite, non-negative number (got ${phase.duration})`,
          `phases[${index}].duration`,
        );
      }
    }
    this.initialState = createState(initialState.position, initialState.velocity);
    this.phases = Object.freeze(phases.filter(phase => phase.duration > 0));
  }

  /** Build a profile that starts at rest at position zero. */
  static fromPhases(...phases: ProfilePhase[]): MotionProfile {
    return new MotionProfile(ZERO_STATE, phases);
  }

  getPhases(): ProfilePhase[] {
    return [...this.phases];
  }

  /** Duration of the whole profile, in seconds. */
  totalTime(): number {
    let time = 0;
    for (const phase of this.phases) {
      time += phase.duration;
    }
    return time;
  }

  isFinished(time: number): boolean {
    return time >= this.totalTime();
  }

  /**
   * State reached once every phase has run. The velocity is the final
   * phase's end velocity, or the initial velocity when there are no phases.
   */
  finalState(): ProfileState {
    let position = this.initialState.position;
    for (const phase of this.phases) {
      position += phase.displacement;
    }
    return createState(position, this.endVelocity());
  }

  /**
   * Position and velocity at `time` seconds since the profile started.
   *
   * Times at or before zero return the initial state. Times past the end
   * return {@link finalState}.
   */
  sample(time: number): ProfileState {
    if (time <= 0) {
      return this.initialState;
    }

    let remaining = time;
    let position = this.initialState.position;
    for (const phase of this.phases) {
      if (remaining < phase.duration) {
        return createState(position + phase.displacementAt(remaining), phase.velocityAt(remaining));
      }
      remaining -= phase.duration;
      position += phase.displacement;
    }

    return createState(position, this.endVelocity());
  }

  private endVelocity(): number {
    const last = this.phases[this.phases.length - 1];
    return last === undefined ? this.initialState.velocity : last.finalVelocity;
  }
}
