import { PROFILE_EPSILON } from './types.js';

/**
 * One interval of constant acceleration within a motion profile.
 *
 * Units are free as long as they agree (e.g. meters, m/s, m/s², seconds).
 * An acceleration of 0 marks a coast phase.
 */
export class ProfilePhase {
  constructor(
    public readonly duration: number,
    public readonly displacement: number,
    public readonly acceleration: number,
    public readonly initialVelocity: number,
  ) {
    Object.freeze(this);
  }

  /**
   * Build a phase from its rates and duration; the displacement follows from
   * `v0·t + a·t²/2`.
   */
  static fromRatesAndTime(acceleration: number, initialVelocity: number, duration: number): ProfilePhase {
    const displacement = 0.5 * acceleration * duration * duration + initialVelocity * duration;
    return new ProfilePhase(duration, displacement, acceleration, initialVelocity);
  }

  /** Velocity at the end of the phase. */
  get finalVelocity(): number {
    return this.initialVelocity + this.acceleration * this.duration;
  }

  get isCoast(): boolean {
    return this.acceleration === 0;
  }

  /** Position offset `t` seconds into the phase, relative to its start. */
  displacementAt(t: number): number {
    return this.initialVelocity * t + 0.5 * this.acceleration * t * t;
  }

  velocityAt(t: number): number {
    return this.initialVelocity + this.acceleration * t;
  }

  /**
   * Durations must match exactly; the remaining fields are compared within
   * {@link PROFILE_EPSILON}.
   */
  equals(other: ProfilePhase): boolean {
    return (
      this.duration === other.duration &&
      Math.abs(this.displacement - other.displacement) < PROFILE_EPSILON &&
      Math.abs(this.acceleration - other.acceleration) < PROFILE_EPSILON &&
      Math.abs(this.initialVelocity - other.initialVelocity) < PROFILE_EPSILON
    );
  }

  toJSON(): { duration: number; displacement: number; acceleration: number; initialVelocity: number } {
    return {
      duration: this.duration,
      displacement: this.displacement,
      acceleration: this.acceleration,
      initialVelocity: this.initialVelocity,
    };
  }

  toString(): string {
    return (
      `Phase[duration: ${this.duration}, displacement: ${this.displacement}, ` +
      `acceleration: ${this.acceleration}, initialVelocity: ${this.initialVelocity}]`
    );
  }
}
