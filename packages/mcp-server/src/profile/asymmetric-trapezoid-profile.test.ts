import { describe, it, expect } from 'vitest';
import { ValidationError } from '../errors.js';
import { AsymmetricTrapezoidProfile, planAsymmetricTrapezoid } from './asymmetric-trapezoid-profile.js';
import { ProfilePhase } from './phase.js';
import type { ProfileConstraints, ProfileState } from './types.js';

function expectState(actual: ProfileState, position: number, velocity: number): void {
  expect(actual.position).toBeCloseTo(position, 6);
  expect(actual.velocity).toBeCloseTo(velocity, 6);
}

function expectPhase(actual: ProfilePhase, expected: ProfilePhase): void {
  expect(actual.duration).toBeCloseTo(expected.duration, 9);
  expect(actual.displacement).toBeCloseTo(expected.displacement, 9);
  expect(actual.acceleration).toBeCloseTo(expected.acceleration, 9);
  expect(actual.initialVelocity).toBeCloseTo(expected.initialVelocity, 9);
}

const unit: ProfileConstraints = { maxVelocity: 1, maxAcceleration: 1, maxDeceleration: 1 };

describe('AsymmetricTrapezoidProfile', () => {
  describe('full trapezoid', () => {
    const profile = new AsymmetricTrapezoidProfile(unit, { position: 4, velocity: 0 });

    it('plans accelerate, coast and decelerate phases', () => {
      const phases = profile.getPhases();
      expect(phases).toHaveLength(3);
      expect(phases[0].equals(new ProfilePhase(1, 0.5, 1, 0))).toBe(true);
      expect(phases[1].equals(new ProfilePhase(3, 3, 0, 1))).toBe(true);
      expect(phases[2].equals(new ProfilePhase(1, 0.5, -1, 1))).toBe(true);
    });

    it('takes five seconds', () => {
      expect(profile.totalTime()).toBe(5);
    });

    it('ends on the target', () => {
      expectState(profile.sample(profile.totalTime()), 4, 0);
    });

    it('coasts at the velocity limit mid-profile', () => {
      expect(profile.sample(2.5)).toEqual({ position: 2, velocity: 1 });
    });

    it('starts at the initial state', () => {
      expect(profile.sample(0)).toEqual({ position: 0, velocity: 0 });
    });
  });

  describe('negative direction', () => {
    const profile = new AsymmetricTrapezoidProfile(unit, { position: -4, velocity: 0 });

    it('mirrors the positive plan', () => {
      expect(profile.direction).toBe(-1);
      const phases = profile.getPhases();
      expect(phases).toHaveLength(3);
      expectPhase(phases[0], new ProfilePhase(1, -0.5, -1, 0));
      expectPhase(phases[1], new ProfilePhase(3, -3, 0, -1));
      expectPhase(phases[2], new ProfilePhase(1, -0.5, 1, -1));
    });

    it('reaches the target', () => {
      expectState(profile.sample(5), -4, 0);
      expectState(profile.sample(2.5), -2, -1);
    });
  });

  describe('ramps that meet before the velocity limit', () => {
    it('solves a symmetric triangle', () => {
      const profile = new AsymmetricTrapezoidProfile(unit, { position: 0.25, velocity: 0 });
      const phases = profile.getPhases();
      expect(phases).toHaveLength(2);
      expectPhase(phases[0], new ProfilePhase(0.5, 0.125, 1, 0));
      expectPhase(phases[1], new ProfilePhase(0.5, 0.125, -1, 0.5));
      expect(phases.some(phase => phase.isCoast)).toBe(false);
      expectState(profile.sample(profile.totalTime()), 0.25, 0);
    });

    it('solves an asymmetric triangle', () => {
      const profile = new AsymmetricTrapezoidProfile(
        { maxVelocity: 10, maxAcceleration: 2, maxDeceleration: 1 },
        { position: 3, velocity: 0 },
      );
      const phases = profile.getPhases();
      expect(phases).toHaveLength(2);
      expectPhase(phases[0], new ProfilePhase(1, 1, 2, 0));
      expectPhase(phases[1], new ProfilePhase(2, 2, -1, 2));
      expect(profile.totalTime()).toBeCloseTo(3, 9);
      expectState(profile.sample(1), 1, 2);
      expectState(profile.sample(3), 3, 0);
    });
  });

  describe('unreachable target velocity', () => {
    it('accelerates the whole way when the target velocity is too high', () => {
      const profile = new AsymmetricTrapezoidProfile(
        { maxVelocity: 10, maxAcceleration: 1, maxDeceleration: 1 },
        { position: 0.5, velocity: 2 },
      );
      const phases = profile.getPhases();
      expect(phases).toHaveLength(1);
      expectPhase(phases[0], new ProfilePhase(1, 0.5, 1, 0));
      expectState(profile.sample(profile.totalTime()), 0.5, 1);
    });

    it('brakes harder than the limit when the target velocity is too low', () => {
      const profile = new AsymmetricTrapezoidProfile(
        { maxVelocity: 10, maxAcceleration: 1, maxDeceleration: 1 },
        { position: 1, velocity: 0 },
        { position: 0, velocity: 2 },
      );
      const phases = profile.getPhases();
      expect(phases).toHaveLength(1);
      expectPhase(phases[0], new ProfilePhase(1, 1, -2, 2));
      expectState(profile.sample(profile.totalTime()), 1, 0);
    });
  });

  describe('endpoint velocities', () => {
    it('clamps an initial velocity above the limit', () => {
      const profile = new AsymmetricTrapezoidProfile(unit, { position: 10, velocity: 0 }, { position: 0, velocity: 3 });
      expect(profile.initialState).toEqual({ position: 0, velocity: 1 });
      const phases = profile.getPhases();
      expect(phases).toHaveLength(2);
      expectPhase(phases[0], new ProfilePhase(9.5, 9.5, 0, 1));
      expectPhase(phases[1], new ProfilePhase(1, 0.5, -1, 1));
    });

    it('clamps a target velocity above the limit', () => {
      const profile = new AsymmetricTrapezoidProfile(unit, { position: 10, velocity: 5 });
      expect(profile.target).toEqual({ position: 10, velocity: 1 });
    });

    it('turns around when starting with velocity away from the target', () => {
      const profile = new AsymmetricTrapezoidProfile(
        { maxVelocity: 2, maxAcceleration: 1, maxDeceleration: 1 },
        { position: 4, velocity: 0 },
        { position: 0, velocity: -1 },
      );
      const phases = profile.getPhases();
      expect(phases).toHaveLength(3);
      expectPhase(phases[0], new ProfilePhase(3, 1.5, 1, -1));
      expectPhase(phases[1], new ProfilePhase(0.25, 0.5, 0, 2));
      expectPhase(phases[2], new ProfilePhase(2, 2, -1, 2));
      expect(profile.sample(1).position).toBeCloseTo(-0.5, 9);
      expectState(profile.sample(profile.totalTime()), 4, 0);
    });

    it('ends at a non-zero target velocity', () => {
      const profile = new AsymmetricTrapezoidProfile(
        { maxVelocity: 2, maxAcceleration: 1, maxDeceleration: 1 },
        { position: 10, velocity: 1 },
      );
      expectState(profile.sample(profile.totalTime()), 10, 1);
      expectState(profile.sample(profile.totalTime() + 10), 10, 1);
    });
  });

  describe('coincident endpoints', () => {
    it('produces an empty profile when already at rest on the target', () => {
      const profile = new AsymmetricTrapezoidProfile(unit, { position: 2, velocity: 0 }, { position: 2, velocity: 0 });
      expect(profile.getPhases()).toHaveLength(0);
      expect(profile.totalTime()).toBe(0);
      expect(profile.isFinished(0)).toBe(true);
      expect(profile.sample(1)).toEqual({ position: 2, velocity: 0 });
    });

    it('rejects a non-zero target velocity at the starting position', () => {
      const build = () => new AsymmetricTrapezoidProfile(unit, { position: 2, velocity: 1 }, { position: 2, velocity: 0 });
      expect(build).toThrow(ValidationError);
      expect(build).toThrow('target.velocity must be zero when the target position equals the initial position');
    });
  });

  describe('validation', () => {
    it.each([
      ['maxVelocity', { maxVelocity: 0, maxAcceleration: 1, maxDeceleration: 1 }],
      ['maxAcceleration', { maxVelocity: 1, maxAcceleration: 0, maxDeceleration: 1 }],
      ['maxDeceleration', { maxVelocity: 1, maxAcceleration: 1, maxDeceleration: 0 }],
      ['maxVelocity', { maxVelocity: -1, maxAcceleration: 1, maxDeceleration: 1 }],
    ])('rejects a non-positive %s at construction', (field, constraints) => {
      expect(() => new AsymmetricTrapezoidProfile(constraints, { position: 1, velocity: 0 })).toThrow(
        `${field} must be greater than zero`,
      );
    });

    it('rejects a non-finite target position', () => {
      expect(() => new AsymmetricTrapezoidProfile(unit, { position: Infinity, velocity: 0 })).toThrow(
        'target.position must be finite',
      );
    });
  });

  describe('timeLeftUntil', () => {
    const profile = new AsymmetricTrapezoidProfile(unit, { position: 4, velocity: 0 });

    it('inverts the acceleration phase', () => {
      expect(profile.timeLeftUntil(0.125)).toBeCloseTo(0.5, 9);
    });

    it('lands on a phase boundary', () => {
      expect(profile.timeLeftUntil(0.5)).toBeCloseTo(1, 9);
    });

    it('inverts the coast phase', () => {
      expect(profile.timeLeftUntil(2)).toBeCloseTo(2.5, 9);
    });

    it('inverts the deceleration phase', () => {
      expect(profile.timeLeftUntil(3.875)).toBeCloseTo(4.5, 9);
    });

    it('saturates at the ends', () => {
      expect(profile.timeLeftUntil(0)).toBe(0);
      expect(profile.timeLeftUntil(-1)).toBe(0);
      expect(profile.timeLeftUntil(4)).toBe(5);
      expect(profile.timeLeftUntil(10)).toBe(5);
    });

    it('works in the negative direction', () => {
      const reverse = new AsymmetricTrapezoidProfile(unit, { position: -4, velocity: 0 });
      expect(reverse.timeLeftUntil(-0.125)).toBeCloseTo(0.5, 9);
      expect(reverse.timeLeftUntil(-2)).toBeCloseTo(2.5, 9);
      expect(reverse.timeLeftUntil(1)).toBe(0);
    });

    it('agrees with sample', () => {
      const asym = new AsymmetricTrapezoidProfile(
        { maxVelocity: 2, maxAcceleration: 4, maxDeceleration: 1 },
        { position: 11, velocity: 0 },
        { position: 1, velocity: 0 },
      );
      for (const position of [1.2, 3, 6.5, 9, 10.9]) {
        expect(asym.sample(asym.timeLeftUntil(position)).position).toBeCloseTo(position, 6);
      }
    });
  });

  describe('planAsymmetricTrapezoid', () => {
    it('reports the direction and clamped endpoints', () => {
      const plan = planAsymmetricTrapezoid(unit, { position: -3, velocity: -4 }, { position: 1, velocity: 0 });
      expect(plan.direction).toBe(-1);
      expect(plan.initial).toEqual({ position: 1, velocity: 0 });
      expect(plan.target).toEqual({ position: -3, velocity: -1 });
    });

    it('defaults the initial state to rest at zero', () => {
      const plan = planAsymmetricTrapezoid(unit, { position: 4, velocity: 0 });
      expect(plan.initial).toEqual({ position: 0, velocity: 0 });
      expect(plan.phases).toHaveLength(3);
    });

    it('returns the validated limit magnitudes', () => {
      const plan = planAsymmetricTrapezoid(unit, { position: -4, velocity: 0 });
      expect(plan.constraints).toEqual({ maxVelocity: 1, maxAcceleration: 1, maxDeceleration: 1 });
    });
  });

  it('stores only the known limit fields', () => {
    const limits = { maxVelocity: 2, maxAcceleration: 4, maxDeceleration: 1, label: 'arm' };
    const profile = new AsymmetricTrapezoidProfile(limits, { position: 10, velocity: 0 });
    expect(profile.constraints).toEqual({ maxVelocity: 2, maxAcceleration: 4, maxDeceleration: 1 });
    expect(Object.isFrozen(profile.constraints)).toBe(true);
  });
});

describe('profile properties', () => {
  const cases: { name: string; constraints: ProfileConstraints; target: ProfileState; initial: ProfileState }[] = [
    {
      name: 'unit trapezoid',
      constraints: unit,
      target: { position: 4, velocity: 0 },
      initial: { position: 0, velocity: 0 },
    },
    {
      name: 'fast acceleration, slow deceleration',
      constraints: { maxVelocity: 2, maxAcceleration: 4, maxDeceleration: 1 },
      target: { position: 11, velocity: 0 },
      initial: { position: 1, velocity: 0 },
    },
    {
      name: 'asymmetric triangle',
      constraints: { maxVelocity: 10, maxAcceleration: 2, maxDeceleration: 1 },
      target: { position: 3, velocity: 0 },
      initial: { position: 0, velocity: 0 },
    },
    {
      name: 'reverse move between moving states',
      constraints: { maxVelocity: 3, maxAcceleration: 2, maxDeceleration: 4 },
      target: { position: -2, velocity: -1 },
      initial: { position: 5, velocity: -0.5 },
    },
    {
      name: 'non-zero target velocity',
      constraints: { maxVelocity: 2, maxAcceleration: 1, maxDeceleration: 1 },
      target: { position: 10, velocity: 1 },
      initial: { position: 0, velocity: 0 },
    },
  ];

  for (const { name, constraints, target, initial } of cases) {
    describe(name, () => {
      const profile = new AsymmetricTrapezoidProfile(constraints, target, initial);

      it('reproduces both endpoints', () => {
        expectState(profile.sample(0), initial.position, initial.velocity);
        expectState(profile.sample(profile.totalTime()), target.position, target.velocity);
      });

      it('keeps every phase kinematically consistent', () => {
        for (const phase of profile.getPhases()) {
          const expected = phase.initialVelocity * phase.duration + 0.5 * phase.acceleration * phase.duration ** 2;
          expect(phase.displacement).toBeCloseTo(expected, 9);
        }
      });

      it('never moves against the direction of travel', () => {
        const total = profile.totalTime();
        let previous = profile.sample(0).position;
        for (let i = 1; i <= 200; i++) {
          const position = profile.sample((total * i) / 200).position;
          expect((position - previous) * profile.direction).toBeGreaterThanOrEqual(-1e-9);
          previous = position;
        }
      });

      it('stays within the velocity limit', () => {
        const total = profile.totalTime();
        for (let i = 0; i <= 100; i++) {
          const { velocity } = profile.sample((total * i) / 100);
          expect(Math.abs(velocity)).toBeLessThanOrEqual(constraints.maxVelocity + 1e-9);
        }
      });

      it('has at most three phases', () => {
        expect(profile.getPhases().length).toBeLessThanOrEqual(3);
      });
    });
  }
});
