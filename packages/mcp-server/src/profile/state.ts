import { PROFILE_EPSILON, type ProfileState } from './types.js';

export const ZERO_STATE: ProfileState = Object.freeze({ position: 0, velocity: 0 });

export function createState(position: number, velocity: number): ProfileState {
  return Object.freeze({ position, velocity });
}

/** Compare two states within {@link PROFILE_EPSILON}. */
export function statesEqual(a: ProfileState, b: ProfileState): boolean {
  return (
    Math.abs(a.position - b.position) < PROFILE_EPSILON &&
    Math.abs(a.velocity - b.velocity) < PROFILE_EPSILON
  );
}

export function formatState(state: ProfileState): string {
  return `State[position: ${state.position}, velocity: ${state.velocity}]`;
}
