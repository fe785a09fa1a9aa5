/**
 * Motion profile tools.
 *
 * Lets AI agents plan trapezoid motion profiles and sample them as a
 * controller would. Every call is stateless: the profile is rebuilt from
 * the arguments, which is cheap since planning is closed-form.
 */

import { z, ZodError } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { KinematicMcpError, UnknownToolError, ValidationError } from '../errors.js';
import { resolvePreset, type ConstraintPreset } from '../config/preset-loader.js';
import { DEFAULT_TRACE_DT, MAX_SAMPLE_TIMES, MAX_TRACE_POINTS } from '../constants.js';
import {
  AsymmetricTrapezoidProfile,
  TrapezoidProfile,
  type ProfilePhase,
  type ProfileState,
} from '../profile/index.js';
import { logger } from '../utils/logger.js';

const log = logger.child('ProfileTools');

export type ToolResult = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

function toInputSchema(schema: z.ZodType): Tool['inputSchema'] {
  return zodToJsonSchema(schema) as unknown as Tool['inputSchema'];
}

const StateArgSchema = z.object({
  position: z.number().describe('Position'),
  velocity: z.number().default(0).describe('Velocity (default: 0)'),
});

const ProfileArgsSchema = z.object({
  preset: z.string().optional().describe('Name of a constraint preset; explicit limits below override it'),
  maxVelocity: z.number().optional().describe('Maximum velocity magnitude'),
  maxAcceleration: z.number().optional().describe('Maximum acceleration magnitude'),
  maxDeceleration: z.number().optional().describe('Maximum deceleration magnitude (default: maxAcceleration)'),
  target: StateArgSchema.describe('State to reach at the end of the profile'),
  initial: StateArgSchema.optional().describe('Starting state (default: position 0, velocity 0)'),
});

const SampleArgsSchema = ProfileArgsSchema.extend({
  times: z.array(z.number()).min(1).max(MAX_SAMPLE_TIMES).describe('Elapsed times in seconds to sample at'),
});

const TraceArgsSchema = ProfileArgsSchema.extend({
  dt: z.number().positive().default(DEFAULT_TRACE_DT).describe(`Sample period in seconds (default: ${DEFAULT_TRACE_DT})`),
});

const TimeUntilArgsSchema = ProfileArgsSchema.extend({
  position: z.number().describe('Position to look up'),
});

export type ProfileArgs = z.infer<typeof ProfileArgsSchema>;

export function getProfileTools(): Tool[] {
  return [
    {
      name: 'profile_plan',
      description: 'Plan a trapezoid motion profile between two states under velocity, acceleration and deceleration limits. Returns the phase breakdown and total duration.',
      inputSchema: toInputSchema(ProfileArgsSchema),
    },
    {
      name: 'profile_sample',
      description: 'Sample the setpoint (position, velocity) of a planned profile at one or more elapsed times',
      inputSchema: toInputSchema(SampleArgsSchema),
    },
    {
      name: 'profile_trace',
      description: 'Sample a planned profile at a fixed period from start to finish, as a control loop would',
      inputSchema: toInputSchema(TraceArgsSchema),
    },
    {
      name: 'profile_time_until',
      description: 'Time from the start of a planned profile until it first reaches a given position',
      inputSchema: toInputSchema(TimeUntilArgsSchema),
    },
    {
      name: 'profile_presets',
      description: 'List the available named constraint presets',
      inputSchema: toInputSchema(z.object({})),
    },
  ];
}

/**
 * Build the profile described by tool arguments. Uses the symmetric planner
 * when acceleration and deceleration limits are equal.
 */
export function buildProfile(
  args: ProfileArgs,
  presets: ReadonlyMap<string, ConstraintPreset>,
): AsymmetricTrapezoidProfile {
  const base = args.preset !== undefined ? resolvePreset(presets, args.preset).constraints : undefined;

  const maxVelocity = args.maxVelocity ?? base?.maxVelocity;
  const maxAcceleration = args.maxAcceleration ?? base?.maxAcceleration;
  if (maxVelocity === undefined || maxAcceleration === undefined) {
    throw new ValidationError(
      'Either a preset or both maxVelocity and maxAcceleration are required',
      maxVelocity === undefined ? 'maxVelocity' : 'maxAcceleration',
    );
  }
  const maxDeceleration =
    args.maxDeceleration ?? (args.maxAcceleration !== undefined ? undefined : base?.maxDeceleration) ?? maxAcceleration;

  const initial = args.initial ?? { position: 0, velocity: 0 };
  if (maxDeceleration === maxAcceleration) {
    return new TrapezoidProfile({ maxVelocity, maxAcceleration }, args.target, initial);
  }
  return new AsymmetricTrapezoidProfile({ maxVelocity, maxAcceleration, maxDeceleration }, args.target, initial);
}

function describePhase(phase: ProfilePhase, direction: number) {
  const kind = phase.isCoast ? 'coast' : phase.acceleration * direction > 0 ? 'accelerate' : 'decelerate';
  return { kind, ...phase.toJSON() };
}

function describeState(state: ProfileState) {
  return { position: state.position, velocity: state.velocity };
}

function textResult(value: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

function errorResult(text: string): ToolResult {
  return { content: [{ type: 'text', text }], isError: true };
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export async function handleProfileTool(
  name: string,
  args: Record<string, unknown>,
  presets: ReadonlyMap<string, ConstraintPreset>,
): Promise<ToolResult> {
  try {
    switch (name) {
      case 'profile_plan': {
        const parsed = ProfileArgsSchema.parse(args);
        const profile = buildProfile(parsed, presets);
        log.debug('Planned profile', { totalTime: profile.totalTime(), phases: profile.getPhases().length });

        return textResult({
          planner: profile instanceof TrapezoidProfile ? 'trapezoid' : 'asymmetric-trapezoid',
          direction: profile.direction,
          constraints: profile.constraints,
          initial: describeState(profile.initialState),
          target: describeState(profile.target),
          totalTime: profile.totalTime(),
          finalState: describeState(profile.finalState()),
          phases: profile.getPhases().map(phase => describePhase(phase, profile.direction)),
        });
      }

      case 'profile_sample': {
        const parsed = SampleArgsSchema.parse(args);
        const profile = buildProfile(parsed, presets);

        return textResult({
          totalTime: profile.totalTime(),
          samples: parsed.times.map(time => ({
            time,
            ...describeState(profile.sample(time)),
            finished: profile.isFinished(time),
          })),
        });
      }

      case 'profile_trace': {
        const parsed = TraceArgsSchema.parse(args);
        const profile = buildProfile(parsed, presets);
        const totalTime = profile.totalTime();

        const steps = Math.floor(totalTime / parsed.dt) + 1;
        if (steps > MAX_TRACE_POINTS) {
          return errorResult(
            `Trace would have ${steps} points (limit ${MAX_TRACE_POINTS}); increase dt to at least ${totalTime / (MAX_TRACE_POINTS - 1)}`,
          );
        }

        const times = Array.from({ length: steps }, (_, i) => i * parsed.dt);
        if (times[times.length - 1] < totalTime) {
          times.push(totalTime);
        }

        return textResult({
          dt: parsed.dt,
          totalTime,
          points: times.map(time => ({ time, ...describeState(profile.sample(time)) })),
        });
      }

      case 'profile_time_until': {
        const parsed = TimeUntilArgsSchema.parse(args);
        const profile = buildProfile(parsed, presets);

        return textResult({
          position: parsed.position,
          time: profile.timeLeftUntil(parsed.position),
          totalTime: profile.totalTime(),
        });
      }

      case 'profile_presets': {
        const list = Array.from(presets.values()).map(preset => ({
          name: preset.name,
          description: preset.description,
          ...preset.constraints,
        }));
        return {
          content: [{
            type: 'text',
            text: list.length > 0 ? JSON.stringify(list, null, 2) : 'No presets available.',
          }],
        };
      }

      default:
        throw new UnknownToolError(name);
    }
  } catch (error) {
    if (error instanceof ZodError) {
      return errorResult(`Invalid arguments: ${formatZodError(error)}`);
    }
    if (error instanceof KinematicMcpError) {
      log.warn('Profile request rejected', { tool: name, code: error.code, message: error.message });
      return errorResult(`${error.name}: ${error.message}`);
    }
    throw error;
  }
}
