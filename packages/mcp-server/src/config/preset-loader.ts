/**
 * Load named constraint presets from YAML config files.
 *
 * File format:
 *
 * ```yaml
 * presets:
 *   elevator:
 *     description: Lift carriage
 *     maxVelocity: 1.5
 *     maxAcceleration: 3.0
 *     maxDeceleration: 1.5   # optional, defaults to maxAcceleration
 * ```
 */

import { readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { PresetError, UnknownPresetError } from '../errors.js';
import { ConstraintsSchema, SymmetricConstraintsSchema } from '../profile/index.js';
import type { ProfileConstraints } from '../profile/index.js';
import { logger } from '../utils/logger.js';

const log = logger.child('PresetLoader');

export interface ConstraintPreset {
  name: string;
  description: string;
  constraints: ProfileConstraints;
}

const PresetEntrySchema = SymmetricConstraintsSchema.extend({
  description: z.string().optional(),
  maxDeceleration: ConstraintsSchema.shape.maxDeceleration.optional(),
});

const PresetFileSchema = z.object({
  presets: z.record(PresetEntrySchema),
});

const DEFAULT_PRESETS: readonly ConstraintPreset[] = [
  {
    name: 'default',
    description: 'Conservative symmetric limits',
    constraints: { maxVelocity: 1.0, maxAcceleration: 1.0, maxDeceleration: 1.0 },
  },
  {
    name: 'elevator',
    description: 'Lift carriage: fast rise, gentle settle',
    constraints: { maxVelocity: 1.5, maxAcceleration: 3.0, maxDeceleration: 1.5 },
  },
  {
    name: 'drivetrain',
    description: 'Ground robot: traction-limited launch, hard braking',
    constraints: { maxVelocity: 3.0, maxAcceleration: 2.0, maxDeceleration: 4.0 },
  },
];

export function getDefaultPresets(): ConstraintPreset[] {
  return DEFAULT_PRESETS.map(preset => ({ ...preset, constraints: { ...preset.constraints } }));
}

/**
 * Parse a preset document. Presets in the document replace built-in presets
 * of the same name.
 *
 * @throws PresetError when the document does not match the preset format
 */
export function parsePresets(source: string, filePath?: string): Map<string, ConstraintPreset> {
  let data: unknown;
  try {
    data = parseYaml(source);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new PresetError(`Invalid YAML in preset file: ${message}`, filePath);
  }

  const result = PresetFileSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const location = issue.path.join('.');
    throw new PresetError(
      location ? `Invalid preset file: ${location} ${issue.message}` : `Invalid preset file: ${issue.message}`,
      filePath,
    );
  }

  const presets = new Map(getDefaultPresets().map(preset => [preset.name, preset]));
  for (const [name, entry] of Object.entries(result.data.presets)) {
    presets.set(name, {
      name,
      description: entry.description ?? '',
      constraints: {
        maxVelocity: entry.maxVelocity,
        maxAcceleration: entry.maxAcceleration,
        maxDeceleration: entry.maxDeceleration ?? entry.maxAcceleration,
      },
    });
  }
  return presets;
}

export function loadPresets(filePath?: string): Map<string, ConstraintPreset> {
  if (!filePath) {
    return new Map(getDefaultPresets().map(preset => [preset.name, preset]));
  }

  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new PresetError(`Failed to read preset file ${filePath}: ${message}`, filePath);
  }

  const presets = parsePresets(raw, filePath);
  log.info('Loaded presets', { filePath, count: presets.size });
  return presets;
}

export function resolvePreset(presets: ReadonlyMap<string, ConstraintPreset>, name: string): ConstraintPreset {
  const preset = presets.get(name);
  if (!preset) {
    throw new UnknownPresetError(name);
  }
  return preset;
}
