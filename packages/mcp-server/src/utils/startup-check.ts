/**
 * Startup self-test: validates configuration before the server starts.
 */

import { existsSync } from 'fs';
import { loadPresets, type ConstraintPreset } from '../config/preset-loader.js';
import { isLogLevel, logger, type Logger } from './logger.js';

export interface StartupCheckResult {
  passed: boolean;
  checks: { name: string; status: 'ok' | 'warn' | 'fail'; message: string }[];
  /** Presets the server should use; empty when the preset file failed to load. */
  presets: Map<string, ConstraintPreset>;
}

export interface StartupConfig {
  presetsPath?: string;
  logLevel: string;
}

export function runStartupChecks(config: StartupConfig): StartupCheckResult {
  const checks: StartupCheckResult['checks'] = [];
  let presets = new Map<string, ConstraintPreset>();

  // 1. Log level
  if (isLogLevel(config.logLevel)) {
    checks.push({ name: 'log-level', status: 'ok', message: `Log level: ${config.logLevel}` });
  } else {
    checks.push({
      name: 'log-level',
      status: 'fail',
      message: `Log level must be one of debug, info, warn, error; got: ${config.logLevel}`,
    });
  }

  // 2. Preset file, if specified
  if (config.presetsPath) {
    if (existsSync(config.presetsPath)) {
      try {
        presets = loadPresets(config.presetsPath);
        checks.push({
          name: 'presets-file',
          status: 'ok',
          message: `Presets loaded: ${[...presets.keys()].join(', ')}`,
        });

        for (const preset of presets.values()) {
          const { maxAcceleration, maxDeceleration } = preset.constraints;
          const ratio = Math.max(maxAcceleration, maxDeceleration) / Math.min(maxAcceleration, maxDeceleration);
          if (ratio > 100) {
            checks.push({
              name: 'preset-ratio',
              status: 'warn',
              message: `Preset "${preset.name}" has acceleration and deceleration limits ${ratio.toFixed(0)}x apart`,
            });
          }
        }
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        checks.push({ name: 'presets-file', status: 'fail', message: `Failed to load presets: ${message}` });
      }
    } else {
      checks.push({ name: 'presets-file', status: 'fail', message: `Presets file not found: ${config.presetsPath}` });
    }
  } else {
    presets = loadPresets();
    checks.push({ name: 'presets-file', status: 'ok', message: 'Using built-in presets' });
  }

  // 3. Node.js version
  const nodeVersion = parseInt(process.version.slice(1), 10);
  if (nodeVersion < 20) {
    checks.push({ name: 'node-version', status: 'fail', message: `Node.js >= 20 required, got: ${process.version}` });
  } else {
    checks.push({ name: 'node-version', status: 'ok', message: `Node.js ${process.version}` });
  }

  const passed = checks.every(c => c.status !== 'fail');

  return { passed, checks, presets };
}

export function printStartupChecks(result: StartupCheckResult, log: Logger = logger.child('StartupCheck')): void {
  for (const check of result.checks) {
    const line = `${check.name}: ${check.message}`;
    if (check.status === 'ok') {
      log.info(line);
    } else if (check.status === 'warn') {
      log.warn(line);
    } else {
      log.error(line);
    }
  }
  if (!result.passed) {
    log.error('Startup checks FAILED. Fix the issues above and try again.');
  }
}
