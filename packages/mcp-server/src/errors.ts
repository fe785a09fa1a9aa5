/**
 * Custom error types for KinematicMCP.
 */

/** Base error for all KinematicMCP errors */
export class KinematicMcpError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'KinematicMcpError';
  }
}

/** Invalid constraints, states, or tool arguments */
export class ValidationError extends KinematicMcpError {
  constructor(message: string, public readonly field?: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

/** Preset file could not be read or parsed */
export class PresetError extends KinematicMcpError {
  constructor(message: string, public readonly filePath?: string) {
    super(message, 'PRESET_ERROR');
    this.name = 'PresetError';
  }
}

/** Requested preset name is not registered */
export class UnknownPresetError extends KinematicMcpError {
  constructor(public readonly presetName: string) {
    super(`Unknown preset: ${presetName}`, 'UNKNOWN_PRESET');
    this.name = 'UnknownPresetError';
  }
}

/** Tool not found error */
export class UnknownToolError extends KinematicMcpError {
  constructor(toolName: string) {
    super(`Unknown tool: ${toolName}`, 'UNKNOWN_TOOL');
    this.name = 'UnknownToolError';
  }
}
