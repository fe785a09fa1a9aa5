/**
 * Shared constants for KinematicMCP.
 */

// --- Server ---
export const SERVER_NAME = 'kinematic-mcp';
export const SERVER_VERSION = '0.1.0';
export const ENV_PRESETS_PATH = 'KINEMATIC_MCP_PRESETS';
export const ENV_LOG_LEVEL = 'KINEMATIC_MCP_LOG_LEVEL';

// --- Tool limits ---
export const DEFAULT_TRACE_DT = 0.02;   // seconds (50 Hz control loop)
export const MAX_TRACE_POINTS = 10000;
export const MAX_SAMPLE_TIMES = 1000;
