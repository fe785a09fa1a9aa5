/**
 * Command-line and environment configuration for the server.
 */

import { ENV_LOG_LEVEL, ENV_PRESETS_PATH } from '../constants.js';

export interface CliConfig {
  presetsPath?: string;
  logLevel: string;
  jsonLogs: boolean;
}

export const HELP_TEXT = `
KinematicMCP - motion profile planning over MCP

Usage: kinematic-mcp [options]

Options:
  --presets <path>     Path to a YAML constraint preset file
  --log-level <level>  debug, info, warn or error (default: info)
  --json-logs          Write logs as JSON lines
  --verbose            Same as --log-level debug
  --version            Show version number
  --help               Show this help message

Environment variables:
  ${ENV_PRESETS_PATH}    Same as --presets
  ${ENV_LOG_LEVEL}  Same as --log-level
`;

// --- CLI argument parsing ---
export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): CliConfig | 'help' | 'version' {
  if (argv.includes('--help') || argv.includes('-h')) {
    return 'help';
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return 'version';
  }

  let presetsPath = env[ENV_PRESETS_PATH] || undefined;
  let logLevel = env[ENV_LOG_LEVEL] || 'info';
  let jsonLogs = false;

  for (let i = 0; i < argv.length; i++) {
    switch (argv[i]) {
      case '--presets':
        presetsPath = argv[++i];
        break;
      case '--log-level':
        logLevel = argv[++i] ?? logLevel;
        break;
      case '--json-logs':
        jsonLogs = true;
        break;
      case '--verbose':
        logLevel = 'debug';
        break;
    }
  }

  return { presetsPath, logLevel, jsonLogs };
}
