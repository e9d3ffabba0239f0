type EnvParseResult = number | null | undefined;

function parseEnvIntValue(
  envVar: string,
  min: number,
  max: number
): EnvParseResult {
  const value = process.env[envVar];
  if (!value) return undefined;

  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < min || parsed > max) {
    return null;
  }

  return parsed;
}

// Helper function for parsing and validating integer environment variables
export function parseEnvInt(
  envVar: string,
  defaultValue: number,
  min: number,
  max: number
): number {
  const parsed = parseEnvIntValue(envVar, min, max);
  if (parsed === undefined) return defaultValue;
  if (parsed === null) {
    const value = process.env[envVar] ?? '';
    console.error(
      `[WARNING] Invalid ${envVar} value: ${value} (must be ${min}-${max}). Using default: ${defaultValue}`
    );
    return defaultValue;
  }
  return parsed;
}

export const SERVER_NAME = 'dir-walker';
export const SERVER_VERSION = '0.1.0';

export const DEFAULT_MAX_DEPTH = 100;
export const DEFAULT_MAX_ENTRIES = 10000;

export const TOOL_DEFAULT_MAX_DEPTH = parseEnvInt(
  'DIR_WALKER_TOOL_MAX_DEPTH',
  DEFAULT_MAX_DEPTH,
  0,
  1000
);
export const TOOL_DEFAULT_MAX_ENTRIES = parseEnvInt(
  'DIR_WALKER_TOOL_MAX_ENTRIES',
  DEFAULT_MAX_ENTRIES,
  1,
  100000
);
