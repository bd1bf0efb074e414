/**
 * Loads environment variables from the process environment.
 *
 * @returns An object containing the environment variables.
 */
export function loadEnv(): Record<string, string | undefined> {
  if (typeof process === 'undefined' || typeof process.env !== 'object') {
    return {};
  }
  return process.env;
}

/**
 * Checks if a flag is enabled in the environment.
 *
 * @param flagName - The name of the flag to check.
 * @returns `true` if the flag is enabled, `false` otherwise.
 */
function isEnabled(flagName: string): boolean {
  const env = loadEnv();
  return env[flagName] === 'true' || env[flagName] === '1';
}

/**
 * Global configuration for logging.
 */
export const logging = {
  get dontLogModelData() {
    return isEnabled('AGENTLOOP_DONT_LOG_MODEL_DATA');
  },
  get dontLogToolData() {
    return isEnabled('AGENTLOOP_DONT_LOG_TOOL_DATA');
  },
};

/**
 * Global defaults for runs. Values can be overridden per `Runner` or per call.
 */
export const runDefaults = {
  get maxTurns(): number {
    const raw = loadEnv().AGENTLOOP_DEFAULT_MAX_TURNS;
    const parsed = raw ? Number.parseInt(raw, 10) : NaN;
    return Number.isInteger(parsed) && parsed > 0 ? parsed : 10;
  },
};
