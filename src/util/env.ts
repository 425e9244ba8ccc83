/**
 * Expand ${VAR} references in string values from process.env.
 */

import { warn } from "./logger";

const ENV_VAR_RE = /\$\{([^}]+)\}/g;

/**
 * `context` names where the value came from (e.g. "server 'github', TOKEN")
 * and is added to the warning for an unset variable.
 */
export function expandEnvVars(
  value: string,
  env: Record<string, string | undefined> = process.env,
  context?: string,
): string {
  return value.replace(ENV_VAR_RE, (_, varName: string) => {
    if (!(varName in env)) {
      const where = context ? ` (${context})` : "";
      warn(`Environment variable '${varName}' is not set${where}; substituting an empty string`);
    }
    return env[varName] ?? "";
  });
}

export function expandEnvRecord(
  record: Record<string, string>,
  env: Record<string, string | undefined> = process.env,
  owner?: string,
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(record)) {
    result[key] = expandEnvVars(value, env, owner ? `${owner}, ${key}` : key);
  }
  return result;
}
