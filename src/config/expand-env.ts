/**
 * `${VAR}` and `${VAR:-fallback}` references in config values.
 * An unset or empty variable without a fallback expands to "".
 */

const ENV_REF = /\$\{(\w+)(?::-([^}]*))?\}/g;

export function expandEnvVars(value: string, env: Record<string, string | undefined>): string {
  return value.replace(ENV_REF, (_, key: string, fallback: string | undefined) => {
    const current = env[key];
    return current !== undefined && current !== "" ? current : (fallback ?? "");
  });
}

export function expandEnvVarsDeep(
  obj: unknown,
  env: Record<string, string | undefined>
): unknown {
  if (typeof obj === "string") return expandEnvVars(obj, env);
  if (Array.isArray(obj)) return obj.map((v) => expandEnvVarsDeep(v, env));
  if (obj && typeof obj === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) out[k] = expandEnvVarsDeep(v, env);
    return out;
  }
  return obj;
}
