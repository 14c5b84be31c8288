const ENV_CALL = /^env\("([^"]+)"(?:,\s*"([^"]*)")?\)$/;
const VAR_REF = /^var\.(\w+)$/;
const INTERPOLATION = /\$\{([^}]+)\}/g;

/**
 * Resolves `${env("NAME")}`, `${env("NAME", "fallback")}` and `${var.name}`
 * interpolations. Unset or empty environment variables take the fallback,
 * unknown names resolve to an empty string, and any other expression is left
 * as written.
 */
export const resolveValue = (
  value: string,
  env: Record<string, string | undefined> = {},
  vars: Record<string, string> = {},
): string =>
  value.replace(INTERPOLATION, (match: string, expr: string) => {
    const envCall = expr.match(ENV_CALL);

    if (envCall) {
      const [, envName, fallback = ""] = envCall;

      return env[envName] || fallback;
    }

    const varName = expr.match(VAR_REF)?.[1];

    if (varName) {
      return vars[varName] || "";
    }

    return match;
  });

// hcl2json wraps block attributes in single-element arrays.
export const extractValue = <T>(
  value: T[] | T | undefined,
  defaultValue: T,
): T => {
  if (Array.isArray(value)) {
    return value.length > 0 ? value[0] : defaultValue;
  }

  return value === undefined ? defaultValue : value;
};

export const extractObject = <T extends Record<string, unknown>>(
  value: T[] | T | undefined,
  defaultValue: T,
): T => {
  if (Array.isArray(value)) {
    return value[0] ?? defaultValue;
  }

  return value ?? defaultValue;
};
