export type Variables = Record<string, string>;

const PLACEHOLDER = /\$\{(ENV\.)?(\w+)\}/g;

/**
 * Replace ${VAR} with a hook variable and ${ENV.NAME} with an environment
 * variable. Unknown names become empty strings.
 */
export function interpolate(template: string, vars: Variables): string {
  return template.replace(PLACEHOLDER, (_match, env: string | undefined, name: string) =>
    env ? process.env[name] ?? "" : vars[name] ?? ""
  );
}

/**
 * Interpolate every string inside parsed YAML data, keeping its shape
 */
export function interpolateValue(value: unknown, vars: Variables): unknown {
  if (typeof value === "string") {
    return interpolate(value, vars);
  }
  if (Array.isArray(value)) {
    return value.map((item) => interpolateValue(item, vars));
  }
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, interpolateValue(item, vars)])
    );
  }
  return value;
}

/**
 * Interpolate a string or a list of strings
 */
export function interpolateAll(value: string | string[], vars: Variables): string[] {
  const items = Array.isArray(value) ? value : [value];
  return items.map((item) => interpolate(item, vars));
}
