export type Environment = Record<string, string | undefined>;

export interface InterpolationResult<T> {
  value: T;
  /** Variables that had no value and no default */
  missing: string[];
}

const PLACEHOLDER = /\$\{(?:ENV\.)?([A-Za-z_]\w*)(?::-([^}]*))?\}/g;

/**
 * Interpolate ${NAME}, ${ENV.NAME} and ${NAME:-default} from the environment
 */
export function interpolate(template: string, env: Environment): InterpolationResult<string> {
  const missing: string[] = [];
  const value = template.replace(PLACEHOLDER, (_match, name: string, fallback: string | undefined) => {
    const resolved = env[name];
    if (resolved !== undefined) return resolved;
    if (fallback !== undefined) return fallback;
    missing.push(name);
    return "";
  });
  return { value, missing };
}

/**
 * Interpolate every string in a parsed YAML tree. Keys are left alone.
 */
export function interpolateTree(value: unknown, env: Environment): InterpolationResult<unknown> {
  const missing: string[] = [];

  const visit = (node: unknown): unknown => {
    if (typeof node === "string") {
      const result = interpolate(node, env);
      missing.push(...result.missing);
      return result.value;
    }
    if (Array.isArray(node)) {
      return node.map(visit);
    }
    if (typeof node === "object" && node !== null) {
      return Object.fromEntries(Object.entries(node).map(([key, child]) => [key, visit(child)]));
    }
    return node;
  };

  return { value: visit(value), missing: [...new Set(missing)] };
}
