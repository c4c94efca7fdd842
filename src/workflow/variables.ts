export type VariableState = Readonly<Record<string, unknown>>;

const WHOLE_REFERENCE = /^\$\{([^}]+)\}$/;
const INLINE_REFERENCE = /\$\{([^}]+)\}/g;
const ANY_REFERENCE = /\$\{[^}]+\}/;

type Lookup = { found: true; value: unknown } | { found: false };

function isMapping(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Walks a dot-separated path through nested mappings. Sequences are not
 * indexable; the walk fails as soon as an intermediate value is not a mapping.
 */
export function lookupPath(state: VariableState, path: string): Lookup {
  let current: unknown = state;
  for (const segment of path.trim().split('.')) {
    if (!isMapping(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
      return { found: false };
    }
    current = current[segment];
  }
  return { found: true, value: current };
}

function stringify(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

export function interpolate(template: string, state: VariableState): unknown {
  const whole = WHOLE_REFERENCE.exec(template);
  if (whole) {
    const lookup = lookupPath(state, whole[1]);
    return lookup.found ? lookup.value : template;
  }

  return template.replace(INLINE_REFERENCE, (match: string, path: string) => {
    const lookup = lookupPath(state, path);
    if (!lookup.found || lookup.value === null || lookup.value === undefined) return match;
    return stringify(lookup.value);
  });
}

export function resolveVariables(value: unknown, state: VariableState): unknown {
  if (typeof value === 'string') {
    return interpolate(value, state);
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveVariables(item, state));
  }
  if (isMapping(value)) {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      result[k] = resolveVariables(v, state);
    }
    return result;
  }
  return value;
}

export function hasUnresolvedReference(value: unknown): boolean {
  return typeof value === 'string' && ANY_REFERENCE.test(value);
}

/** Truthiness used for step conditions; an unresolved reference counts as false. */
export function isTruthy(value: unknown): boolean {
  if (value === null || value === undefined || value === false) return false;
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  if (typeof value === 'string') return value.length > 0 && !hasUnresolvedReference(value);
  if (Array.isArray(value)) return value.length > 0;
  if (isMapping(value)) return Object.keys(value).length > 0;
  return true;
}
