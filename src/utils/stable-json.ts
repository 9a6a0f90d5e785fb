/**
 * Stable JSON Serialization
 *
 * Many JSON serializers produce insertion-ordered keys, so two equal option
 * objects built in a different order serialize differently and would hash
 * to different cache keys.
 *
 * `stableStringify()` sorts keys recursively so the same object always
 * produces the same byte sequence regardless of insertion order.
 */

export class UnserializableValueError extends TypeError {
  constructor(
    public readonly path: string,
    public readonly valueType: string
  ) {
    super(`Cannot serialize ${valueType} at ${path || '<root>'}`);
    this.name = 'UnserializableValueError';
  }
}

/**
 * Serialize a value to JSON with recursively sorted keys.
 * Arrays preserve their original element order. Values JSON has no exact
 * form for are rejected: NaN, the infinities, bigints, functions and symbols.
 *
 * @param space - Optional indentation (same as JSON.stringify)
 */
export function stableStringify(value: unknown, space?: number | string): string {
  return JSON.stringify(sortKeys(value, ''), null, space) ?? 'null';
}

function sortKeys(value: unknown, path: string): unknown {
  switch (typeof value) {
    case 'number':
      if (!Number.isFinite(value)) {
        throw new UnserializableValueError(path, 'non-finite number');
      }
      return value;
    case 'bigint':
    case 'function':
    case 'symbol':
      throw new UnserializableValueError(path, typeof value);
    case 'object':
      break;
    default:
      return value;
  }

  if (value === null) return null;

  if (Array.isArray(value)) {
    return value.map((item: unknown, index) => sortKeys(item, `${path}[${index}]`));
  }

  if (hasToJSON(value)) {
    return sortKeys(value.toJSON(), path);
  }

  const sorted: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    // JSON drops undefined members; keep that behaviour
    if (child === undefined) continue;
    sorted[key] = sortKeys(child, path ? `${path}.${key}` : key);
  }
  return sorted;
}

function hasToJSON(value: object): value is { toJSON: () => unknown } {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}
