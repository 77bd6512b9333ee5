export type Mapping = Record<string, unknown>;

export function isMapping(value: unknown): value is Mapping {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Class instances and other non-plain objects (functions included). */
export function isInstance(value: unknown): value is object {
  if (typeof value === 'function') return true;
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !isMapping(value);
}

export function has(source: object, key: string): boolean {
  if (isMapping(source)) return Object.prototype.hasOwnProperty.call(source, key);
  return key in source;
}

export function read(source: object, key: string): unknown {
  return has(source, key) ? Reflect.get(source, key) : undefined;
}

/** Value of the first key present on the source, even when that value is empty. */
export function pick(source: object, ...keys: string[]): unknown {
  for (const key of keys) {
    if (has(source, key)) return Reflect.get(source, key);
  }
  return undefined;
}

export function hasAny(source: object, ...keys: string[]): boolean {
  return keys.some((key) => has(source, key));
}

export function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') return value.length > 0 ? value : undefined;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') return String(value);
  return undefined;
}

export function listOf(value: unknown): unknown[] | undefined {
  return Array.isArray(value) ? value : undefined;
}

export function mappingOf(value: unknown): Mapping | undefined {
  return isMapping(value) ? value : undefined;
}

/** Emptiness in the loose sense config authors expect: '', 0, [], {} and nullish are all off. */
export function truthy(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (isMapping(value)) return Object.keys(value).length > 0;
  if (value instanceof Map || value instanceof Set) return value.size > 0;
  return Boolean(value);
}

export function countOf(value: unknown): number | undefined {
  if (Array.isArray(value)) return value.length;
  if (value instanceof Map || value instanceof Set) return value.size;
  if (isMapping(value)) return Object.keys(value).length;
  return undefined;
}

export function excerpt(text: string, limit = 200): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

/**
 * Name of a list entry: the string itself, the first textual key of a mapping or
 * instance, or a function's own name.
 */
export function nameOf(item: unknown, keys: readonly string[] = ['name']): string | undefined {
  if (typeof item === 'string') return textOf(item);
  if (typeof item === 'function' && item.name) return item.name;
  if (typeof item === 'object' && item !== null && !Array.isArray(item)) {
    for (const key of keys) {
      const value = textOf(read(item, key));
      if (value !== undefined) return value;
    }
  }
  return undefined;
}

export function namesOf(list: readonly unknown[], keys?: readonly string[], fallback = 'unknown'): string[] {
  return list.map((item) => nameOf(item, keys) ?? fallback);
}

/** Constructor names along the prototype chain, most derived first. */
export function typeNamesOf(value: object): string[] {
  const names: string[] = [];
  if (typeof value === 'function' && value.name) names.push(value.name);
  let proto: unknown = Object.getPrototypeOf(value);
  while (typeof proto === 'object' && proto !== null && proto !== Object.prototype) {
    const ctor: unknown = Reflect.get(proto, 'constructor');
    if (typeof ctor === 'function' && ctor.name && !names.includes(ctor.name)) names.push(ctor.name);
    proto = Object.getPrototypeOf(proto);
  }
  return names.length > 0 ? names : ['Object'];
}
