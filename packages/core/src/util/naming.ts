/**
 * Identifier helpers for definition names
 */

/** Upper-cases the first character, leaving the rest untouched */
export function upperFirst(s: string): string {
  return s.length === 0 ? s : s[0].toUpperCase() + s.slice(1);
}

/**
 * Joins separator-delimited words into an upper camel identifier.
 * `order-service_v2` → `OrderServiceV2`; inner casing is preserved.
 */
export function toCamel(s: string): string {
  return s
    .split(/[^A-Za-z0-9]+/)
    .filter((part) => part.length > 0)
    .map(upperFirst)
    .join('');
}

/** Last path segment of a module path */
export function moduleBase(module: string): string {
  const trimmed = module.replace(/\/+$/, '');
  const index = trimmed.lastIndexOf('/');
  return index === -1 ? trimmed : trimmed.slice(index + 1);
}
