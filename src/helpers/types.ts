/** Used by Flavor to mark a type in a readable way. */
interface Flavoring<FlavorT> {
  _type?: FlavorT;
}

/** Create a "flavored" version of a type. TypeScript will disallow mixing flavors, but will allow unflavored values of that type to be passed in where a flavored version is expected. */
export type Flavor<T, FlavorT> = T & Flavoring<FlavorT>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}
