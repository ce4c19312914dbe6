export interface Dictionary<T> {
  [key: string]: T;
}

export const isDictionary = (value: unknown): value is Dictionary<unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
};

export const sortedEntries = <T>(dict: Dictionary<T>): [string, T][] => {
  return Object.keys(dict).sort().map((key): [string, T] => [key, dict[key]]);
};
