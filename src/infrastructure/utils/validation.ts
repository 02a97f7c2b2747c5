import type { z } from 'zod';

/**
 * Render an issue path the way it reads in JSON: `documents[1].id`
 */
export function issuePath(path: ReadonlyArray<string | number>): string {
  return path.reduce<string>((joined, key) => {
    if (typeof key === 'number') return `${joined}[${key}]`;
    return joined ? `${joined}.${key}` : key;
  }, '');
}

/**
 * The first issue of a failed parse, prefixed by its path
 */
export function describeIssues(error: z.ZodError): string {
  const [first] = error.errors;
  if (!first) return 'Invalid value';
  const path = issuePath(first.path);
  return path ? `${path} ${first.message}` : first.message;
}

/**
 * Parse items one by one, dropping those that don't match the schema
 */
export function parseEach<S extends z.ZodTypeAny>(schema: S, items: readonly unknown[]): Array<z.output<S>> {
  return items.flatMap((item) => {
    const result = schema.safeParse(item);
    return result.success ? [result.data] : [];
  });
}
