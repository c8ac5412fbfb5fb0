export * from './fixtures.js';
export * from './mocks.js';
export * from './shapefile-files.js';

/**
 * Drain a cursor (or any async iterable) into an array
 */
export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}
