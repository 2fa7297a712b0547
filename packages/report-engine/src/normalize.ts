export interface Identified {
  id: number;
}

function byId(left: Identified, right: Identified): number {
  return left.id - right.id;
}

/** Values of an ID-keyed map in ascending ID order. */
export function sortById<T extends Identified>(entries: ReadonlyMap<number, T>): T[] {
  return Array.from(entries.values()).sort(byId);
}

/** First occurrence of each ID across the given collections, ascending by ID. */
export function uniqueById<T extends Identified>(...collections: ReadonlyArray<readonly T[]>): T[] {
  const seen = new Map<number, T>();
  for (const collection of collections) {
    for (const item of collection) {
      if (!seen.has(item.id)) {
        seen.set(item.id, item);
      }
    }
  }
  return sortById(seen);
}
