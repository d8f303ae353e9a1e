import {
  type CommonOrderField,
  type OrderInput,
  toSortDirection,
} from "../models/ordering";

export interface PageArgs {
  /** Max number of nodes; unbounded when omitted. */
  first?: number;
  /** Nodes skipped at the start of the ordered set. */
  skip?: number;
}

/** A page of nodes. `totalCount` counts the whole filtered set, not the page. */
export interface Connection<T> {
  nodes: T[];
  hasNextPage: boolean;
  totalCount: number;
}

export const toConnection = <T>(
  nodes: T[],
  totalCount: number,
  skip = 0
): Connection<T> => ({
  nodes,
  hasNextPage: totalCount > skip + nodes.length,
  totalCount,
});

/**
 * Pages an already loaded set, e.g. the embedded items of a fetched cart.
 * Sorts a copy by `compare`, reversed for descending order.
 */
export const paginateInMemory = <T>(
  items: readonly T[],
  compare: (a: T, b: T) => number,
  args: PageArgs & { orderBy?: OrderInput<CommonOrderField> } = {}
): Connection<T> => {
  const direction = toSortDirection(args.orderBy?.direction);
  const sorted = [...items].sort((a, b) => direction * compare(a, b));
  const skip = args.skip ?? 0;
  const end = args.first === undefined ? undefined : skip + args.first;
  return toConnection(sorted.slice(skip, end), sorted.length, skip);
};
