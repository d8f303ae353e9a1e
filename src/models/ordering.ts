// Order inputs accepted by list operations and their storage-level mapping.

export const OrderDirection = {
  Ascending: "ASC",
  Descending: "DESC",
} as const;
export type OrderDirection = (typeof OrderDirection)[keyof typeof OrderDirection];

export const ShoppingCartOrderField = {
  Id: "ID",
  UserId: "USER_ID",
  Name: "NAME",
  CreatedAt: "CREATED_AT",
  LastUpdatedAt: "LAST_UPDATED_AT",
} as const;
export type ShoppingCartOrderField =
  (typeof ShoppingCartOrderField)[keyof typeof ShoppingCartOrderField];

export const CommonOrderField = {
  Id: "ID",
} as const;
export type CommonOrderField =
  (typeof CommonOrderField)[keyof typeof CommonOrderField];

export interface OrderInput<Field extends string> {
  field?: Field;
  direction?: OrderDirection;
}

export type SortDirection = 1 | -1;

export const toSortDirection = (
  direction: OrderDirection = OrderDirection.Ascending
): SortDirection => (direction === OrderDirection.Descending ? -1 : 1);

// In the embedded model the owner id is the user document id, so Id and
// UserId resolve to the same path. "name" is not stored by this projection:
// ordering by it falls through to the _id tie-break.
const shoppingCartFieldPaths: Record<ShoppingCartOrderField, string> = {
  [ShoppingCartOrderField.Id]: "_id",
  [ShoppingCartOrderField.UserId]: "_id",
  [ShoppingCartOrderField.Name]: "name",
  [ShoppingCartOrderField.CreatedAt]: "createdAt",
  [ShoppingCartOrderField.LastUpdatedAt]: "shoppingCart.lastUpdatedAt",
};

export const shoppingCartFieldPath = (
  field: ShoppingCartOrderField = ShoppingCartOrderField.Id
): string => shoppingCartFieldPaths[field];

/**
 * Storage sort document for a cart order input. Any field other than `_id` gets
 * `_id` appended so equal keys still come back in a fixed order.
 */
export const toShoppingCartSort = (
  orderBy: OrderInput<ShoppingCartOrderField> = {}
): Record<string, SortDirection> => {
  const path = shoppingCartFieldPath(orderBy.field);
  const direction = toSortDirection(orderBy.direction);
  return path === "_id" ? { _id: direction } : { [path]: direction, _id: direction };
};
