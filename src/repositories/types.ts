import type { SortDirection } from "../models/ordering";
import type { ShoppingCartItem } from "../models/ShoppingCart";
import type { User } from "../models/User";

/** Result of an insert. A duplicate id is reported, not thrown. */
export type InsertOutcome = "inserted" | "duplicate";

export interface CartItemLocation {
  /** Owner of the cart holding the item. */
  userId: string;
  item: ShoppingCartItem;
}

export interface CartListQuery {
  /** Restricts the listing to the cart of one owner. */
  ownerId?: string;
  sort: Record<string, SortDirection>;
  skip: number;
  /** Unbounded when omitted. */
  limit?: number;
}

export interface CartListResult {
  users: User[];
  totalCount: number;
}

/**
 * Access to the users collection, whose documents embed the shopping cart.
 *
 * Reads that fail in the store resolve as absent. Writes that fail reject
 * with a StorageOperationFailedError.
 */
export interface UserRepository {
  findById(id: string): Promise<User | null>;
  insert(id: string, now: Date): Promise<InsertOutcome>;
  /** Locates the cart item of the given id and the user owning it. */
  findCartItem(itemId: string): Promise<CartItemLocation | null>;
  findCartItemByVariant(
    userId: string,
    productVariantId: string
  ): Promise<ShoppingCartItem | null>;
  replaceCartItems(
    userId: string,
    items: ShoppingCartItem[],
    now: Date
  ): Promise<void>;
  pushCartItem(userId: string, item: ShoppingCartItem, now: Date): Promise<void>;
  setCartItemCount(itemId: string, count: number, now: Date): Promise<void>;
  pullCartItem(itemId: string, now: Date): Promise<void>;
  /** Removes every listed item from the user's cart; unknown ids are ignored. */
  pullCartItems(userId: string, itemIds: string[], now: Date): Promise<void>;
  listCarts(query: CartListQuery): Promise<CartListResult>;
}

export interface ProductVariantRepository {
  exists(id: string): Promise<boolean>;
  insert(id: string): Promise<InsertOutcome>;
  /** Ids of `ids` with no stored product variant, in input order. */
  findMissingIds(ids: string[]): Promise<string[]>;
}
