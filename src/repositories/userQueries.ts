import type { FilterQuery, ProjectionType, UpdateQuery } from "mongoose";
import {
  toCartItemDocument,
  type ShoppingCartItem,
} from "../models/ShoppingCart";
import type { UserDocument } from "../models/User";

// Filter, projection and update documents issued against "users".
// Every cart write is a filtered partial update on one user document.

const ITEMS = "shoppingCart.items";
const LAST_UPDATED_AT = "shoppingCart.lastUpdatedAt";

export const cartItemByIdFilter = (itemId: string): FilterQuery<UserDocument> => ({
  [ITEMS]: { $elemMatch: { _id: itemId } },
});

export const cartItemByVariantFilter = (
  userId: string,
  productVariantId: string
): FilterQuery<UserDocument> => ({
  _id: userId,
  [ITEMS]: { $elemMatch: { "productVariant._id": productVariantId } },
});

/** Returns only the array element matched by the filter, plus the owner id. */
export const matchedCartItemProjection: ProjectionType<UserDocument> = {
  [`${ITEMS}.$`]: 1,
  [LAST_UPDATED_AT]: 1,
  _id: 1,
};

export const cartListFilter = (ownerId?: string): FilterQuery<UserDocument> =>
  ownerId === undefined ? {} : { _id: ownerId };

export const replaceCartItemsUpdate = (
  items: ShoppingCartItem[],
  now: Date
): UpdateQuery<UserDocument> => ({
  $set: {
    [ITEMS]: items.map(toCartItemDocument),
    [LAST_UPDATED_AT]: now,
  },
});

export const pushCartItemUpdate = (
  item: ShoppingCartItem,
  now: Date
): UpdateQuery<UserDocument> => ({
  $push: { [ITEMS]: toCartItemDocument(item) },
  $set: { [LAST_UPDATED_AT]: now },
});

/** Filter for writes addressing one item through the positional operator. */
export const containsCartItemFilter = (
  itemId: string
): FilterQuery<UserDocument> => ({
  [`${ITEMS}._id`]: itemId,
});

export const setCartItemCountUpdate = (
  count: number,
  now: Date
): UpdateQuery<UserDocument> => ({
  $set: {
    [`${ITEMS}.$.count`]: count,
    [LAST_UPDATED_AT]: now,
  },
});

export const pullCartItemUpdate = (
  itemId: string,
  now: Date
): UpdateQuery<UserDocument> => ({
  $pull: { [ITEMS]: { _id: itemId } },
  $set: { [LAST_UPDATED_AT]: now },
});

/**
 * Only matches when at least one listed item is still present, so a
 * redelivered order leaves lastUpdatedAt untouched.
 */
export const containsAnyCartItemFilter = (
  userId: string,
  itemIds: string[]
): FilterQuery<UserDocument> => ({
  _id: userId,
  [`${ITEMS}._id`]: { $in: itemIds },
});

export const pullCartItemsUpdate = (
  itemIds: string[],
  now: Date
): UpdateQuery<UserDocument> => ({
  $pull: { [ITEMS]: { _id: { $in: itemIds } } },
  $set: { [LAST_UPDATED_AT]: now },
});
