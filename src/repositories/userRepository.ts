import type { FilterQuery, Model, UpdateQuery } from "mongoose";
import {
  toCartItem,
  type ShoppingCartItem,
  type ShoppingCartItemDocument,
} from "../models/ShoppingCart";
import {
  newUserDocument,
  toUser,
  UserModel,
  type UserDocument,
} from "../models/User";
import { StorageOperationFailedError } from "../utils/errors";
import { describeError, getLogger } from "../utils/logger";
import { createCollectionAdapter } from "./mongooseCollection";
import type { CartListQuery, UserRepository } from "./types";
import {
  cartItemByIdFilter,
  cartItemByVariantFilter,
  cartListFilter,
  containsAnyCartItemFilter,
  containsCartItemFilter,
  matchedCartItemProjection,
  pullCartItemsUpdate,
  pullCartItemUpdate,
  pushCartItemUpdate,
  replaceCartItemsUpdate,
  setCartItemCountUpdate,
} from "./userQueries";

const log = getLogger("store");

/** Shape of a user document read with `matchedCartItemProjection`. */
interface ProjectedUser {
  _id?: string;
  shoppingCart?: { items?: ShoppingCartItemDocument[] };
}

const firstProjectedItem = (
  projected: ProjectedUser | null
): ShoppingCartItemDocument | undefined => projected?.shoppingCart?.items?.[0];

export const createMongoUserRepository = (
  model: Model<UserDocument> = UserModel
): UserRepository => {
  const users = createCollectionAdapter(model, "user");

  const findProjected = async (
    filter: FilterQuery<UserDocument>,
    context: Record<string, string>
  ): Promise<ProjectedUser | null> => {
    try {
      const projected: ProjectedUser | null = await model
        .findOne(filter, matchedCartItemProjection)
        .lean<ProjectedUser>()
        .exec();
      return projected;
    } catch (error) {
      log.error("Reading shopping cart item failed", { ...context, error: describeError(error) });
      return null;
    }
  };

  const update = async (
    filter: FilterQuery<UserDocument>,
    changes: UpdateQuery<UserDocument>,
    failureMessage: string
  ): Promise<void> => {
    let acknowledged = false;
    try {
      const result = await model.updateOne(filter, changes).exec();
      acknowledged = result.acknowledged;
    } catch (error) {
      log.error(failureMessage, { error: describeError(error) });
    }
    if (!acknowledged) {
      throw new StorageOperationFailedError(failureMessage);
    }
  };

  return {
    async findById(id) {
      const doc = await users.findById(id);
      return doc ? toUser(doc) : null;
    },

    insert(id, now) {
      return users.insert(newUserDocument(id, now));
    },

    async findCartItem(itemId) {
      const projected = await findProjected(cartItemByIdFilter(itemId), {
        itemId,
      });
      const item = firstProjectedItem(projected);
      if (!projected?._id || !item) {
        return null;
      }
      return { userId: projected._id, item: toCartItem(item) };
    },

    async findCartItemByVariant(userId, productVariantId) {
      const projected = await findProjected(
        cartItemByVariantFilter(userId, productVariantId),
        { userId, productVariantId }
      );
      const item = firstProjectedItem(projected);
      return item ? toCartItem(item) : null;
    },

    replaceCartItems(userId, items, now) {
      return update(
        { _id: userId },
        replaceCartItemsUpdate(items, now),
        `Updating shopping cart items of user of id: \`${userId}\` failed in MongoDB.`
      );
    },

    pushCartItem(userId, item: ShoppingCartItem, now) {
      return update(
        { _id: userId },
        pushCartItemUpdate(item, now),
        `Add shopping cart item of id: \`${item.id}\` failed in MongoDB.`
      );
    },

    setCartItemCount(itemId, count, now) {
      return update(
        containsCartItemFilter(itemId),
        setCartItemCountUpdate(count, now),
        `Updating count of shopping cart item of id: \`${itemId}\` failed in MongoDB.`
      );
    },

    pullCartItem(itemId, now) {
      return update(
        containsCartItemFilter(itemId),
        pullCartItemUpdate(itemId, now),
        `Deleting shopping cart item of id: \`${itemId}\` failed in MongoDB.`
      );
    },

    async pullCartItems(userId, itemIds, now) {
      if (itemIds.length === 0) {
        return;
      }
      await update(
        containsAnyCartItemFilter(userId, itemIds),
        pullCartItemsUpdate(itemIds, now),
        `Removing ordered shopping cart items of user of id: \`${userId}\` failed in MongoDB.`
      );
    },

    async listCarts(query: CartListQuery) {
      const filter = cartListFilter(query.ownerId);
      try {
        const totalCount = await model.countDocuments(filter).exec();
        // limit(0) means "no limit" to MongoDB
        if (query.limit === 0) {
          return { users: [], totalCount };
        }
        let pageQuery = model.find(filter).sort(query.sort).skip(query.skip);
        if (query.limit !== undefined) {
          pageQuery = pageQuery.limit(query.limit);
        }
        const docs: UserDocument[] = await pageQuery.lean<UserDocument[]>().exec();
        return { users: docs.map(toUser), totalCount };
      } catch (error) {
        log.error("Listing shopping carts failed", { query, error: describeError(error) });
        throw new StorageOperationFailedError(
          "Listing shopping carts failed in MongoDB."
        );
      }
    },
  };
};
