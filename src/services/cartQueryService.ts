import {
  type CommonOrderField,
  type OrderInput,
  type ShoppingCartOrderField,
  toShoppingCartSort,
} from "../models/ordering";
import {
  compareCartItems,
  type ShoppingCart,
  type ShoppingCartItem,
} from "../models/ShoppingCart";
import type { User } from "../models/User";
import type { CartItemLocation, UserRepository } from "../repositories/types";
import { NotFoundError } from "../utils/errors";
import {
  type Connection,
  type PageArgs,
  paginateInMemory,
  toConnection,
} from "../utils/pagination";
import { authorizeUser } from "./authorization";

export type CartListArgs = PageArgs & {
  orderBy?: OrderInput<ShoppingCartOrderField>;
};

export type CartItemListArgs = PageArgs & {
  orderBy?: OrderInput<CommonOrderField>;
};

/** Key of an entity this service can resolve for the gateway. */
export type EntityRepresentation =
  | { __typename: "User"; id: string }
  | { __typename: "ShoppingCartItem"; id: string };

export type ResolvedEntity =
  | ({ __typename: "User" } & User)
  | ({ __typename: "ShoppingCartItem" } & ShoppingCartItem);

const cartNotFound = (id: string) =>
  new NotFoundError(`ShoppingCart with UUID: \`${id}\` not found.`);

const cartItemNotFound = (id: string) =>
  new NotFoundError(`ShoppingCartItem of UUID: \`${id}\` not found.`);

/** Pages the embedded items of a loaded cart. Items are ordered by id. */
export const paginateCartItems = (
  cart: ShoppingCart,
  args: CartItemListArgs = {}
): Connection<ShoppingCartItem> =>
  paginateInMemory(cart.items, compareCartItems, args);

export class CartQueryService {
  constructor(private readonly users: UserRepository) {}

  async getCartByOwner(
    callerId: string | undefined,
    ownerId: string
  ): Promise<ShoppingCart> {
    authorizeUser(callerId, ownerId);
    return this.findCart(ownerId);
  }

  async getCartItem(
    callerId: string | undefined,
    itemId: string
  ): Promise<ShoppingCartItem> {
    const location = await this.locateCartItem(itemId);
    authorizeUser(callerId, location.userId);
    return location.item;
  }

  async getCartItemByVariantAndOwner(
    callerId: string | undefined,
    productVariantId: string,
    ownerId: string
  ): Promise<ShoppingCartItem> {
    authorizeUser(callerId, ownerId);
    const item = await this.users.findCartItemByVariant(
      ownerId,
      productVariantId
    );
    if (!item) {
      throw new NotFoundError(
        `ShoppingCartItem referencing product variant of UUID: \`${productVariantId}\` in shopping cart of user with UUID: \`${ownerId}\` not found.`
      );
    }
    return item;
  }

  /**
   * Resolves an entity reference for cross-service composition.
   * Inter-service calls are trusted: there is no caller check here.
   */
  async resolveEntityByKey(
    representation: EntityRepresentation
  ): Promise<ResolvedEntity> {
    switch (representation.__typename) {
      case "User": {
        const user = await this.users.findById(representation.id);
        if (!user) {
          throw new NotFoundError(
            `User with UUID: \`${representation.id}\` not found.`
          );
        }
        return { __typename: "User", ...user };
      }
      case "ShoppingCartItem": {
        const { item } = await this.locateCartItem(representation.id);
        return { __typename: "ShoppingCartItem", ...item };
      }
    }
  }

  listCarts(args: CartListArgs = {}): Promise<Connection<ShoppingCart>> {
    return this.queryCarts(args);
  }

  listCartsForOwner(
    callerId: string | undefined,
    ownerId: string,
    args: CartListArgs = {}
  ): Promise<Connection<ShoppingCart>> {
    authorizeUser(callerId, ownerId);
    return this.queryCarts(args, ownerId);
  }

  async findCart(ownerId: string): Promise<ShoppingCart> {
    const user = await this.users.findById(ownerId);
    if (!user) {
      throw cartNotFound(ownerId);
    }
    return user.shoppingCart;
  }

  async locateCartItem(itemId: string): Promise<CartItemLocation> {
    const location = await this.users.findCartItem(itemId);
    if (!location) {
      throw cartItemNotFound(itemId);
    }
    return location;
  }

  private async queryCarts(
    args: CartListArgs,
    ownerId?: string
  ): Promise<Connection<ShoppingCart>> {
    const skip = args.skip ?? 0;
    const { users, totalCount } = await this.users.listCarts({
      ownerId,
      sort: toShoppingCartSort(args.orderBy),
      skip,
      limit: args.first,
    });
    return toConnection(
      users.map((user) => user.shoppingCart),
      totalCount,
      skip
    );
  }
}
