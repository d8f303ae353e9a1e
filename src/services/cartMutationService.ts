import { v4 as uuidv4 } from "uuid";
import {
  mintCartItem,
  type ShoppingCart,
  type ShoppingCartItem,
  type ShoppingCartItemInput,
} from "../models/ShoppingCart";
import type {
  ProductVariantRepository,
  UserRepository,
} from "../repositories/types";
import { ValidationFailedError } from "../utils/errors";
import { getLogger } from "../utils/logger";
import { authorizeUser } from "./authorization";
import type { CartQueryService } from "./cartQueryService";

const log = getLogger("cart-mutations");

export interface CartMutationDependencies {
  users: UserRepository;
  productVariants: ProductVariantRepository;
  queries: CartQueryService;
  now?: () => Date;
  newId?: () => string;
}

const variantNotPresent = (id: string) =>
  new ValidationFailedError(
    `Product variant with the UUID: \`${id}\` is not present in the system.`
  );

// Identical inputs collapse into one item
const distinctInputs = (
  inputs: ShoppingCartItemInput[]
): ShoppingCartItemInput[] => {
  const seen = new Map<string, ShoppingCartItemInput>();
  for (const input of inputs) {
    seen.set(`${input.productVariantId}:${input.count}`, input);
  }
  return [...seen.values()];
};

export class CartMutationService {
  private readonly users: UserRepository;
  private readonly productVariants: ProductVariantRepository;
  private readonly queries: CartQueryService;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(deps: CartMutationDependencies) {
    this.users = deps.users;
    this.productVariants = deps.productVariants;
    this.queries = deps.queries;
    this.now = deps.now ?? (() => new Date());
    this.newId = deps.newId ?? uuidv4;
  }

  /**
   * Replaces every item of the owner's cart with freshly minted items.
   * Nothing is written unless every referenced product variant exists.
   * Without `inputs` the cart is returned unchanged.
   */
  async replaceCartItems(
    callerId: string | undefined,
    ownerId: string,
    inputs?: ShoppingCartItemInput[]
  ): Promise<ShoppingCart> {
    authorizeUser(callerId, ownerId);
    if (inputs !== undefined) {
      const items = distinctInputs(inputs);
      await this.validateProductVariants(
        items.map((input) => input.productVariantId)
      );
      await this.validateUser(ownerId);
      const now = this.now();
      const minted = items.map((input) =>
        mintCartItem(this.newId(), input, now)
      );
      await this.users.replaceCartItems(ownerId, minted, now);
      log.info("Replaced shopping cart items", {
        ownerId,
        count: minted.length,
      });
    }
    return this.queries.findCart(ownerId);
  }

  /**
   * Adds an item to the owner's cart. When the cart already holds an item
   * for the product variant, that item is returned as is; counts are not
   * merged.
   */
  async addCartItem(
    callerId: string | undefined,
    ownerId: string,
    input: ShoppingCartItemInput
  ): Promise<ShoppingCartItem> {
    authorizeUser(callerId, ownerId);
    // Check-then-insert is not atomic: two concurrent calls can both insert
    const existing = await this.users.findCartItemByVariant(
      ownerId,
      input.productVariantId
    );
    if (existing) {
      return existing;
    }
    await this.validateUser(ownerId);
    if (!(await this.productVariants.exists(input.productVariantId))) {
      throw variantNotPresent(input.productVariantId);
    }
    const item = mintCartItem(this.newId(), input, this.now());
    await this.users.pushCartItem(ownerId, item, item.addedAt);
    log.info("Added shopping cart item", { ownerId, itemId: item.id });
    return item;
  }

  async updateItemCount(
    callerId: string | undefined,
    itemId: string,
    count: number
  ): Promise<ShoppingCartItem> {
    const { userId } = await this.queries.locateCartItem(itemId);
    authorizeUser(callerId, userId);
    await this.users.setCartItemCount(itemId, count, this.now());
    const { item } = await this.queries.locateCartItem(itemId);
    return item;
  }

  /** Removes the item. Succeeds as long as the write is acknowledged. */
  async deleteItem(
    callerId: string | undefined,
    itemId: string
  ): Promise<boolean> {
    const { userId } = await this.queries.locateCartItem(itemId);
    authorizeUser(callerId, userId);
    await this.users.pullCartItem(itemId, this.now());
    log.info("Deleted shopping cart item", { ownerId: userId, itemId });
    return true;
  }

  private async validateProductVariants(ids: string[]): Promise<void> {
    if (ids.length === 0) {
      return;
    }
    const [firstMissing] = await this.productVariants.findMissingIds([
      ...new Set(ids),
    ]);
    if (firstMissing !== undefined) {
      throw variantNotPresent(firstMissing);
    }
  }

  private async validateUser(id: string): Promise<void> {
    if (!(await this.users.findById(id))) {
      throw new ValidationFailedError(
        `User with the UUID: \`${id}\` is not present in the system.`
      );
    }
  }
}
