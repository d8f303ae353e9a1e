import { Response, NextFunction } from "express";
import type { AuthRequest } from "../middlewares/auth";
import type { ShoppingCart } from "../models/ShoppingCart";
import {
  type CartItemListArgs,
  type CartListArgs,
  type CartQueryService,
  paginateCartItems,
} from "../services/cartQueryService";
import type { CartMutationService } from "../services/cartMutationService";
import type { Connection } from "../utils/pagination";
import {
  cartItemInputSchema,
  cartItemListQuerySchema,
  cartListQuerySchema,
  itemParamsSchema,
  ownerParamsSchema,
  ownerVariantParamsSchema,
  replaceCartItemsSchema,
  updateCartItemSchema,
} from "../validation/cart";

export interface CartControllerServices {
  queries: CartQueryService;
  mutations: CartMutationService;
}

const toCartListArgs = (query: unknown): CartListArgs => {
  const { first, skip, orderField, orderDirection } =
    cartListQuerySchema.parse(query);
  return { first, skip, orderBy: { field: orderField, direction: orderDirection } };
};

const toCartItemListArgs = (query: unknown): CartItemListArgs => {
  const { first, skip, orderField, orderDirection } =
    cartItemListQuerySchema.parse(query);
  return { first, skip, orderBy: { field: orderField, direction: orderDirection } };
};

// The cart is rendered with its items as a connection
const presentCart = (cart: ShoppingCart, itemArgs: CartItemListArgs = {}) => ({
  userId: cart.userId,
  lastUpdatedAt: cart.lastUpdatedAt,
  shoppingCartItems: paginateCartItems(cart, itemArgs),
});

const presentCarts = (connection: Connection<ShoppingCart>) => ({
  ...connection,
  nodes: connection.nodes.map((cart) => presentCart(cart)),
});

export const createCartController = ({
  queries,
  mutations,
}: CartControllerServices) => ({
  listCarts: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const carts = await queries.listCarts(toCartListArgs(req.query));
      res.json({ success: true, carts: presentCarts(carts) });
    } catch (error) {
      next(error);
    }
  },

  listCartsForOwner: async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ) => {
    try {
      const { ownerId } = ownerParamsSchema.parse(req.params);
      const carts = await queries.listCartsForOwner(
        req.callerId,
        ownerId,
        toCartListArgs(req.query)
      );
      res.json({ success: true, carts: presentCarts(carts) });
    } catch (error) {
      next(error);
    }
  },

  getCart: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { ownerId } = ownerParamsSchema.parse(req.params);
      const itemArgs = toCartItemListArgs(req.query);
      const cart = await queries.getCartByOwner(req.callerId, ownerId);
      res.json({ success: true, cart: presentCart(cart, itemArgs) });
    } catch (error) {
      next(error);
    }
  },

  replaceCartItems: async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ) => {
    try {
      const { ownerId } = ownerParamsSchema.parse(req.params);
      const { shoppingCartItems } = replaceCartItemsSchema.parse(req.body);
      const cart = await mutations.replaceCartItems(
        req.callerId,
        ownerId,
        shoppingCartItems
      );
      res.json({ success: true, cart: presentCart(cart) });
    } catch (error) {
      next(error);
    }
  },

  addCartItem: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { ownerId } = ownerParamsSchema.parse(req.params);
      const input = cartItemInputSchema.parse(req.body);
      const item = await mutations.addCartItem(req.callerId, ownerId, input);
      res.json({ success: true, item });
    } catch (error) {
      next(error);
    }
  },

  getCartItemByVariant: async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ) => {
    try {
      const { ownerId, productVariantId } = ownerVariantParamsSchema.parse(
        req.params
      );
      const item = await queries.getCartItemByVariantAndOwner(
        req.callerId,
        productVariantId,
        ownerId
      );
      res.json({ success: true, item });
    } catch (error) {
      next(error);
    }
  },

  getCartItem: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { itemId } = itemParamsSchema.parse(req.params);
      const item = await queries.getCartItem(req.callerId, itemId);
      res.json({ success: true, item });
    } catch (error) {
      next(error);
    }
  },

  updateCartItem: async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ) => {
    try {
      const { itemId } = itemParamsSchema.parse(req.params);
      const { count } = updateCartItemSchema.parse(req.body);
      const item = await mutations.updateItemCount(req.callerId, itemId, count);
      res.json({ success: true, item });
    } catch (error) {
      next(error);
    }
  },

  deleteCartItem: async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ) => {
    try {
      const { itemId } = itemParamsSchema.parse(req.params);
      const deleted = await mutations.deleteItem(req.callerId, itemId);
      res.json({ success: true, deleted });
    } catch (error) {
      next(error);
    }
  },
});
