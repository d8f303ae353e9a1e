import { z } from "zod";
import {
  CommonOrderField,
  OrderDirection,
  ShoppingCartOrderField,
} from "../models/ordering";

// Ids are normalised to lowercase so lookups match stored ids
export const uuidSchema = z
  .string()
  .uuid("Expected a UUID")
  .transform((id) => id.toLowerCase());

const countSchema = z.number().int().nonnegative();

export const cartItemInputSchema = z.object({
  count: countSchema,
  productVariantId: uuidSchema,
});

export const replaceCartItemsSchema = z.object({
  shoppingCartItems: z.array(cartItemInputSchema).optional(),
});

export const updateCartItemSchema = z.object({
  count: countSchema,
});

export const ownerParamsSchema = z.object({
  ownerId: uuidSchema,
});

export const ownerVariantParamsSchema = z.object({
  ownerId: uuidSchema,
  productVariantId: uuidSchema,
});

export const itemParamsSchema = z.object({
  itemId: uuidSchema,
});

const pageSchema = {
  first: z.coerce.number().int().nonnegative().optional(),
  skip: z.coerce.number().int().nonnegative().optional(),
  orderDirection: z.nativeEnum(OrderDirection).optional(),
};

export const cartListQuerySchema = z.object({
  ...pageSchema,
  orderField: z.nativeEnum(ShoppingCartOrderField).optional(),
});

export const cartItemListQuerySchema = z.object({
  ...pageSchema,
  orderField: z.nativeEnum(CommonOrderField).optional(),
});

export const entitiesRequestSchema = z.object({
  representations: z.array(
    z.discriminatedUnion("__typename", [
      z.object({ __typename: z.literal("User"), id: uuidSchema }),
      z.object({ __typename: z.literal("ShoppingCartItem"), id: uuidSchema }),
    ])
  ),
});
