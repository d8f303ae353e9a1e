import { Schema } from "mongoose";

// Cart items are embedded in the owning user document (collection "users").
// Product variants are referenced by id only: the catalog service owns them.

export interface ProductVariantRef {
  id: string;
}

export interface ShoppingCartItem {
  id: string;
  count: number;
  addedAt: Date;
  productVariant: ProductVariantRef;
}

export interface ShoppingCart {
  /** Id of the owning user. */
  userId: string;
  lastUpdatedAt: Date;
  items: ShoppingCartItem[];
}

/** Input of a cart item before it is minted into a ShoppingCartItem. */
export interface ShoppingCartItemInput {
  count: number;
  productVariantId: string;
}

export interface ShoppingCartItemDocument {
  _id: string;
  count: number;
  addedAt: Date;
  productVariant: { _id: string };
}

export interface ShoppingCartDocument {
  lastUpdatedAt: Date;
  items: ShoppingCartItemDocument[];
}

const ProductVariantRefSchema = new Schema<{ _id: string }>(
  {
    _id: { type: String, required: true },
  },
  { versionKey: false }
);

export const ShoppingCartItemSchema = new Schema<ShoppingCartItemDocument>(
  {
    _id: { type: String, required: true },
    count: { type: Number, required: true, min: 0 },
    addedAt: { type: Date, required: true },
    productVariant: { type: ProductVariantRefSchema, required: true },
  },
  { versionKey: false }
);

export const ShoppingCartSchema = new Schema<ShoppingCartDocument>(
  {
    lastUpdatedAt: { type: Date, required: true, default: Date.now },
    items: { type: [ShoppingCartItemSchema], default: [] },
  },
  { _id: false, versionKey: false }
);

export const createEmptyCart = (now: Date = new Date()): ShoppingCartDocument => ({
  lastUpdatedAt: now,
  items: [],
});

/**
 * Mints a new cart item. All items minted by one write share `now`.
 */
export const mintCartItem = (
  id: string,
  input: ShoppingCartItemInput,
  now: Date
): ShoppingCartItem => ({
  id,
  count: input.count,
  addedAt: now,
  productVariant: { id: input.productVariantId },
});

/**
 * Natural order of cart items: by id only. Used as a tie-break, never as a
 * semantic order.
 */
export const compareCartItems = (
  a: ShoppingCartItem,
  b: ShoppingCartItem
): number => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);

export const toCartItem = (doc: ShoppingCartItemDocument): ShoppingCartItem => ({
  id: doc._id,
  count: doc.count,
  addedAt: doc.addedAt,
  productVariant: { id: doc.productVariant._id },
});

export const toCartItemDocument = (
  item: ShoppingCartItem
): ShoppingCartItemDocument => ({
  _id: item.id,
  count: item.count,
  addedAt: item.addedAt,
  productVariant: { _id: item.productVariant.id },
});

export const toShoppingCart = (
  userId: string,
  doc: ShoppingCartDocument
): ShoppingCart => ({
  userId,
  lastUpdatedAt: doc.lastUpdatedAt,
  items: doc.items.map(toCartItem),
});
