import type { ShoppingCartItem } from "../models/ShoppingCart";

export const OWNER_ID = "6f1c2a3b-4d5e-4f60-8a7b-1c2d3e4f5a6b";
export const OTHER_USER_ID = "9a8b7c6d-5e4f-4a3b-9c2d-1e0f9a8b7c6d";
export const VARIANT_A = "0b1c2d3e-4f5a-4b6c-8d7e-8f9a0b1c2d3e";
export const VARIANT_B = "1c2d3e4f-5a6b-4c7d-9e8f-9a0b1c2d3e4f";
export const VARIANT_C = "2d3e4f5a-6b7c-4d8e-af9a-0b1c2d3e4f5a";
export const UNKNOWN_VARIANT = "3e4f5a6b-7c8d-4e9f-b0a1-1c2d3e4f5a6b";

export const FIXED_NOW = new Date("2024-05-01T12:00:00.000Z");

/** Deterministic ids: 00000000-0000-4000-8000-000000000001, ...002, ... */
export const sequentialIds = (): (() => string) => {
  let next = 0;
  return () => {
    next += 1;
    return `00000000-0000-4000-8000-${String(next).padStart(12, "0")}`;
  };
};

export const cartItem = (
  id: string,
  productVariantId: string,
  count = 1,
  addedAt = new Date(0)
): ShoppingCartItem => ({
  id,
  count,
  addedAt,
  productVariant: { id: productVariantId },
});
