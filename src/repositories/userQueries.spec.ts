import { describe, expect, it } from "vitest";
import { cartItem, FIXED_NOW, OWNER_ID, VARIANT_A } from "../testing/fixtures";
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

const ITEM_ID = "5a6b7c8d-9e0f-4a1b-8c2d-3e4f5a6b7c8d";

describe("user queries", () => {
  it("matches a cart item by id with $elemMatch", () => {
    expect(cartItemByIdFilter(ITEM_ID)).toEqual({
      "shoppingCart.items": { $elemMatch: { _id: ITEM_ID } },
    });
  });

  it("matches a cart item by owner and product variant", () => {
    expect(cartItemByVariantFilter(OWNER_ID, VARIANT_A)).toEqual({
      _id: OWNER_ID,
      "shoppingCart.items": {
        $elemMatch: { "productVariant._id": VARIANT_A },
      },
    });
  });

  it("projects only the matched item", () => {
    expect(matchedCartItemProjection).toEqual({
      "shoppingCart.items.$": 1,
      "shoppingCart.lastUpdatedAt": 1,
      _id: 1,
    });
  });

  it("folds the owner into the list filter", () => {
    expect(cartListFilter()).toEqual({});
    expect(cartListFilter(OWNER_ID)).toEqual({ _id: OWNER_ID });
  });

  it("replaces the whole item array and bumps lastUpdatedAt", () => {
    const item = cartItem(ITEM_ID, VARIANT_A, 3, FIXED_NOW);
    expect(replaceCartItemsUpdate([item], FIXED_NOW)).toEqual({
      $set: {
        "shoppingCart.items": [
          {
            _id: ITEM_ID,
            count: 3,
            addedAt: FIXED_NOW,
            productVariant: { _id: VARIANT_A },
          },
        ],
        "shoppingCart.lastUpdatedAt": FIXED_NOW,
      },
    });
  });

  it("appends one item", () => {
    const item = cartItem(ITEM_ID, VARIANT_A, 1, FIXED_NOW);
    expect(pushCartItemUpdate(item, FIXED_NOW)).toEqual({
      $push: {
        "shoppingCart.items": {
          _id: ITEM_ID,
          count: 1,
          addedAt: FIXED_NOW,
          productVariant: { _id: VARIANT_A },
        },
      },
      $set: { "shoppingCart.lastUpdatedAt": FIXED_NOW },
    });
  });

  it("sets the count of the matched item through the positional operator", () => {
    expect(containsCartItemFilter(ITEM_ID)).toEqual({
      "shoppingCart.items._id": ITEM_ID,
    });
    expect(setCartItemCountUpdate(0, FIXED_NOW)).toEqual({
      $set: {
        "shoppingCart.items.$.count": 0,
        "shoppingCart.lastUpdatedAt": FIXED_NOW,
      },
    });
  });

  it("pulls one item by id", () => {
    expect(pullCartItemUpdate(ITEM_ID, FIXED_NOW)).toEqual({
      $pull: { "shoppingCart.items": { _id: ITEM_ID } },
      $set: { "shoppingCart.lastUpdatedAt": FIXED_NOW },
    });
  });

  it("pulls every ordered item in one update", () => {
    const ids = [ITEM_ID, "6b7c8d9e-0f1a-4b2c-9d3e-4f5a6b7c8d9e"];
    expect(containsAnyCartItemFilter(OWNER_ID, ids)).toEqual({
      _id: OWNER_ID,
      "shoppingCart.items._id": { $in: ids },
    });
    expect(pullCartItemsUpdate(ids, FIXED_NOW)).toEqual({
      $pull: { "shoppingCart.items": { _id: { $in: ids } } },
      $set: { "shoppingCart.lastUpdatedAt": FIXED_NOW },
    });
  });
});
