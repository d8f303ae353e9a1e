import mongoose from "mongoose";
import { afterEach, describe, expect, it, vi } from "vitest";
import { UserModel } from "../models/User";
import { cartItem, FIXED_NOW, OWNER_ID, VARIANT_A } from "../testing/fixtures";
import { StorageOperationFailedError } from "../utils/errors";
import { matchedCartItemProjection } from "./userQueries";
import { createMongoUserRepository } from "./userRepository";

const ITEM_ID = "aa000000-0000-4000-8000-00000000000a";

// Queries are built for real; only their execution is stubbed
const stubExec = () => vi.spyOn(mongoose.Query.prototype, "exec");

describe("createMongoUserRepository", () => {
  const users = createMongoUserRepository();

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("insert", () => {
    it("reports a duplicate key as a duplicate", async () => {
      const create = vi.spyOn(UserModel, "create").mockRejectedValue(
        new mongoose.mongo.MongoServerError({
          message: "E11000 duplicate key error collection: users",
          code: 11000,
        })
      );

      await expect(users.insert(OWNER_ID, FIXED_NOW)).resolves.toBe("duplicate");
      expect(create).toHaveBeenCalledWith({
        _id: OWNER_ID,
        shoppingCart: { lastUpdatedAt: FIXED_NOW, items: [] },
      });
    });

    it("fails on any other write error", async () => {
      vi.spyOn(UserModel, "create").mockRejectedValue(new Error("not primary"));

      await expect(users.insert(OWNER_ID, FIXED_NOW)).rejects.toThrow(
        new StorageOperationFailedError(
          `Adding user of id: \`${OWNER_ID}\` failed in MongoDB.`
        )
      );
    });
  });

  describe("findCartItem", () => {
    it("reads the owner and the matched item from the projection", async () => {
      const findOne = vi.spyOn(UserModel, "findOne");
      stubExec().mockResolvedValue({
        _id: OWNER_ID,
        shoppingCart: {
          items: [
            {
              _id: ITEM_ID,
              count: 2,
              addedAt: FIXED_NOW,
              productVariant: { _id: VARIANT_A },
            },
          ],
        },
      });

      await expect(users.findCartItem(ITEM_ID)).resolves.toEqual({
        userId: OWNER_ID,
        item: cartItem(ITEM_ID, VARIANT_A, 2, FIXED_NOW),
      });
      expect(findOne).toHaveBeenCalledWith(
        { "shoppingCart.items": { $elemMatch: { _id: ITEM_ID } } },
        matchedCartItemProjection
      );
    });

    it("reports no match as absent", async () => {
      stubExec().mockResolvedValue(null);
      await expect(users.findCartItem(ITEM_ID)).resolves.toBeNull();
    });

    it("reports a read failure as absent", async () => {
      stubExec().mockRejectedValue(new Error("connection reset"));
      await expect(users.findCartItem(ITEM_ID)).resolves.toBeNull();
    });
  });

  describe("updates", () => {
    it("fails when the write is not acknowledged", async () => {
      stubExec().mockResolvedValue({
        acknowledged: false,
        matchedCount: 0,
        modifiedCount: 0,
      });

      await expect(users.pullCartItem(ITEM_ID, FIXED_NOW)).rejects.toThrow(
        new StorageOperationFailedError(
          `Deleting shopping cart item of id: \`${ITEM_ID}\` failed in MongoDB.`
        )
      );
    });

    it("fails when the write throws", async () => {
      stubExec().mockRejectedValue(new Error("connection reset"));

      await expect(
        users.setCartItemCount(ITEM_ID, 3, FIXED_NOW)
      ).rejects.toBeInstanceOf(StorageOperationFailedError);
    });

    it("succeeds when acknowledged even if nothing matched", async () => {
      const updateOne = vi.spyOn(UserModel, "updateOne");
      stubExec().mockResolvedValue({
        acknowledged: true,
        matchedCount: 0,
        modifiedCount: 0,
      });

      await expect(
        users.pullCartItems(OWNER_ID, [ITEM_ID], FIXED_NOW)
      ).resolves.toBeUndefined();
      expect(updateOne).toHaveBeenCalledWith(
        { _id: OWNER_ID, "shoppingCart.items._id": { $in: [ITEM_ID] } },
        {
          $pull: { "shoppingCart.items": { _id: { $in: [ITEM_ID] } } },
          $set: { "shoppingCart.lastUpdatedAt": FIXED_NOW },
        }
      );
    });

    it("skips the write for an order without items", async () => {
      const updateOne = vi.spyOn(UserModel, "updateOne");
      await users.pullCartItems(OWNER_ID, [], FIXED_NOW);
      expect(updateOne).not.toHaveBeenCalled();
    });
  });

  describe("listCarts", () => {
    const storedUser = {
      _id: OWNER_ID,
      shoppingCart: { lastUpdatedAt: FIXED_NOW, items: [] },
    };

    it("answers limit 0 with the count alone", async () => {
      const exec = stubExec().mockResolvedValueOnce(4);
      const find = vi.spyOn(UserModel, "find");

      await expect(
        users.listCarts({ sort: { _id: 1 }, skip: 0, limit: 0 })
      ).resolves.toEqual({ users: [], totalCount: 4 });
      expect(exec).toHaveBeenCalledTimes(1);
      expect(find).not.toHaveBeenCalled();
    });

    it("leaves the page unbounded without a limit", async () => {
      stubExec().mockResolvedValueOnce(1).mockResolvedValueOnce([storedUser]);
      const limit = vi.spyOn(mongoose.Query.prototype, "limit");

      const result = await users.listCarts({ sort: { _id: 1 }, skip: 0 });

      expect(limit).not.toHaveBeenCalled();
      expect(result).toEqual({
        users: [
          {
            id: OWNER_ID,
            shoppingCart: { userId: OWNER_ID, lastUpdatedAt: FIXED_NOW, items: [] },
          },
        ],
        totalCount: 1,
      });
    });

    it("limits the page and filters by owner", async () => {
      stubExec().mockResolvedValueOnce(1).mockResolvedValueOnce([storedUser]);
      const countDocuments = vi.spyOn(UserModel, "countDocuments");
      const limit = vi.spyOn(mongoose.Query.prototype, "limit");

      await users.listCarts({
        ownerId: OWNER_ID,
        sort: { _id: -1 },
        skip: 0,
        limit: 2,
      });

      expect(countDocuments).toHaveBeenCalledWith({ _id: OWNER_ID });
      expect(limit).toHaveBeenCalledWith(2);
    });

    it("fails when the store cannot be read", async () => {
      stubExec().mockRejectedValue(new Error("connection reset"));

      await expect(
        users.listCarts({ sort: { _id: 1 }, skip: 0 })
      ).rejects.toThrow(
        new StorageOperationFailedError("Listing shopping carts failed in MongoDB.")
      );
    });
  });
});
