import type { Model } from "mongoose";
import {
  ProductVariantModel,
  type ProductVariantDocument,
} from "../models/ProductVariant";
import { describeError, getLogger } from "../utils/logger";
import { createCollectionAdapter } from "./mongooseCollection";
import type { ProductVariantRepository } from "./types";

const log = getLogger("store");

export const createMongoProductVariantRepository = (
  model: Model<ProductVariantDocument> = ProductVariantModel
): ProductVariantRepository => {
  const variants = createCollectionAdapter(model, "product variant");

  return {
    async exists(id) {
      return (await variants.findById(id)) !== null;
    },

    insert(id) {
      return variants.insert({ _id: id });
    },

    async findMissingIds(ids) {
      let found: ProductVariantDocument[] = [];
      try {
        found = await model
          .find({ _id: { $in: ids } })
          .lean<ProductVariantDocument[]>()
          .exec();
      } catch (error) {
        // Unreadable counts as absent: every id is reported missing
        log.error("Reading product variants failed", { ids, error: describeError(error) });
      }
      const present = new Set(found.map((variant) => variant._id));
      return ids.filter((id) => !present.has(id));
    },
  };
};
