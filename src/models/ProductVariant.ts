import mongoose, { Schema } from "mongoose";

// Existence projection of a product variant owned by the catalog service.
// Only the id is kept; the row is never updated or deleted locally.

export interface ProductVariantDocument {
  _id: string;
}

const ProductVariantSchema = new Schema<ProductVariantDocument>(
  {
    _id: { type: String, required: true },
  },
  { collection: "product_variants", versionKey: false }
);

export const ProductVariantModel = mongoose.model<ProductVariantDocument>(
  "ProductVariant",
  ProductVariantSchema
);
