import mongoose, { Schema } from "mongoose";
import {
  createEmptyCart,
  type ShoppingCart,
  type ShoppingCartDocument,
  ShoppingCartSchema,
  toShoppingCart,
} from "./ShoppingCart";

// Local projection of a user owned by the user service.
// Created by the "user created" event, never deleted here.

export interface User {
  id: string;
  shoppingCart: ShoppingCart;
}

export interface UserDocument {
  _id: string;
  shoppingCart: ShoppingCartDocument;
  createdAt?: Date;
}

const UserSchema = new Schema<UserDocument>(
  {
    _id: { type: String, required: true },
    shoppingCart: {
      type: ShoppingCartSchema,
      required: true,
      default: () => createEmptyCart(),
    },
  },
  {
    collection: "users",
    timestamps: { createdAt: true, updatedAt: false },
    versionKey: false,
  }
);

export const newUserDocument = (
  id: string,
  now: Date = new Date()
): UserDocument => ({
  _id: id,
  shoppingCart: createEmptyCart(now),
});

export const toUser = (doc: UserDocument): User => ({
  id: doc._id,
  shoppingCart: toShoppingCart(doc._id, doc.shoppingCart),
});

export const UserModel = mongoose.model<UserDocument>("User", UserSchema);
