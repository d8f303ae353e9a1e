import express from "express";
import {
  createCartController,
  type CartControllerServices,
} from "../controllers/cart";

export const createCartRouter = (services: CartControllerServices) => {
  const cart = createCartController(services);
  const router = express.Router();

  router.get("/carts", cart.listCarts);
  router.get("/users/:ownerId/carts", cart.listCartsForOwner);
  router.get("/users/:ownerId/cart", cart.getCart);
  router.put("/users/:ownerId/cart", cart.replaceCartItems);
  router.post("/users/:ownerId/cart/items", cart.addCartItem);
  router.get(
    "/users/:ownerId/cart/items/by-variant/:productVariantId",
    cart.getCartItemByVariant
  );
  router.get("/cart-items/:itemId", cart.getCartItem);
  router.patch("/cart-items/:itemId", cart.updateCartItem);
  router.delete("/cart-items/:itemId", cart.deleteCartItem);

  return router;
};
