import { z } from "zod";
import { uuidSchema } from "./cart";

export const topicEventSchema = z.object({
  topic: z.string(),
  data: z.object({
    id: uuidSchema,
  }),
});

export const orderCreationEventSchema = z.object({
  topic: z.string(),
  data: z.object({
    id: uuidSchema,
    userId: uuidSchema,
    orderItems: z.array(
      z.object({
        shoppingCartItemId: uuidSchema,
        count: z.number().int().nonnegative(),
      })
    ),
  }),
});
