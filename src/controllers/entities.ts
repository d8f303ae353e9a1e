import { Request, Response, NextFunction } from "express";
import type {
  CartQueryService,
  ResolvedEntity,
} from "../services/cartQueryService";
import { entitiesRequestSchema } from "../validation/cart";

/**
 * Entity resolution for the gateway. Representations are resolved in order;
 * the first one that cannot be resolved fails the request.
 */
export const createEntitiesController = (queries: CartQueryService) => ({
  resolveEntities: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { representations } = entitiesRequestSchema.parse(req.body);
      const entities: ResolvedEntity[] = [];
      for (const representation of representations) {
        entities.push(await queries.resolveEntityByKey(representation));
      }
      res.json({ success: true, entities });
    } catch (error) {
      next(error);
    }
  },
});
