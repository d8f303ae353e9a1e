import express from "express";
import { createEntitiesController } from "../controllers/entities";
import type { CartQueryService } from "../services/cartQueryService";

export const createEntitiesRouter = (queries: CartQueryService) => {
  const entities = createEntitiesController(queries);
  const router = express.Router();

  router.post("/", entities.resolveEntities);

  return router;
};
