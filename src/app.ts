import express from "express";
import cors from "cors";
import errorHandler, { notFoundHandler } from "./middlewares/errorHandler";
import { identifyCaller } from "./middlewares/auth";
import { requestLogger } from "./middlewares/requestLogger";
import { createCartRouter } from "./routes/cart";
import { createEntitiesRouter } from "./routes/entities";
import { createEventsRouter } from "./routes/events";
import type {
  ProductVariantRepository,
  UserRepository,
} from "./repositories/types";
import { CartMutationService } from "./services/cartMutationService";
import { CartQueryService } from "./services/cartQueryService";
import { EventIngestionService } from "./services/eventIngestionService";

export interface AppDependencies {
  users: UserRepository;
  productVariants: ProductVariantRepository;
  pubsubName: string;
  authHeader: string;
  frontendUrl?: string;
  now?: () => Date;
  newId?: () => string;
}

export const createApp = (deps: AppDependencies) => {
  const queries = new CartQueryService(deps.users);
  const mutations = new CartMutationService({
    users: deps.users,
    productVariants: deps.productVariants,
    queries,
    now: deps.now,
    newId: deps.newId,
  });
  const events = new EventIngestionService(
    deps.users,
    deps.productVariants,
    deps.now
  );

  const app = express();

  // Middlewares
  if (deps.frontendUrl) {
    app.use(cors({ origin: deps.frontendUrl, credentials: true }));
  }
  app.use(requestLogger);

  // Health check
  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  // Bus deliveries parse their own bodies so parse failures reach the bus handler
  app.use(createEventsRouter(events, deps.pubsubName));

  app.use(express.json());

  // Typed query/mutation API
  app.use("/api", identifyCaller(deps.authHeader));
  app.use("/api/entities", createEntitiesRouter(queries));
  app.use("/api", createCartRouter({ queries, mutations }));

  app.use(notFoundHandler);
  // Error handler (must be last)
  app.use(errorHandler);

  return app;
};
