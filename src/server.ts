import { ZodError } from "zod";
import { createApp } from "./app";
import connectDB from "./config/database";
import { loadConfig } from "./config/env";
import { createMongoProductVariantRepository } from "./repositories/productVariantRepository";
import { createMongoUserRepository } from "./repositories/userRepository";
import { describeError, logger } from "./utils/logger";

// Start server after the database connection is established
const startServer = async () => {
  try {
    const config = loadConfig();
    logger.level = config.logLevel;
    await connectDB(config);

    const app = createApp({
      users: createMongoUserRepository(),
      productVariants: createMongoProductVariantRepository(),
      pubsubName: config.pubsubName,
      authHeader: config.authHeader,
      frontendUrl: config.frontendUrl,
    });

    app.listen(config.port, () => {
      logger.info(`Shopping cart service running on port ${config.port}`);
    });
  } catch (error) {
    if (error instanceof ZodError) {
      logger.error("Invalid configuration", { issues: error.issues });
    } else {
      logger.error("Failed to start server", { error: describeError(error) });
    }
    process.exit(1);
  }
};

void startServer();
