import mongoose from "mongoose";
import { ServerApiVersion } from "mongodb";
import { getLogger } from "../utils/logger";
import type { AppConfig } from "./env";

const log = getLogger("database");

const clientOptions = {
  serverApi: {
    version: ServerApiVersion.v1,
    strict: true,
    deprecationErrors: true,
  },
  appName: "ShoppingCart",
};

/**
 * Opens the process-wide connection every repository borrows its
 * collections from. Called once before the server starts listening.
 */
const connectDB = async (
  config: Pick<AppConfig, "mongoUri" | "mongoDbName">
): Promise<typeof mongoose> => {
  const conn = await mongoose.connect(config.mongoUri, {
    ...clientOptions,
    dbName: config.mongoDbName,
  });

  log.info("MongoDB connected", {
    host: conn.connection.host,
    database: conn.connection.name,
  });

  return conn;
};

export default connectDB;
