import { v4 as uuidv4 } from "uuid";
import connectDB from "../config/database";
import { loadConfig } from "../config/env";
import { mintCartItem } from "../models/ShoppingCart";
import { ProductVariantModel } from "../models/ProductVariant";
import { UserModel } from "../models/User";
import { createMongoProductVariantRepository } from "../repositories/productVariantRepository";
import { createMongoUserRepository } from "../repositories/userRepository";
import { describeError, getLogger } from "./logger";

// DEVELOPMENT SEED
// Fills the local projections the bus would normally populate: product
// variants, users and a few carts. Never run against a shared database.

const log = getLogger("seed");

const VARIANT_COUNT = 8;
const USER_COUNT = 5;
const CARTS_WITH_ITEMS = 3;

const seedDatabase = async (): Promise<void> => {
  try {
    const config = loadConfig();
    await connectDB(config);

    log.info("Clearing existing projections...");
    await UserModel.deleteMany({});
    await ProductVariantModel.deleteMany({});

    const users = createMongoUserRepository();
    const productVariants = createMongoProductVariantRepository();
    const now = new Date();

    const variantIds: string[] = [];
    for (let i = 0; i < VARIANT_COUNT; i++) {
      const id = uuidv4();
      await productVariants.insert(id);
      variantIds.push(id);
    }
    log.info(`Created ${variantIds.length} product variants`);

    const userIds: string[] = [];
    for (let i = 0; i < USER_COUNT; i++) {
      const id = uuidv4();
      await users.insert(id, now);
      userIds.push(id);
    }
    log.info(`Created ${userIds.length} users with empty carts`);

    for (const [index, userId] of userIds.slice(0, CARTS_WITH_ITEMS).entries()) {
      const items = variantIds
        .slice(index, index + 2)
        .map((productVariantId, offset) =>
          mintCartItem(uuidv4(), { productVariantId, count: offset + 1 }, now)
        );
      await users.replaceCartItems(userId, items, now);
      log.info(`Filled cart of ${userId}`, { items: items.length });
    }

    log.info("Shopping cart database seeded", {
      productVariants: variantIds,
      users: userIds,
    });
    process.exit(0);
  } catch (error) {
    log.error("Error seeding shopping cart database", {
      error: describeError(error),
    });
    process.exit(1);
  }
};

void seedDatabase();
