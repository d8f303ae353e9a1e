import mongoose, { type Model } from "mongoose";
import { StorageOperationFailedError } from "../utils/errors";
import { describeError, getLogger } from "../utils/logger";
import type { InsertOutcome } from "./types";

const log = getLogger("store");

const DUPLICATE_KEY = 11000;

export const isDuplicateKeyError = (error: unknown): boolean =>
  error instanceof mongoose.mongo.MongoServerError &&
  error.code === DUPLICATE_KEY;

/**
 * Id lookup and insert shared by every projection collection.
 * `entityName` only appears in log lines and error messages.
 */
export interface CollectionAdapter<TDoc extends { _id: string }> {
  findById(id: string): Promise<TDoc | null>;
  insert(doc: TDoc): Promise<InsertOutcome>;
}

export const createCollectionAdapter = <TDoc extends { _id: string }>(
  model: Model<TDoc>,
  entityName: string
): CollectionAdapter<TDoc> => ({
  async findById(id) {
    try {
      const doc: TDoc | null = await model.findById(id).lean<TDoc>().exec();
      return doc;
    } catch (error) {
      // Callers only see "absent"; the cause stays in the log
      log.error(`Reading ${entityName} failed`, { id, error: describeError(error) });
      return null;
    }
  },

  async insert(doc) {
    try {
      await model.create(doc);
      return "inserted";
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        return "duplicate";
      }
      log.error(`Inserting ${entityName} failed`, { id: doc._id, error: describeError(error) });
      throw new StorageOperationFailedError(
        `Adding ${entityName} of id: \`${doc._id}\` failed in MongoDB.`
      );
    }
  },
});
