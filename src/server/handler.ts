import { NotFoundError, StorageError, ValidationError, isDomainError } from "../shared/errors.js";
import type { Logger } from "../shared/logger.js";
import {
  applyPartialUpdate,
  normalizeCreate,
  parseRecordId,
  parseRecordPatch,
  type StoredRecord
} from "../shared/record.js";
import type { TransactionalRecordStore } from "../shared/store.js";

export type RecordHandlerDeps = {
  store: TransactionalRecordStore;
  logger: Logger;
  now?: () => Date;
};

export type RecordList = {
  records: StoredRecord[];
  total: number;
};

export type RecordHandler = {
  list(): Promise<RecordList>;
  create(body: unknown): Promise<StoredRecord>;
  update(id: string | number, body: unknown): Promise<StoredRecord>;
  remove(id: string | number): Promise<void>;
};

const isEmptyObject = (value: unknown) =>
  typeof value === "object" && value !== null && !Array.isArray(value) && Object.keys(value).length === 0;

const requireId = (raw: string | number): number => {
  const id = parseRecordId(raw);
  if (id === null) {
    throw new NotFoundError();
  }
  return id;
};

export const createRecordHandler = ({ store, logger, now = () => new Date() }: RecordHandlerDeps): RecordHandler => {
  // Domain errors pass through untouched; anything else came from the database.
  const guard = async <T>(failure: string, work: () => Promise<T>): Promise<T> => {
    try {
      return await work();
    } catch (error) {
      if (isDomainError(error)) throw error;
      logger.error({ err: error }, failure);
      throw new StorageError(failure, { cause: error });
    }
  };

  return {
    list: () =>
      guard("Failed to fetch records", async () => {
        const records = await store.findAll();
        return { records, total: records.length };
      }),

    create: async (body) => {
      const record = normalizeCreate(body, now());
      return guard("Failed to create record", () => store.transaction((tx) => tx.insert(record)));
    },

    update: async (rawId, body) => {
      const id = requireId(rawId);
      if (body === undefined || body === null || isEmptyObject(body)) {
        throw new ValidationError("No data provided");
      }
      // Shape errors surface here, before a connection is taken.
      parseRecordPatch(body);

      return guard("Failed to update record", () =>
        store.transaction(async (tx) => {
          const existing = await tx.findById(id);
          if (!existing) throw new NotFoundError();
          const updated = await tx.update(applyPartialUpdate(existing, body, now()));
          if (!updated) throw new NotFoundError();
          return updated;
        })
      );
    },

    remove: async (rawId) => {
      const id = requireId(rawId);
      await guard("Failed to delete record", () =>
        store.transaction(async (tx) => {
          const deleted = await tx.delete(id);
          if (!deleted) throw new NotFoundError();
        })
      );
    }
  };
};
