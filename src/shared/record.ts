import { z } from "zod";
import { ValidationError } from "./errors.js";

export const NAME_MAX_LENGTH = 255;
const RECORD_ID_MAX = 2_147_483_647; // int4 upper bound of the SERIAL column

export type NewRecord = {
  name: string;
  message: string;
  note: string | null;
  createdAt: Date;
  updatedAt: Date;
};

export type StoredRecord = NewRecord & {
  id: number;
};

export type RecordJson = {
  id: number;
  name: string;
  message: string;
  note: string | null;
  createdAt: string; // YYYY-MM-DDTHH:MM:SS.ffffffZ
  updatedAt: string;
};

const textField = (field: string) =>
  z.string({ invalid_type_error: `${field} must be a string` }).nullish();

const recordInputSchema = z.object(
  {
    name: textField("name"),
    message: textField("message"),
    note: textField("note")
  },
  { invalid_type_error: "Request body must be a JSON object" }
);

type RecordInput = z.infer<typeof recordInputSchema>;

const parseInput = (input: unknown): RecordInput => {
  const parsed = recordInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues[0]?.message ?? "Invalid record payload");
  }
  return parsed.data;
};

const clean = (value: string | null | undefined): string => (value ?? "").trim();

const checkNameLength = (name: string) => {
  // VARCHAR(n) counts characters, not UTF-16 units
  if ([...name].length > NAME_MAX_LENGTH) {
    throw new ValidationError(`name must be at most ${NAME_MAX_LENGTH} characters`);
  }
};

export const normalizeCreate = (input: unknown, now: Date = new Date()): NewRecord => {
  const data = parseInput(input);
  const name = clean(data.name);
  const message = clean(data.message);
  if (!name || !message) {
    throw new ValidationError("Name and message are required");
  }
  checkNameLength(name);

  return {
    name,
    message,
    note: clean(data.note) || null,
    createdAt: now,
    updatedAt: now
  };
};

export type RecordPatch = {
  name?: string;
  message?: string;
  note?: string | null;
};

/**
 * Reduces an update body to the fields that will actually change.
 *
 * Blank `name`/`message` values are dropped so the stored value is kept. A
 * present `note` is always part of the patch: blank or null clears it.
 */
export const parseRecordPatch = (input: unknown): RecordPatch => {
  const data = parseInput(input);
  const patch: RecordPatch = {};

  const name = clean(data.name);
  if (name) {
    checkNameLength(name);
    patch.name = name;
  }

  const message = clean(data.message);
  if (message) {
    patch.message = message;
  }

  if (data.note !== undefined) {
    patch.note = clean(data.note) || null;
  }

  return patch;
};

// `updatedAt` moves to `now` even when the patch is empty.
export const applyPartialUpdate = (
  record: StoredRecord,
  input: unknown,
  now: Date = new Date()
): StoredRecord => ({
  ...record,
  ...parseRecordPatch(input),
  updatedAt: now.getTime() < record.createdAt.getTime() ? record.createdAt : now
});

export const parseRecordId = (raw: string | number): number | null => {
  if (typeof raw === "string" && !/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  if (!Number.isSafeInteger(id) || id < 1 || id > RECORD_ID_MAX) return null;
  return id;
};

export const formatTimestamp = (date: Date): string =>
  date.toISOString().replace(/Z$/, "000Z");

export const toRecordJson = (record: StoredRecord): RecordJson => ({
  id: record.id,
  name: record.name,
  message: record.message,
  note: record.note,
  createdAt: formatTimestamp(record.createdAt),
  updatedAt: formatTimestamp(record.updatedAt)
});
