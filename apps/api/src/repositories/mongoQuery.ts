import mongoose, { type Schema } from "mongoose";
import { UniquenessViolation, ValidationError } from "../lib/errors.js";
import { isObjectId } from "../utils/ids.js";
import type { ListOptions, Where } from "./types.js";

function escapeRegex(value: string) {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function toPath(field: string) {
  return field === "id" ? "_id" : field;
}

// Fresh each time: mongoose casts query operators in place.
function noMatch() {
  return { $in: [] };
}

function isObjectIdPath(schema: Schema, path: string) {
  return schema.path(path)?.instance === "ObjectId";
}

/** Equality filter over `schema`; a malformed id on an ObjectId path matches nothing instead of failing to cast. */
export function toFilter<TRecord>(schema: Schema, where: Where<TRecord> = {}, excludeId?: string) {
  const filter: Record<string, unknown> = {};
  for (const [field, value] of Object.entries(where)) {
    if (value === undefined) {
      continue;
    }
    const path = toPath(field);
    filter[path] = typeof value === "string" && isObjectIdPath(schema, path) && !isObjectId(value) ? noMatch() : value;
  }
  if (excludeId && isObjectId(excludeId)) {
    filter.$and = [{ _id: { $ne: excludeId } }];
  }
  return filter;
}

export function toListQuery<TRecord>(schema: Schema, options: ListOptions<TRecord> = {}) {
  const filter = toFilter(schema, options.where);
  const term = options.search?.term.trim();
  if (options.search && term) {
    filter.$or = options.search.fields.map((field) => ({
      [toPath(field)]: { $regex: escapeRegex(term), $options: "i" }
    }));
  }

  const sort: Record<string, 1 | -1> = {};
  if (options.orderBy) {
    sort[toPath(options.orderBy.field)] = options.orderBy.direction === "asc" ? 1 : -1;
  }

  return { filter, sort };
}

/** Maps driver and mongoose write failures onto the application's error taxonomy. */
export function translateWriteError(entity: string, error: unknown): never {
  if (error instanceof mongoose.mongo.MongoServerError && error.code === 11000) {
    const keyValue: Record<string, unknown> = error.keyValue ?? {};
    const [field = "value"] = Object.keys(keyValue);
    throw new UniquenessViolation(entity, field, keyValue[field]);
  }
  if (error instanceof mongoose.Error.ValidationError) {
    throw new ValidationError(`Invalid ${entity}`, {
      fields: Object.fromEntries(Object.entries(error.errors).map(([path, detail]) => [path, detail.message]))
    });
  }
  if (error instanceof mongoose.Error.CastError) {
    throw new ValidationError(`Invalid ${entity}`, { fields: { [error.path]: error.message } });
  }
  throw error;
}
