import { describe, expect, it } from "vitest";
import mongoose, { Types } from "mongoose";
import { UniquenessViolation, ValidationError } from "../src/lib/errors.js";
import { CategoryModel, ProductModel } from "../src/models/catalog.js";
import { toFilter, toListQuery, translateWriteError } from "../src/repositories/mongoQuery.js";
import type { CategoryRecord, ProductRecord } from "../src/repositories/types.js";

function thrownBy<T extends Error>(type: new (...args: never[]) => T, run: () => unknown): T {
  try {
    run();
  } catch (error) {
    if (error instanceof type) {
      return error;
    }
    throw error;
  }
  throw new Error(`expected ${type.name} to be thrown`);
}

describe("toFilter", () => {
  it("turns a malformed id on an ObjectId path into a filter that matches nothing", () => {
    expect(toFilter<ProductRecord>(ProductModel.schema, { categoryId: "abc" })).toEqual({ categoryId: { $in: [] } });
    expect(toFilter<CategoryRecord>(CategoryModel.schema, { parentId: "nope" })).toEqual({ parentId: { $in: [] } });
    expect(toFilter<CategoryRecord>(CategoryModel.schema, { id: "nope" })).toEqual({ _id: { $in: [] } });
  });

  it("keeps well-formed ids, nulls and plain string fields", () => {
    const categoryId = "65a000000000000000000001";

    expect(toFilter<ProductRecord>(ProductModel.schema, { categoryId, slug: "abc", isFeatured: undefined })).toEqual({
      categoryId,
      slug: "abc"
    });
    expect(toFilter<CategoryRecord>(CategoryModel.schema, { parentId: null })).toEqual({ parentId: null });
  });

  it("excludes a valid id and ignores a malformed one", () => {
    const id = "65a000000000000000000002";

    expect(toFilter<CategoryRecord>(CategoryModel.schema, { slug: "fruit" }, id)).toEqual({ slug: "fruit", $and: [{ _id: { $ne: id } }] });
    expect(toFilter<CategoryRecord>(CategoryModel.schema, { slug: "fruit" }, "abc")).toEqual({ slug: "fruit" });
  });

  it("builds list filters that mongoose casts without error", () => {
    const { filter, sort } = toListQuery<ProductRecord>(ProductModel.schema, {
      where: { categoryId: "abc", sellerId: "seller-1" },
      search: { term: " apple ", fields: ["name"] },
      orderBy: { field: "createdAt", direction: "desc" }
    });

    expect(filter).toEqual({
      categoryId: { $in: [] },
      sellerId: { $in: [] },
      $or: [{ name: { $regex: "apple", $options: "i" } }]
    });
    expect(sort).toEqual({ createdAt: -1 });
    expect(() => ProductModel.find(filter).cast(ProductModel)).not.toThrow();
  });
});

describe("translateWriteError", () => {
  it("reports a duplicate key as a uniqueness violation on the colliding field", () => {
    const duplicate = new mongoose.mongo.MongoServerError({
      errmsg: "E11000 duplicate key error",
      code: 11000,
      keyValue: { slug: "fruit" }
    });

    const error = thrownBy(UniquenessViolation, () => translateWriteError("Category", duplicate));

    expect(error.entity).toBe("Category");
    expect(error.field).toBe("slug");
    expect(error.statusCode).toBe(409);
    expect(error.details).toEqual({ entity: "Category", field: "slug", value: "fruit" });
  });

  it("reports mongoose validation failures per field", () => {
    const invalid = new ProductModel({
      sellerId: new Types.ObjectId(),
      categoryId: new Types.ObjectId(),
      name: "Organic Apple",
      slug: "organic-apple",
      price: 4.5,
      sku: "APL-1",
      stockQuantity: 1.5
    }).validateSync();

    const error = thrownBy(ValidationError, () => translateWriteError("Product", invalid));

    expect(error.message).toBe("Invalid Product");
    expect(error.details).toEqual({ fields: { stockQuantity: "stockQuantity must be an integer" } });
  });

  it("reports a cast failure on its path", () => {
    const where: Record<string, unknown> = { categoryId: "abc" };
    const castError = thrownBy(mongoose.Error.CastError, () => ProductModel.find(where).cast(ProductModel));

    const error = thrownBy(ValidationError, () => translateWriteError("Product", castError));

    expect(error.details).toEqual({ fields: { categoryId: castError.message } });
  });

  it("rethrows anything else unchanged", () => {
    const failure = new Error("socket closed");

    expect(thrownBy(Error, () => translateWriteError("Product", failure))).toBe(failure);
  });
});
