import type { Types } from "mongoose";
import type { CategoryFields, ProductFields, ProductImageFields, ProductStatus, UnitType } from "@produce-market/shared-types";
import { CategoryModel, ProductImageModel, ProductModel } from "../models/catalog.js";
import { isObjectId } from "../utils/ids.js";
import { toFilter, toListQuery, translateWriteError } from "./mongoQuery.js";
import type {
  CategoryRecord,
  CategoryRepository,
  ListOptions,
  ProductImageRecord,
  ProductImageRepository,
  ProductRecord,
  ProductRepository,
  Where
} from "./types.js";

type CategoryLean = {
  _id: Types.ObjectId;
  name: string;
  slug: string;
  description: string;
  parentId: Types.ObjectId | null;
  image: string | null;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
};

type ProductLean = {
  _id: Types.ObjectId;
  sellerId: Types.ObjectId;
  categoryId: Types.ObjectId;
  name: string;
  slug: string;
  price: number;
  discountPrice: number | null;
  stockQuantity: number;
  unit: UnitType;
  sku: string;
  status: ProductStatus;
  isFeatured: boolean;
  averageRating: number;
  totalReviews: number;
  totalSold: number;
  createdAt: Date;
  updatedAt: Date;
};

type ProductImageLean = {
  _id: Types.ObjectId;
  productId: Types.ObjectId;
  image: string;
  altText: string;
  createdAt: Date;
};

function toCategoryRecord(doc: CategoryLean): CategoryRecord {
  return {
    id: doc._id.toString(),
    name: doc.name,
    slug: doc.slug,
    description: doc.description ?? "",
    parentId: doc.parentId ? doc.parentId.toString() : null,
    image: doc.image ?? null,
    isActive: doc.isActive,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt
  };
}

function toProductRecord(doc: ProductLean): ProductRecord {
  return {
    id: doc._id.toString(),
    sellerId: doc.sellerId.toString(),
    categoryId: doc.categoryId.toString(),
    name: doc.name,
    slug: doc.slug,
    price: doc.price,
    discountPrice: doc.discountPrice ?? null,
    stockQuantity: doc.stockQuantity,
    unit: doc.unit,
    sku: doc.sku,
    status: doc.status,
    isFeatured: doc.isFeatured,
    averageRating: doc.averageRating,
    totalReviews: doc.totalReviews,
    totalSold: doc.totalSold,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt
  };
}

function toProductImageRecord(doc: ProductImageLean): ProductImageRecord {
  return {
    id: doc._id.toString(),
    productId: doc.productId.toString(),
    image: doc.image,
    altText: doc.altText ?? "",
    createdAt: doc.createdAt
  };
}

export class MongoCategoryRepository implements CategoryRepository {
  async findById(id: string) {
    if (!isObjectId(id)) {
      return null;
    }
    const doc = await CategoryModel.findById(id).lean<CategoryLean | null>();
    return doc ? toCategoryRecord(doc) : null;
  }

  async findOne(where: Where<CategoryRecord>) {
    const doc = await CategoryModel.findOne(toFilter(CategoryModel.schema, where)).lean<CategoryLean | null>();
    return doc ? toCategoryRecord(doc) : null;
  }

  async exists(where: Where<CategoryRecord>, excludeId?: string) {
    return (await CategoryModel.exists(toFilter(CategoryModel.schema, where, excludeId))) !== null;
  }

  async list(options?: ListOptions<CategoryRecord>) {
    const { filter, sort } = toListQuery(CategoryModel.schema, options);
    const docs = await CategoryModel.find(filter).sort(sort).lean<CategoryLean[]>();
    return docs.map(toCategoryRecord);
  }

  async create(input: CategoryFields) {
    try {
      const created = await CategoryModel.create(input);
      return toCategoryRecord(created.toObject<CategoryLean>());
    } catch (error) {
      return translateWriteError("Category", error);
    }
  }

  async update(id: string, changes: Partial<CategoryFields>) {
    if (!isObjectId(id)) {
      return null;
    }
    try {
      const doc = await CategoryModel.findByIdAndUpdate(id, { $set: changes }, { new: true, runValidators: true }).lean<CategoryLean | null>();
      return doc ? toCategoryRecord(doc) : null;
    } catch (error) {
      return translateWriteError("Category", error);
    }
  }

  async deleteWhere(where: Where<CategoryRecord>) {
    const result = await CategoryModel.deleteMany(toFilter(CategoryModel.schema, where));
    return result.deletedCount;
  }
}

export class MongoProductRepository implements ProductRepository {
  async findById(id: string) {
    if (!isObjectId(id)) {
      return null;
    }
    const doc = await ProductModel.findById(id).lean<ProductLean | null>();
    return doc ? toProductRecord(doc) : null;
  }

  async findOne(where: Where<ProductRecord>) {
    const doc = await ProductModel.findOne(toFilter(ProductModel.schema, where)).lean<ProductLean | null>();
    return doc ? toProductRecord(doc) : null;
  }

  async exists(where: Where<ProductRecord>, excludeId?: string) {
    return (await ProductModel.exists(toFilter(ProductModel.schema, where, excludeId))) !== null;
  }

  async list(options?: ListOptions<ProductRecord>) {
    const { filter, sort } = toListQuery(ProductModel.schema, options);
    const docs = await ProductModel.find(filter).sort(sort).lean<ProductLean[]>();
    return docs.map(toProductRecord);
  }

  async create(input: ProductFields) {
    try {
      const created = await ProductModel.create(input);
      return toProductRecord(created.toObject<ProductLean>());
    } catch (error) {
      return translateWriteError("Product", error);
    }
  }

  async update(id: string, changes: Partial<ProductFields>) {
    if (!isObjectId(id)) {
      return null;
    }
    try {
      const doc = await ProductModel.findByIdAndUpdate(id, { $set: changes }, { new: true, runValidators: true }).lean<ProductLean | null>();
      return doc ? toProductRecord(doc) : null;
    } catch (error) {
      return translateWriteError("Product", error);
    }
  }

  async deleteWhere(where: Where<ProductRecord>) {
    const result = await ProductModel.deleteMany(toFilter(ProductModel.schema, where));
    return result.deletedCount;
  }
}

export class MongoProductImageRepository implements ProductImageRepository {
  async findById(id: string) {
    if (!isObjectId(id)) {
      return null;
    }
    const doc = await ProductImageModel.findById(id).lean<ProductImageLean | null>();
    return doc ? toProductImageRecord(doc) : null;
  }

  async findOne(where: Where<ProductImageRecord>) {
    const doc = await ProductImageModel.findOne(toFilter(ProductImageModel.schema, where)).lean<ProductImageLean | null>();
    return doc ? toProductImageRecord(doc) : null;
  }

  async exists(where: Where<ProductImageRecord>, excludeId?: string) {
    return (await ProductImageModel.exists(toFilter(ProductImageModel.schema, where, excludeId))) !== null;
  }

  async list(options?: ListOptions<ProductImageRecord>) {
    const { filter, sort } = toListQuery(ProductImageModel.schema, options);
    const docs = await ProductImageModel.find(filter).sort(sort).lean<ProductImageLean[]>();
    return docs.map(toProductImageRecord);
  }

  async create(input: ProductImageFields & { productId: string }) {
    try {
      const created = await ProductImageModel.create(input);
      return toProductImageRecord(created.toObject<ProductImageLean>());
    } catch (error) {
      return translateWriteError("Product image", error);
    }
  }

  async update(id: string, changes: Partial<ProductImageFields & { productId: string }>) {
    if (!isObjectId(id)) {
      return null;
    }
    try {
      const doc = await ProductImageModel.findByIdAndUpdate(id, { $set: changes }, { new: true, runValidators: true }).lean<ProductImageLean | null>();
      return doc ? toProductImageRecord(doc) : null;
    } catch (error) {
      return translateWriteError("Product image", error);
    }
  }

  async deleteWhere(where: Where<ProductImageRecord>) {
    const result = await ProductImageModel.deleteMany(toFilter(ProductImageModel.schema, where));
    return result.deletedCount;
  }
}
