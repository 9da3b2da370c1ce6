import { Schema, model } from "mongoose";
import { DECIMALS, LIMITS, PRODUCT_STATUSES, SLUG_PATTERN, UNIT_TYPES, maxDecimalValue } from "@produce-market/shared-types";

const integerValidator = {
  validator: Number.isInteger,
  message: "{PATH} must be an integer"
};

const categorySchema = new Schema(
  {
    name: { type: String, required: true, trim: true, maxlength: LIMITS.categoryName, unique: true },
    slug: { type: String, required: true, maxlength: LIMITS.slug, match: SLUG_PATTERN, unique: true },
    description: { type: String, default: "" },
    parentId: { type: Schema.Types.ObjectId, ref: "Category", default: null, index: true },
    image: { type: String, default: null },
    isActive: { type: Boolean, default: true, index: true }
  },
  { timestamps: true }
);

const productSchema = new Schema(
  {
    sellerId: { type: Schema.Types.ObjectId, ref: "SellerProfile", required: true, index: true },
    name: { type: String, required: true, trim: true, maxlength: LIMITS.productName, index: true },
    slug: { type: String, required: true, maxlength: LIMITS.slug, match: SLUG_PATTERN, unique: true },
    categoryId: { type: Schema.Types.ObjectId, ref: "Category", required: true, index: true },
    price: { type: Number, required: true, min: 0, max: maxDecimalValue(DECIMALS.price) },
    discountPrice: { type: Number, min: 0, max: maxDecimalValue(DECIMALS.price), default: null },
    stockQuantity: { type: Number, min: 0, default: 0, validate: integerValidator, index: true },
    unit: { type: String, enum: [...UNIT_TYPES], maxlength: LIMITS.unit, default: "kg" },
    sku: { type: String, required: true, trim: true, maxlength: LIMITS.sku, unique: true },
    status: { type: String, enum: [...PRODUCT_STATUSES], default: "available", index: true },
    isFeatured: { type: Boolean, default: false, index: true },
    averageRating: { type: Number, min: 0, max: maxDecimalValue(DECIMALS.rating), default: 0, index: true },
    totalReviews: { type: Number, min: 0, default: 0, validate: integerValidator },
    totalSold: { type: Number, min: 0, default: 0, validate: integerValidator, index: true }
  },
  { timestamps: true }
);

const productImageSchema = new Schema(
  {
    productId: { type: Schema.Types.ObjectId, ref: "Product", required: true, index: true },
    image: { type: String, required: true },
    altText: { type: String, maxlength: LIMITS.altText, default: "" }
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

export const CategoryModel = model("Category", categorySchema);
export const ProductModel = model("Product", productSchema);
export const ProductImageModel = model("ProductImage", productImageSchema);
