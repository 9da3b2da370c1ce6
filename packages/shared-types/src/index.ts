import { z } from "zod";

export const USER_TYPES = ["buyer", "seller"] as const;
export const USER_TYPE_LABELS = { buyer: "Buyer", seller: "Seller" } as const;
export const PRODUCT_STATUSES = ["available", "out_of_stock", "discontinued"] as const;
export const UNIT_TYPES = ["kg", "g", "lb", "piece", "bunch", "dozen", "box"] as const;

export const PHONE_PATTERN = /^\+?1?\d{9,15}$/;
export const PHONE_ERROR_MESSAGE = "Phone number must be entered in the format: '+999999999'. Up to 15 digits allowed.";
export const SLUG_PATTERN = /^[-a-zA-Z0-9_]*$/;
export const OBJECT_ID_PATTERN = /^[a-f\d]{24}$/i;

export const LIMITS = {
  categoryName: 100,
  productName: 200,
  slug: 255,
  sku: 50,
  unit: 20,
  altText: 255,
  email: 254,
  name: 50,
  phone: 17,
  address: 255,
  city: 100,
  state: 100,
  businessName: 200,
  taxId: 50,
  businessLicense: 100,
  bankAccount: 50,
  bankName: 100,
  bankRouting: 50
} as const;

export const DECIMALS = {
  price: { maxDigits: 10, decimalPlaces: 2 },
  rating: { maxDigits: 3, decimalPlaces: 2 },
  revenue: { maxDigits: 12, decimalPlaces: 2 }
} as const;

export type DecimalPrecision = { maxDigits: number; decimalPlaces: number };

/** Largest value a column of this precision holds, e.g. 9.99 for 3 digits with 2 places. */
export function maxDecimalValue(precision: DecimalPrecision) {
  const step = 1 / 10 ** precision.decimalPlaces;
  return Number((10 ** (precision.maxDigits - precision.decimalPlaces) - step).toFixed(precision.decimalPlaces));
}

export function decimalSchema(precision: DecimalPrecision) {
  return z
    .number()
    .min(0)
    .max(maxDecimalValue(precision))
    .multipleOf(1 / 10 ** precision.decimalPlaces);
}

export const userTypeSchema = z.enum(USER_TYPES);
export const productStatusSchema = z.enum(PRODUCT_STATUSES);
export const unitTypeSchema = z.enum(UNIT_TYPES);

const slugSchema = z.string().trim().max(LIMITS.slug).regex(SLUG_PATTERN, "Slug may only contain letters, numbers, hyphens and underscores");
const countSchema = z.number().int().min(0);
const referenceSchema = z.string().min(1);
const objectIdSchema = z.string().regex(OBJECT_ID_PATTERN, "Must be a 24-character hex id");

export const categoryCreateSchema = z.object({
  name: z.string().trim().min(1).max(LIMITS.categoryName),
  slug: slugSchema.default(""),
  description: z.string().default(""),
  parentId: referenceSchema.nullable().default(null),
  image: referenceSchema.nullable().default(null),
  isActive: z.boolean().default(true)
});
export const categoryUpdateSchema = categoryCreateSchema.partial();

export const productCreateSchema = z.object({
  sellerId: referenceSchema,
  categoryId: referenceSchema,
  name: z.string().trim().min(1).max(LIMITS.productName),
  slug: slugSchema.default(""),
  price: decimalSchema(DECIMALS.price),
  discountPrice: decimalSchema(DECIMALS.price).nullable().default(null),
  stockQuantity: countSchema.default(0),
  unit: unitTypeSchema.default("kg"),
  sku: z.string().trim().min(1).max(LIMITS.sku),
  status: productStatusSchema.default("available"),
  isFeatured: z.boolean().default(false),
  averageRating: decimalSchema(DECIMALS.rating).default(0),
  totalReviews: countSchema.default(0),
  totalSold: countSchema.default(0)
});
export const productUpdateSchema = productCreateSchema.partial();

export const productImageCreateSchema = z.object({
  image: referenceSchema,
  altText: z.string().max(LIMITS.altText).default("")
});

export const userFieldsSchema = z.object({
  userType: userTypeSchema.default("buyer"),
  firstName: z.string().trim().max(LIMITS.name).default(""),
  lastName: z.string().trim().max(LIMITS.name).default(""),
  phoneNumber: z.string().max(LIMITS.phone).regex(PHONE_PATTERN, PHONE_ERROR_MESSAGE).nullable().default(null),
  profilePicture: referenceSchema.nullable().default(null),
  address: z.string().max(LIMITS.address).default(""),
  city: z.string().max(LIMITS.city).default(""),
  state: z.string().max(LIMITS.state).default(""),
  isActive: z.boolean().default(true),
  isStaff: z.boolean().default(false),
  isSuperuser: z.boolean().default(false),
  isVerified: z.boolean().default(false)
});

export const userCreateSchema = userFieldsSchema.extend({
  email: z.string().email().max(LIMITS.email),
  password: z.string().min(8).optional()
});

export const userUpdateSchema = userFieldsSchema.partial().extend({
  email: z.string().email().max(LIMITS.email).optional()
});

export const setPasswordSchema = z.object({
  password: z.string().min(8).nullable()
});

export const sellerProfileCreateSchema = z.object({
  businessName: z.string().trim().min(1).max(LIMITS.businessName),
  businessDescription: z.string().default(""),
  businessLogo: referenceSchema.nullable().default(null),
  taxId: z.string().max(LIMITS.taxId).default(""),
  businessLicense: z.string().max(LIMITS.businessLicense).default(""),
  bankAccountName: z.string().max(LIMITS.businessName).default(""),
  bankAccountNumber: z.string().max(LIMITS.bankAccount).default(""),
  bankName: z.string().max(LIMITS.bankName).default(""),
  bankRoutingNumber: z.string().max(LIMITS.bankRouting).default(""),
  rating: decimalSchema(DECIMALS.rating).default(0),
  totalSales: countSchema.default(0),
  totalRevenue: decimalSchema(DECIMALS.revenue).default(0),
  isVerifiedSeller: z.boolean().default(false),
  verificationDate: z.coerce.date().nullable().default(null)
});
export const sellerProfileUpdateSchema = sellerProfileCreateSchema.partial();

export const buyerProfileCreateSchema = z.object({
  preferredCategories: z.array(objectIdSchema).default([]),
  totalOrders: countSchema.default(0),
  totalSpent: decimalSchema(DECIMALS.revenue).default(0),
  loyaltyPoints: countSchema.default(0)
});
export const buyerProfileUpdateSchema = buyerProfileCreateSchema.partial();

export type UserType = z.infer<typeof userTypeSchema>;
export type ProductStatus = z.infer<typeof productStatusSchema>;
export type UnitType = z.infer<typeof unitTypeSchema>;

export type CategoryCreateRequest = z.input<typeof categoryCreateSchema>;
export type CategoryFields = z.infer<typeof categoryCreateSchema>;
export type CategoryUpdateRequest = z.infer<typeof categoryUpdateSchema>;
export type ProductCreateRequest = z.input<typeof productCreateSchema>;
export type ProductFields = z.infer<typeof productCreateSchema>;
export type ProductUpdateRequest = z.infer<typeof productUpdateSchema>;
export type ProductImageCreateRequest = z.input<typeof productImageCreateSchema>;
export type ProductImageFields = z.infer<typeof productImageCreateSchema>;
export type UserExtraFields = z.input<typeof userFieldsSchema>;
export type UserFields = z.infer<typeof userFieldsSchema>;
export type UserUpdateRequest = z.input<typeof userUpdateSchema>;
export type SellerProfileCreateRequest = z.input<typeof sellerProfileCreateSchema>;
export type SellerProfileFields = z.infer<typeof sellerProfileCreateSchema>;
export type SellerProfileUpdateRequest = z.input<typeof sellerProfileUpdateSchema>;
export type BuyerProfileCreateRequest = z.input<typeof buyerProfileCreateSchema>;
export type BuyerProfileFields = z.infer<typeof buyerProfileCreateSchema>;
export type BuyerProfileUpdateRequest = z.input<typeof buyerProfileUpdateSchema>;
