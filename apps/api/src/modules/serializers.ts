import type {
  BuyerProfileRecord,
  CategoryRecord,
  ProductImageRecord,
  ProductRecord,
  SellerProfileRecord,
  UserRecord
} from "../repositories/types.js";
import { describeUser, getFullName, hasUsablePassword } from "../services/accounts.js";
import { describeProduct, discountPercentage, finalPrice, formatFinalPrice, isInStock } from "../services/pricing.js";

export function toCategoryRow(category: CategoryRecord) {
  return {
    id: category.id,
    name: category.name,
    slug: category.slug,
    parentId: category.parentId,
    createdAt: category.createdAt
  };
}

export function toCategoryDetail(category: CategoryRecord, subcategories: CategoryRecord[] = []) {
  return {
    ...category,
    subcategories: subcategories.map(toCategoryRow)
  };
}

export function toProductImage(image: ProductImageRecord) {
  return {
    id: image.id,
    productId: image.productId,
    image: image.image,
    altText: image.altText,
    createdAt: image.createdAt
  };
}

export function toAdminProductRow(product: ProductRecord, sellerBusinessName: string | null) {
  return {
    id: product.id,
    name: product.name,
    sellerBusinessName,
    finalPrice: formatFinalPrice(product),
    stockQuantity: product.stockQuantity,
    status: product.status,
    isFeatured: product.isFeatured,
    createdAt: product.createdAt
  };
}

export function toProductDetail(product: ProductRecord, images: ProductImageRecord[], sellerBusinessName: string | null) {
  return {
    ...product,
    sellerBusinessName,
    label: sellerBusinessName === null ? product.name : describeProduct(product, sellerBusinessName),
    discountPercentage: discountPercentage(product),
    finalPrice: finalPrice(product),
    isInStock: isInStock(product),
    images: images.map(toProductImage)
  };
}

export function toStorefrontProduct(product: ProductRecord) {
  return {
    id: product.id,
    slug: product.slug,
    name: product.name,
    categoryId: product.categoryId,
    unit: product.unit,
    price: product.price,
    discountPrice: product.discountPrice,
    finalPrice: finalPrice(product),
    discountPercentage: discountPercentage(product),
    inStock: isInStock(product),
    isFeatured: product.isFeatured
  };
}

export function toUserRow(user: UserRecord) {
  return {
    id: user.id,
    email: user.email,
    firstName: user.firstName,
    lastName: user.lastName,
    fullName: getFullName(user),
    userType: user.userType,
    isActive: user.isActive,
    isStaff: user.isStaff,
    dateJoined: user.dateJoined
  };
}

// The password hash never leaves the API.
export function toUserDetail(user: UserRecord) {
  const { passwordHash: _passwordHash, ...fields } = user;
  return {
    ...fields,
    fullName: getFullName(user),
    label: describeUser(user),
    hasUsablePassword: hasUsablePassword(user)
  };
}

export function toSellerProfile(profile: SellerProfileRecord) {
  return { ...profile, userId: profile.id };
}

export function toBuyerProfile(profile: BuyerProfileRecord) {
  return { ...profile, userId: profile.id };
}
