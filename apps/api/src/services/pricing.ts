import type { ProductRecord } from "../repositories/types.js";

type PricedProduct = Pick<ProductRecord, "price" | "discountPrice">;

function toCents(value: number) {
  return Math.round(value * 100);
}

/** Integer quotient rounded to nearest, ties to even. */
function divideHalfEven(numerator: number, denominator: number) {
  let quotient = Math.floor(numerator / denominator);
  let remainder = numerator - quotient * denominator;
  if (remainder < 0) {
    quotient -= 1;
    remainder += denominator;
  } else if (remainder >= denominator) {
    quotient += 1;
    remainder -= denominator;
  }
  const twice = remainder * 2;
  if (twice > denominator || (twice === denominator && quotient % 2 !== 0)) {
    return quotient + 1;
  }
  return quotient;
}

/**
 * Percentage taken off `price` by `discountPrice`, rounded half-even to two places.
 * Works in whole cents so that ties are exact. A discount price above the price gives a negative percentage.
 */
export function discountPercentage(product: PricedProduct) {
  if (product.discountPrice === null) {
    return 0;
  }
  const price = toCents(product.price);
  if (price <= 0) {
    return 0;
  }
  const hundredths = divideHalfEven((price - toCents(product.discountPrice)) * 10000, price);
  return hundredths / 100;
}

export function finalPrice(product: PricedProduct) {
  return product.discountPrice ?? product.price;
}

export function isInStock(product: Pick<ProductRecord, "stockQuantity">) {
  return product.stockQuantity > 0;
}

export function formatPrice(value: number) {
  return `$${value.toFixed(2)}`;
}

export function formatFinalPrice(product: PricedProduct) {
  return formatPrice(finalPrice(product));
}

export function describeProduct(product: Pick<ProductRecord, "name">, businessName: string) {
  return `${product.name} - ${businessName}`;
}
