export type SluggedDraft = {
  id?: string | null;
  name: string;
  slug?: string | null;
};

/** Resolves to true when another record already holds `candidate`; `excludeId` is the record being saved. */
export type SlugTakenCheck = (candidate: string, excludeId?: string) => Promise<boolean>;

export function slugify(value: string) {
  return value
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/**
 * Fills an empty category slug from its name. Collisions are left to the
 * unique index on `slug`, so two names that slugify alike fail on write.
 */
export function assignCategorySlug<T extends SluggedDraft>(category: T) {
  if (!category.slug) {
    category.slug = slugify(category.name);
  }
  return category.slug;
}

/**
 * Fills an empty product slug with the first free candidate among
 * `base`, `base-1`, `base-2`, ... A slug that is already set is kept as is.
 */
export async function assignProductSlug<T extends SluggedDraft>(product: T, isTaken: SlugTakenCheck) {
  if (product.slug) {
    return product.slug;
  }

  const base = slugify(product.name);
  const excludeId = product.id ?? undefined;
  let candidate = base;
  let counter = 1;
  while (await isTaken(candidate, excludeId)) {
    candidate = `${base}-${counter}`;
    counter += 1;
  }

  product.slug = candidate;
  return candidate;
}
