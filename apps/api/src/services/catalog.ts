import {
  categoryCreateSchema,
  categoryUpdateSchema,
  productCreateSchema,
  productImageCreateSchema,
  productUpdateSchema,
  type CategoryCreateRequest,
  type CategoryUpdateRequest,
  type ProductCreateRequest,
  type ProductImageCreateRequest,
  type ProductStatus,
  type ProductUpdateRequest
} from "@produce-market/shared-types";
import { NotFoundError, ValidationError } from "../lib/errors.js";
import { parseInput } from "../lib/validation.js";
import type { CategoryRecord, ProductRecord, Repositories } from "../repositories/types.js";
import { assignCategorySlug, assignProductSlug, type SlugTakenCheck } from "./slugs.js";

export type CatalogRepositories = Pick<Repositories, "categories" | "products" | "productImages" | "sellerProfiles">;

export type DeletionSummary = {
  categories: number;
  products: number;
  images: number;
};

export type CategoryListQuery = {
  search?: string;
  parentId?: string | null;
  isActive?: boolean;
};

export type ProductListQuery = {
  search?: string;
  categoryId?: string;
  sellerId?: string;
  status?: ProductStatus;
  isFeatured?: boolean;
};

export type ProductImageListQuery = {
  search?: string;
  productId?: string;
};

/** Removes everything a seller profile owns in the catalog. */
export interface SellerInventory {
  removeSellerProducts(sellerId: string): Promise<DeletionSummary>;
}

function emptySummary(): DeletionSummary {
  return { categories: 0, products: 0, images: 0 };
}

function requireSlug(entity: string, slug: string) {
  if (!slug) {
    throw new ValidationError(`Cannot derive a slug from this ${entity} name`, { fields: { slug: "Slug is empty" } });
  }
}

export class CatalogService implements SellerInventory {
  constructor(private readonly repositories: CatalogRepositories) {}

  readonly isProductSlugTaken: SlugTakenCheck = (candidate, excludeId) =>
    this.repositories.products.exists({ slug: candidate }, excludeId);

  async createCategory(input: CategoryCreateRequest) {
    const fields = parseInput(categoryCreateSchema, input, "Invalid category payload");
    await this.assertParent(fields.parentId);
    requireSlug("category", assignCategorySlug(fields));
    return this.repositories.categories.create(fields);
  }

  async updateCategory(id: string, changes: CategoryUpdateRequest) {
    const existing = await this.getCategory(id);
    const fields = parseInput(categoryUpdateSchema, changes, "Invalid category payload");
    if (fields.parentId !== undefined) {
      await this.assertParent(fields.parentId, existing.id);
    }

    const draft = { name: fields.name ?? existing.name, slug: fields.slug ?? existing.slug };
    requireSlug("category", assignCategorySlug(draft));

    const updated = await this.repositories.categories.update(existing.id, { ...fields, slug: draft.slug });
    if (!updated) {
      throw new NotFoundError("Category", id);
    }
    return updated;
  }

  async getCategory(id: string) {
    const category = await this.repositories.categories.findById(id);
    if (!category) {
      throw new NotFoundError("Category", id);
    }
    return category;
  }

  /** Looks a category up by id first, then by slug. */
  async findCategory(reference: string) {
    return (await this.repositories.categories.findById(reference)) ?? this.repositories.categories.findOne({ slug: reference });
  }

  async listCategories(query: CategoryListQuery = {}) {
    return this.repositories.categories.list({
      where: { parentId: query.parentId, isActive: query.isActive },
      search: query.search ? { term: query.search, fields: ["name", "slug"] } : undefined,
      orderBy: { field: "name", direction: "asc" }
    });
  }

  async listSubcategories(parentId: string) {
    return this.repositories.categories.list({
      where: { parentId },
      orderBy: { field: "name", direction: "asc" }
    });
  }

  /** Deletes a category with every descendant, their products and those products' images. */
  async deleteCategory(id: string) {
    const root = await this.getCategory(id);
    const categoryIds = [root.id];
    let frontier = [root.id];
    while (frontier.length > 0) {
      const next: string[] = [];
      for (const parentId of frontier) {
        for (const child of await this.listSubcategories(parentId)) {
          if (!categoryIds.includes(child.id)) {
            categoryIds.push(child.id);
            next.push(child.id);
          }
        }
      }
      frontier = next;
    }

    const summary = emptySummary();
    for (const categoryId of categoryIds) {
      const products = await this.repositories.products.list({ where: { categoryId } });
      for (const product of products) {
        summary.images += await this.removeProduct(product.id);
        summary.products += 1;
      }
    }
    for (const categoryId of [...categoryIds].reverse()) {
      summary.categories += await this.repositories.categories.deleteWhere({ id: categoryId });
    }
    return summary;
  }

  async createProduct(input: ProductCreateRequest) {
    const fields = parseInput(productCreateSchema, input, "Invalid product payload");
    await this.assertCategory(fields.categoryId);
    await this.assertSeller(fields.sellerId);
    requireSlug("product", await assignProductSlug(fields, this.isProductSlugTaken));
    return this.repositories.products.create(fields);
  }

  async updateProduct(id: string, changes: ProductUpdateRequest) {
    const existing = await this.getProduct(id);
    const fields = parseInput(productUpdateSchema, changes, "Invalid product payload");
    if (fields.categoryId !== undefined) {
      await this.assertCategory(fields.categoryId);
    }
    if (fields.sellerId !== undefined) {
      await this.assertSeller(fields.sellerId);
    }

    const draft = { id: existing.id, name: fields.name ?? existing.name, slug: fields.slug ?? existing.slug };
    requireSlug("product", await assignProductSlug(draft, this.isProductSlugTaken));

    const updated = await this.repositories.products.update(existing.id, { ...fields, slug: draft.slug });
    if (!updated) {
      throw new NotFoundError("Product", id);
    }
    return updated;
  }

  async getProduct(id: string) {
    const product = await this.repositories.products.findById(id);
    if (!product) {
      throw new NotFoundError("Product", id);
    }
    return product;
  }

  async getProductBySlug(slug: string) {
    const product = await this.repositories.products.findOne({ slug });
    if (!product) {
      throw new NotFoundError("Product", slug);
    }
    return product;
  }

  async listProducts(query: ProductListQuery = {}) {
    return this.repositories.products.list({
      where: {
        categoryId: query.categoryId,
        sellerId: query.sellerId,
        status: query.status,
        isFeatured: query.isFeatured
      },
      search: query.search ? { term: query.search, fields: ["name", "slug", "sku"] } : undefined,
      orderBy: { field: "createdAt", direction: "desc" }
    });
  }

  async deleteProduct(id: string) {
    const product = await this.getProduct(id);
    const images = await this.removeProduct(product.id);
    return { ...emptySummary(), products: 1, images };
  }

  async removeSellerProducts(sellerId: string) {
    const summary = emptySummary();
    const products = await this.repositories.products.list({ where: { sellerId } });
    for (const product of products) {
      summary.images += await this.removeProduct(product.id);
      summary.products += 1;
    }
    return summary;
  }

  async addProductImage(productId: string, input: ProductImageCreateRequest) {
    const product = await this.getProduct(productId);
    const fields = parseInput(productImageCreateSchema, input, "Invalid product image payload");
    return this.repositories.productImages.create({ ...fields, productId: product.id });
  }

  async listProductImages(query: ProductImageListQuery = {}) {
    return this.repositories.productImages.list({
      where: { productId: query.productId },
      search: query.search ? { term: query.search, fields: ["altText"] } : undefined,
      orderBy: { field: "createdAt", direction: "desc" }
    });
  }

  async deleteProductImage(id: string) {
    const image = await this.repositories.productImages.findById(id);
    if (!image) {
      throw new NotFoundError("Product image", id);
    }
    await this.repositories.productImages.deleteWhere({ id: image.id });
    return { ...emptySummary(), images: 1 };
  }

  /** Business name of the seller profile that owns the product, or null when the profile is gone. */
  async sellerBusinessName(product: Pick<ProductRecord, "sellerId">) {
    const seller = await this.repositories.sellerProfiles.findById(product.sellerId);
    return seller?.businessName ?? null;
  }

  async sellerBusinessNames(products: Array<Pick<ProductRecord, "sellerId">>) {
    const names = new Map<string, string | null>();
    for (const { sellerId } of products) {
      if (!names.has(sellerId)) {
        names.set(sellerId, await this.sellerBusinessName({ sellerId }));
      }
    }
    return names;
  }

  private async removeProduct(productId: string) {
    const images = await this.repositories.productImages.deleteWhere({ productId });
    await this.repositories.products.deleteWhere({ id: productId });
    return images;
  }

  private async assertParent(parentId: string | null, categoryId?: CategoryRecord["id"]) {
    if (parentId === null) {
      return;
    }
    if (parentId === categoryId) {
      throw new ValidationError("A category cannot be its own parent", { fields: { parentId } });
    }
    if (!(await this.repositories.categories.findById(parentId))) {
      throw new ValidationError("Parent category does not exist", { fields: { parentId } });
    }
  }

  private async assertCategory(categoryId: string) {
    if (!(await this.repositories.categories.findById(categoryId))) {
      throw new ValidationError("Category does not exist", { fields: { categoryId } });
    }
  }

  private async assertSeller(sellerId: string) {
    if (!(await this.repositories.sellerProfiles.findById(sellerId))) {
      throw new ValidationError("Seller profile does not exist", { fields: { sellerId } });
    }
  }
}
