import { beforeEach, describe, expect, it } from "vitest";
import { sellerProfileCreateSchema } from "@produce-market/shared-types";
import { NotFoundError, UniquenessViolation, ValidationError } from "../src/lib/errors.js";
import type { CategoryRecord, SellerProfileRecord } from "../src/repositories/types.js";
import { CatalogService } from "../src/services/catalog.js";
import { createMemoryRepositories, type MemoryRepositories } from "./support/memoryRepository.js";

describe("CatalogService", () => {
  let repositories: MemoryRepositories;
  let catalog: CatalogService;
  let seller: SellerProfileRecord;
  let fruit: CategoryRecord;

  function productInput(name: string, sku: string) {
    return { sellerId: seller.id, categoryId: fruit.id, name, sku, price: 4.5 };
  }

  beforeEach(async () => {
    repositories = createMemoryRepositories();
    catalog = new CatalogService(repositories);
    seller = await repositories.sellerProfiles.create({
      ...sellerProfileCreateSchema.parse({ businessName: "Green Acres" }),
      id: "seller-1"
    });
    fruit = await catalog.createCategory({ name: "Fruit" });
  });

  describe("categories", () => {
    it("derives the slug from the name", async () => {
      expect(fruit.slug).toBe("fruit");
      expect(fruit.parentId).toBeNull();
      expect(fruit.isActive).toBe(true);
    });

    it("does not suffix a colliding category slug", async () => {
      await expect(catalog.createCategory({ name: "Fruit!" })).rejects.toMatchObject({
        name: "UniquenessViolation",
        field: "slug"
      });
    });

    it("rejects a missing parent", async () => {
      await expect(catalog.createCategory({ name: "Berries", parentId: "missing" })).rejects.toBeInstanceOf(ValidationError);
    });

    it("rejects a category as its own parent", async () => {
      await expect(catalog.updateCategory(fruit.id, { parentId: fruit.id })).rejects.toThrow("A category cannot be its own parent");
    });

    it("re-derives an emptied slug from the new name", async () => {
      const updated = await catalog.updateCategory(fruit.id, { name: "Stone Fruit", slug: "" });
      expect(updated.slug).toBe("stone-fruit");
    });

    it("finds a category by id or slug", async () => {
      await expect(catalog.findCategory(fruit.id)).resolves.toMatchObject({ name: "Fruit" });
      await expect(catalog.findCategory("fruit")).resolves.toMatchObject({ id: fruit.id });
      await expect(catalog.findCategory("vegetables")).resolves.toBeNull();
    });

    it("lists subcategories by parent", async () => {
      await catalog.createCategory({ name: "Citrus", parentId: fruit.id });
      await catalog.createCategory({ name: "Berries", parentId: fruit.id });
      await catalog.createCategory({ name: "Dairy" });

      const children = await catalog.listSubcategories(fruit.id);
      expect(children.map((child) => child.name)).toEqual(["Berries", "Citrus"]);
    });

    it("deletes descendants with their products and images", async () => {
      const citrus = await catalog.createCategory({ name: "Citrus", parentId: fruit.id });
      const lemons = await catalog.createCategory({ name: "Lemons", parentId: citrus.id });
      const dairy = await catalog.createCategory({ name: "Dairy" });

      const lemon = await catalog.createProduct({ ...productInput("Meyer Lemon", "LEM-1"), categoryId: lemons.id });
      await catalog.addProductImage(lemon.id, { image: "products/lemon-1.jpg" });
      await catalog.addProductImage(lemon.id, { image: "products/lemon-2.jpg" });
      await catalog.createProduct(productInput("Organic Apple", "APL-1"));
      const milk = await catalog.createProduct({ ...productInput("Whole Milk", "MLK-1"), categoryId: dairy.id });

      const summary = await catalog.deleteCategory(fruit.id);

      expect(summary).toEqual({ categories: 3, products: 2, images: 2 });
      expect(repositories.categories.size).toBe(1);
      expect(repositories.productImages.size).toBe(0);
      await expect(catalog.getProduct(milk.id)).resolves.toMatchObject({ name: "Whole Milk" });
    });

    it("stops at a parent cycle when deleting", async () => {
      const citrus = await catalog.createCategory({ name: "Citrus", parentId: fruit.id });
      await catalog.updateCategory(fruit.id, { parentId: citrus.id });

      await expect(catalog.deleteCategory(fruit.id)).resolves.toEqual({ categories: 2, products: 0, images: 0 });
    });
  });

  describe("products", () => {
    it("appends -1, -2 to colliding product slugs", async () => {
      const first = await catalog.createProduct(productInput("Organic Apple", "APL-1"));
      const second = await catalog.createProduct(productInput("Organic Apple", "APL-2"));
      const third = await catalog.createProduct(productInput("Organic Apple", "APL-3"));

      expect([first.slug, second.slug, third.slug]).toEqual(["organic-apple", "organic-apple-1", "organic-apple-2"]);
    });

    it("keeps its own slug when re-saved with the slug cleared", async () => {
      const apple = await catalog.createProduct(productInput("Organic Apple", "APL-1"));

      const updated = await catalog.updateProduct(apple.id, { slug: "", stockQuantity: 3 });
      expect(updated.slug).toBe("organic-apple");
      expect(updated.stockQuantity).toBe(3);
    });

    it("keeps the slug when other fields change", async () => {
      const apple = await catalog.createProduct(productInput("Organic Apple", "APL-1"));

      const updated = await catalog.updateProduct(apple.id, { name: "Gala Apple" });
      expect(updated.slug).toBe("organic-apple");
    });

    it("stores an explicit slug verbatim and lets storage reject a duplicate", async () => {
      const apple = await catalog.createProduct({ ...productInput("Organic Apple", "APL-1"), slug: "house-apple" });
      expect(apple.slug).toBe("house-apple");

      await expect(catalog.createProduct({ ...productInput("Gala Apple", "APL-2"), slug: "house-apple" })).rejects.toBeInstanceOf(
        UniquenessViolation
      );
    });

    it("rejects a duplicate sku", async () => {
      await catalog.createProduct(productInput("Organic Apple", "APL-1"));
      await expect(catalog.createProduct(productInput("Gala Apple", "APL-1"))).rejects.toThrow("Product with this sku already exists");
    });

    it("requires an existing category and seller", async () => {
      await expect(catalog.createProduct({ ...productInput("Kiwi", "KIW-1"), categoryId: "missing" })).rejects.toThrow(
        "Category does not exist"
      );
      await expect(catalog.createProduct({ ...productInput("Kiwi", "KIW-1"), sellerId: "missing" })).rejects.toThrow(
        "Seller profile does not exist"
      );
    });

    it("applies defaults and validates prices", async () => {
      const apple = await catalog.createProduct(productInput("Organic Apple", "APL-1"));
      expect(apple).toMatchObject({ discountPrice: null, stockQuantity: 0, unit: "kg", status: "available", isFeatured: false });

      await expect(catalog.createProduct({ ...productInput("Kiwi", "KIW-1"), price: -1 })).rejects.toBeInstanceOf(ValidationError);
    });

    it("lists newest first and searches name, slug and sku", async () => {
      await catalog.createProduct(productInput("Organic Apple", "APL-1"));
      await catalog.createProduct(productInput("Pear", "PR-1"));
      await catalog.createProduct(productInput("Gala Apple", "APL-2"));

      const all = await catalog.listProducts();
      expect(all.map((product) => product.name)).toEqual(["Gala Apple", "Pear", "Organic Apple"]);

      const apples = await catalog.listProducts({ search: "apl" });
      expect(apples.map((product) => product.sku)).toEqual(["APL-2", "APL-1"]);
    });

    it("looks products up by slug", async () => {
      await catalog.createProduct(productInput("Organic Apple", "APL-1"));
      await expect(catalog.getProductBySlug("organic-apple")).resolves.toMatchObject({ sku: "APL-1" });
      await expect(catalog.getProductBySlug("pear")).rejects.toBeInstanceOf(NotFoundError);
    });

    it("deletes a product with its images", async () => {
      const apple = await catalog.createProduct(productInput("Organic Apple", "APL-1"));
      await catalog.addProductImage(apple.id, { image: "products/apple.jpg", altText: "Red apple" });

      await expect(catalog.deleteProduct(apple.id)).resolves.toEqual({ categories: 0, products: 1, images: 1 });
      expect(repositories.products.size).toBe(0);
      expect(repositories.productImages.size).toBe(0);
    });

    it("removes every product of a seller", async () => {
      const apple = await catalog.createProduct(productInput("Organic Apple", "APL-1"));
      await catalog.createProduct(productInput("Pear", "PR-1"));
      await catalog.addProductImage(apple.id, { image: "products/apple.jpg" });

      await expect(catalog.removeSellerProducts(seller.id)).resolves.toEqual({ categories: 0, products: 2, images: 1 });
    });

    it("resolves the seller business name", async () => {
      const apple = await catalog.createProduct(productInput("Organic Apple", "APL-1"));
      await expect(catalog.sellerBusinessName(apple)).resolves.toBe("Green Acres");
      await expect(catalog.sellerBusinessName({ sellerId: "gone" })).resolves.toBeNull();
    });
  });

  describe("product images", () => {
    it("searches alt text and deletes single images", async () => {
      const apple = await catalog.createProduct(productInput("Organic Apple", "APL-1"));
      const red = await catalog.addProductImage(apple.id, { image: "products/red.jpg", altText: "Red apple" });
      await catalog.addProductImage(apple.id, { image: "products/green.jpg", altText: "Green apple" });

      const found = await catalog.listProductImages({ search: "red" });
      expect(found.map((image) => image.id)).toEqual([red.id]);

      await catalog.deleteProductImage(red.id);
      await expect(catalog.listProductImages({ productId: apple.id })).resolves.toHaveLength(1);
    });

    it("rejects an image for a missing product", async () => {
      await expect(catalog.addProductImage("missing", { image: "products/x.jpg" })).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
