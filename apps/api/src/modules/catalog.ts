import { Router } from "express";
import { z } from "zod";
import type { CatalogService } from "../services/catalog.js";
import { searchQuerySchema } from "../utils/query.js";
import { toCategoryRow, toProductDetail, toStorefrontProduct } from "./serializers.js";

const productFilterSchema = z.object({
  search: searchQuerySchema,
  category: searchQuerySchema
});

export function createProductsRouter(catalog: CatalogService) {
  const productsRouter = Router();

  productsRouter.get("/", async (req, res) => {
    const parsed = productFilterSchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid product filters", issues: parsed.error.issues });
      return;
    }

    let categoryId: string | undefined;
    if (parsed.data.category) {
      const category = await catalog.findCategory(parsed.data.category);
      if (!category) {
        res.json([]);
        return;
      }
      categoryId = category.id;
    }

    const products = await catalog.listProducts({ search: parsed.data.search, categoryId, status: "available" });
    res.json(products.map(toStorefrontProduct));
  });

  productsRouter.get("/:slug", async (req, res) => {
    const product = await catalog.getProductBySlug(req.params.slug);
    const images = await catalog.listProductImages({ productId: product.id });
    res.json(toProductDetail(product, images, await catalog.sellerBusinessName(product)));
  });

  return productsRouter;
}

export function createCategoriesRouter(catalog: CatalogService) {
  const categoriesRouter = Router();

  categoriesRouter.get("/", async (_req, res) => {
    const categories = await catalog.listCategories({ isActive: true });
    res.json(categories.map(({ id, name, slug, parentId }) => ({ id, name, slug, parentId })));
  });

  categoriesRouter.get("/:slug", async (req, res) => {
    const category = await catalog.findCategory(req.params.slug);
    if (!category || !category.isActive) {
      res.status(404).json({ message: "Category not found" });
      return;
    }
    const subcategories = await catalog.listSubcategories(category.id);
    res.json({ ...toCategoryRow(category), subcategories: subcategories.filter((child) => child.isActive).map(toCategoryRow) });
  });

  return categoriesRouter;
}
