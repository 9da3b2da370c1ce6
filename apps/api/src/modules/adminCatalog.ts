import { Router } from "express";
import {
  categoryCreateSchema,
  categoryUpdateSchema,
  productCreateSchema,
  productImageCreateSchema,
  productStatusSchema,
  productUpdateSchema
} from "@produce-market/shared-types";
import { z } from "zod";
import type { CatalogService } from "../services/catalog.js";
import { booleanQuerySchema, searchQuerySchema } from "../utils/query.js";
import { toAdminProductRow, toCategoryDetail, toCategoryRow, toProductDetail, toProductImage } from "./serializers.js";

const categoryFilterSchema = z.object({
  search: searchQuerySchema,
  parent: searchQuerySchema,
  isActive: booleanQuerySchema.optional()
});

const productFilterSchema = z.object({
  search: searchQuerySchema,
  category: searchQuerySchema,
  seller: searchQuerySchema,
  status: productStatusSchema.optional(),
  isFeatured: booleanQuerySchema.optional()
});

const productImageFilterSchema = z.object({
  search: searchQuerySchema,
  product: searchQuerySchema
});

export function createAdminCatalogRouter(catalog: CatalogService) {
  const adminRouter = Router();

  adminRouter.get("/categories", async (req, res) => {
    const parsed = categoryFilterSchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid category filters", issues: parsed.error.issues });
      return;
    }
    const { search, parent, isActive } = parsed.data;
    const categories = await catalog.listCategories({ search, parentId: parent, isActive });
    res.json(categories.map(toCategoryRow));
  });

  adminRouter.post("/categories", async (req, res) => {
    const parsed = categoryCreateSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid category payload", issues: parsed.error.issues });
      return;
    }
    const category = await catalog.createCategory(parsed.data);
    res.status(201).json(toCategoryDetail(category));
  });

  adminRouter.get("/categories/:id", async (req, res) => {
    const category = await catalog.getCategory(req.params.id);
    res.json(toCategoryDetail(category, await catalog.listSubcategories(category.id)));
  });

  adminRouter.patch("/categories/:id", async (req, res) => {
    const parsed = categoryUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid category payload", issues: parsed.error.issues });
      return;
    }
    const category = await catalog.updateCategory(req.params.id, parsed.data);
    res.json(toCategoryDetail(category, await catalog.listSubcategories(category.id)));
  });

  adminRouter.delete("/categories/:id", async (req, res) => {
    res.json(await catalog.deleteCategory(req.params.id));
  });

  adminRouter.get("/products", async (req, res) => {
    const parsed = productFilterSchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid product filters", issues: parsed.error.issues });
      return;
    }
    const { search, category, seller, status, isFeatured } = parsed.data;
    const products = await catalog.listProducts({ search, categoryId: category, sellerId: seller, status, isFeatured });
    const businessNames = await catalog.sellerBusinessNames(products);
    res.json(products.map((product) => toAdminProductRow(product, businessNames.get(product.sellerId) ?? null)));
  });

  adminRouter.post("/products", async (req, res) => {
    const parsed = productCreateSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid product payload", issues: parsed.error.issues });
      return;
    }
    const product = await catalog.createProduct(parsed.data);
    res.status(201).json(toProductDetail(product, [], await catalog.sellerBusinessName(product)));
  });

  adminRouter.get("/products/:id", async (req, res) => {
    const product = await catalog.getProduct(req.params.id);
    const images = await catalog.listProductImages({ productId: product.id });
    res.json(toProductDetail(product, images, await catalog.sellerBusinessName(product)));
  });

  adminRouter.patch("/products/:id", async (req, res) => {
    const parsed = productUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid product payload", issues: parsed.error.issues });
      return;
    }
    const product = await catalog.updateProduct(req.params.id, parsed.data);
    const images = await catalog.listProductImages({ productId: product.id });
    res.json(toProductDetail(product, images, await catalog.sellerBusinessName(product)));
  });

  adminRouter.delete("/products/:id", async (req, res) => {
    res.json(await catalog.deleteProduct(req.params.id));
  });

  adminRouter.post("/products/:id/images", async (req, res) => {
    const parsed = productImageCreateSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid product image payload", issues: parsed.error.issues });
      return;
    }
    const image = await catalog.addProductImage(req.params.id, parsed.data);
    res.status(201).json(toProductImage(image));
  });

  adminRouter.get("/product-images", async (req, res) => {
    const parsed = productImageFilterSchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid product image filters", issues: parsed.error.issues });
      return;
    }
    const images = await catalog.listProductImages({ search: parsed.data.search, productId: parsed.data.product });
    res.json(images.map(toProductImage));
  });

  adminRouter.delete("/product-images/:id", async (req, res) => {
    res.json(await catalog.deleteProductImage(req.params.id));
  });

  return adminRouter;
}
