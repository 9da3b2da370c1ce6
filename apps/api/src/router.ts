import { Router } from "express";
import { createAdminAccountsRouter } from "./modules/adminAccounts.js";
import { createAdminCatalogRouter } from "./modules/adminCatalog.js";
import { createCategoriesRouter, createProductsRouter } from "./modules/catalog.js";
import type { Services } from "./services/index.js";

export function createRouter(services: Services) {
  const router = Router();

  router.use("/products", createProductsRouter(services.catalog));
  router.use("/categories", createCategoriesRouter(services.catalog));
  router.use("/admin", createAdminCatalogRouter(services.catalog));
  router.use("/admin", createAdminAccountsRouter(services.accounts));

  return router;
}
