import type { Repositories } from "../repositories/types.js";
import { createBcryptHasher, type PasswordHasher } from "../utils/hash.js";
import { AccountService } from "./accounts.js";
import { CatalogService } from "./catalog.js";

export type Services = {
  catalog: CatalogService;
  accounts: AccountService;
};

export type ServiceOptions = {
  hasher?: PasswordHasher;
  saltRounds?: number;
};

export function createServices(repositories: Repositories, options: ServiceOptions = {}): Services {
  const catalog = new CatalogService(repositories);
  const hasher = options.hasher ?? createBcryptHasher(options.saltRounds);
  const accounts = new AccountService(repositories, hasher, catalog);
  return { catalog, accounts };
}
