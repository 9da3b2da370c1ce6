import { MongoBuyerProfileRepository, MongoSellerProfileRepository, MongoUserRepository } from "./accountRepositories.js";
import { MongoCategoryRepository, MongoProductImageRepository, MongoProductRepository } from "./catalogRepositories.js";
import type { Repositories } from "./types.js";

export function createMongoRepositories(): Repositories {
  return {
    categories: new MongoCategoryRepository(),
    products: new MongoProductRepository(),
    productImages: new MongoProductImageRepository(),
    users: new MongoUserRepository(),
    sellerProfiles: new MongoSellerProfileRepository(),
    buyerProfiles: new MongoBuyerProfileRepository()
  };
}

