import type {
  BuyerProfileFields,
  CategoryFields,
  ProductFields,
  ProductImageFields,
  SellerProfileFields,
  UserFields
} from "@produce-market/shared-types";

export type Timestamps = {
  createdAt: Date;
  updatedAt: Date;
};

export type CategoryRecord = CategoryFields & Timestamps & { id: string };
export type ProductRecord = ProductFields & Timestamps & { id: string };
export type ProductImageRecord = ProductImageFields & { id: string; productId: string; createdAt: Date };

export type UserInput = UserFields & {
  email: string;
  passwordHash: string | null;
  lastLogin: Date | null;
};
export type UserRecord = UserInput & { id: string; dateJoined: Date; updatedAt: Date };

// Profiles share their id with the owning user.
export type SellerProfileInput = SellerProfileFields & { id: string };
export type SellerProfileRecord = SellerProfileInput & Timestamps;
export type BuyerProfileInput = BuyerProfileFields & { id: string };
export type BuyerProfileRecord = BuyerProfileInput & Timestamps;

export type Where<TRecord> = { [K in keyof TRecord]?: TRecord[K] };

export type ListOptions<TRecord> = {
  where?: Where<TRecord>;
  search?: { term: string; fields: Array<keyof TRecord & string> };
  orderBy?: { field: keyof TRecord & string; direction: "asc" | "desc" };
};

export interface Repository<TRecord extends { id: string }, TInput> {
  findById(id: string): Promise<TRecord | null>;
  findOne(where: Where<TRecord>): Promise<TRecord | null>;
  /** True when a record matches, ignoring the record whose id is `excludeId`. */
  exists(where: Where<TRecord>, excludeId?: string): Promise<boolean>;
  list(options?: ListOptions<TRecord>): Promise<TRecord[]>;
  create(input: TInput): Promise<TRecord>;
  update(id: string, changes: Partial<TInput>): Promise<TRecord | null>;
  deleteWhere(where: Where<TRecord>): Promise<number>;
}

export type CategoryRepository = Repository<CategoryRecord, CategoryFields>;
export type ProductRepository = Repository<ProductRecord, ProductFields>;
export type ProductImageRepository = Repository<ProductImageRecord, ProductImageFields & { productId: string }>;
export type UserRepository = Repository<UserRecord, UserInput>;
export type SellerProfileRepository = Repository<SellerProfileRecord, SellerProfileInput>;
export type BuyerProfileRepository = Repository<BuyerProfileRecord, BuyerProfileInput>;

export type Repositories = {
  categories: CategoryRepository;
  products: ProductRepository;
  productImages: ProductImageRepository;
  users: UserRepository;
  sellerProfiles: SellerProfileRepository;
  buyerProfiles: BuyerProfileRepository;
};
