import type { CategoryFields, ProductFields, ProductImageFields } from "@produce-market/shared-types";
import { UniquenessViolation } from "../../src/lib/errors.js";
import type {
  BuyerProfileInput,
  BuyerProfileRecord,
  CategoryRecord,
  ListOptions,
  ProductImageRecord,
  ProductRecord,
  Repositories,
  Repository,
  SellerProfileInput,
  SellerProfileRecord,
  UserInput,
  UserRecord,
  Where
} from "../../src/repositories/types.js";

export type Clock = {
  now(): Date;
  nextId(): string;
};

/** Every reading is one second after the previous one, so orderings by timestamp are strict. */
export function createClock(start = new Date("2024-01-01T00:00:00.000Z")): Clock {
  let ticks = 0;
  let ids = 0;
  return {
    now: () => new Date(start.getTime() + ticks++ * 1000),
    nextId: () => (++ids).toString(16).padStart(24, "0")
  };
}

type MemoryRepositoryOptions<TRecord, TInput> = {
  entity: string;
  unique: Array<keyof TRecord & string>;
  clock: Clock;
  build(input: TInput, id: string, now: Date): TRecord;
  apply(record: TRecord, changes: Partial<TInput>, now: Date): TRecord;
};

function readField(record: object, field: string): unknown {
  return Reflect.get(record, field);
}

function sameValue(left: unknown, right: unknown) {
  if (left instanceof Date && right instanceof Date) {
    return left.getTime() === right.getTime();
  }
  return left === right;
}

function compareValues(left: unknown, right: unknown) {
  const a = left instanceof Date ? left.getTime() : left;
  const b = right instanceof Date ? right.getTime() : right;
  if (typeof a === "number" && typeof b === "number") {
    return a - b;
  }
  const x = String(a);
  const y = String(b);
  return x < y ? -1 : x > y ? 1 : 0;
}

function matches<TRecord extends object>(record: TRecord, where: Where<TRecord> = {}) {
  return Object.entries(where).every(([field, expected]) => {
    const value: unknown = expected;
    return value === undefined || sameValue(readField(record, field), value);
  });
}

/** In-process stand-in for the mongoose repositories, including their unique indexes. */
export class MemoryRepository<TRecord extends { id: string }, TInput> implements Repository<TRecord, TInput> {
  private readonly rows = new Map<string, TRecord>();

  constructor(private readonly options: MemoryRepositoryOptions<TRecord, TInput>) {}

  get size() {
    return this.rows.size;
  }

  async findById(id: string) {
    const row = this.rows.get(id);
    return row ? structuredClone(row) : null;
  }

  async findOne(where: Where<TRecord>) {
    const row = [...this.rows.values()].find((candidate) => matches(candidate, where));
    return row ? structuredClone(row) : null;
  }

  async exists(where: Where<TRecord>, excludeId?: string) {
    return [...this.rows.values()].some((row) => row.id !== excludeId && matches(row, where));
  }

  async list(options: ListOptions<TRecord> = {}) {
    const term = options.search?.term.trim().toLowerCase();
    const searchFields = options.search?.fields ?? [];
    let rows = [...this.rows.values()].filter((row) => matches(row, options.where));
    if (term) {
      rows = rows.filter((row) =>
        searchFields.some((field) => {
          const value = readField(row, field);
          return typeof value === "string" && value.toLowerCase().includes(term);
        })
      );
    }

    const orderBy = options.orderBy;
    if (orderBy) {
      const direction = orderBy.direction === "asc" ? 1 : -1;
      rows.sort((left, right) => direction * compareValues(readField(left, orderBy.field), readField(right, orderBy.field)));
    }
    return rows.map((row) => structuredClone(row));
  }

  async create(input: TInput) {
    const record = this.options.build(input, this.options.clock.nextId(), this.options.clock.now());
    if (this.rows.has(record.id)) {
      throw new UniquenessViolation(this.options.entity, "id", record.id);
    }
    this.assertUnique(record);
    this.rows.set(record.id, structuredClone(record));
    return structuredClone(record);
  }

  async update(id: string, changes: Partial<TInput>) {
    const existing = this.rows.get(id);
    if (!existing) {
      return null;
    }
    const record = this.options.apply(existing, changes, this.options.clock.now());
    this.assertUnique(record);
    this.rows.set(id, structuredClone(record));
    return structuredClone(record);
  }

  async deleteWhere(where: Where<TRecord>) {
    let deleted = 0;
    for (const row of [...this.rows.values()]) {
      if (matches(row, where)) {
        this.rows.delete(row.id);
        deleted += 1;
      }
    }
    return deleted;
  }

  private assertUnique(record: TRecord) {
    for (const field of this.options.unique) {
      const value = readField(record, field);
      const clash = [...this.rows.values()].some((row) => row.id !== record.id && sameValue(readField(row, field), value));
      if (clash) {
        throw new UniquenessViolation(this.options.entity, field, value);
      }
    }
  }
}

export type MemoryRepositories = {
  categories: MemoryRepository<CategoryRecord, CategoryFields>;
  products: MemoryRepository<ProductRecord, ProductFields>;
  productImages: MemoryRepository<ProductImageRecord, ProductImageFields & { productId: string }>;
  users: MemoryRepository<UserRecord, UserInput>;
  sellerProfiles: MemoryRepository<SellerProfileRecord, SellerProfileInput>;
  buyerProfiles: MemoryRepository<BuyerProfileRecord, BuyerProfileInput>;
};

export function createMemoryRepositories(clock = createClock()): MemoryRepositories & Repositories {
  return {
    categories: new MemoryRepository<CategoryRecord, CategoryFields>({
      entity: "Category",
      unique: ["name", "slug"],
      clock,
      build: (input, id, now) => ({ ...input, id, createdAt: now, updatedAt: now }),
      apply: (record, changes, now) => ({ ...record, ...changes, updatedAt: now })
    }),
    products: new MemoryRepository<ProductRecord, ProductFields>({
      entity: "Product",
      unique: ["slug", "sku"],
      clock,
      build: (input, id, now) => ({ ...input, id, createdAt: now, updatedAt: now }),
      apply: (record, changes, now) => ({ ...record, ...changes, updatedAt: now })
    }),
    productImages: new MemoryRepository<ProductImageRecord, ProductImageFields & { productId: string }>({
      entity: "Product image",
      unique: [],
      clock,
      build: (input, id, now) => ({ ...input, id, createdAt: now }),
      apply: (record, changes) => ({ ...record, ...changes })
    }),
    users: new MemoryRepository<UserRecord, UserInput>({
      entity: "User",
      unique: ["email"],
      clock,
      build: (input, id, now) => ({ ...input, id, dateJoined: now, updatedAt: now }),
      apply: (record, changes, now) => ({ ...record, ...changes, updatedAt: now })
    }),
    sellerProfiles: new MemoryRepository<SellerProfileRecord, SellerProfileInput>({
      entity: "Seller profile",
      unique: ["businessName"],
      clock,
      build: (input, _id, now) => ({ ...input, createdAt: now, updatedAt: now }),
      apply: (record, changes, now) => ({ ...record, ...changes, id: record.id, updatedAt: now })
    }),
    buyerProfiles: new MemoryRepository<BuyerProfileRecord, BuyerProfileInput>({
      entity: "Buyer profile",
      unique: [],
      clock,
      build: (input, _id, now) => ({ ...input, createdAt: now, updatedAt: now }),
      apply: (record, changes, now) => ({ ...record, ...changes, id: record.id, updatedAt: now })
    })
  };
}
