import {
  LIMITS,
  USER_TYPE_LABELS,
  buyerProfileCreateSchema,
  buyerProfileUpdateSchema,
  sellerProfileCreateSchema,
  sellerProfileUpdateSchema,
  userFieldsSchema,
  userUpdateSchema,
  type BuyerProfileCreateRequest,
  type BuyerProfileUpdateRequest,
  type SellerProfileCreateRequest,
  type SellerProfileUpdateRequest,
  type UserExtraFields,
  type UserType,
  type UserUpdateRequest
} from "@produce-market/shared-types";
import { ConfigurationError, NotFoundError, UniquenessViolation, ValidationError } from "../lib/errors.js";
import { parseInput } from "../lib/validation.js";
import type { Repositories, SellerProfileRecord, UserRecord } from "../repositories/types.js";
import type { PasswordHasher } from "../utils/hash.js";
import type { DeletionSummary, SellerInventory } from "./catalog.js";

export type AccountRepositories = Pick<Repositories, "users" | "sellerProfiles" | "buyerProfiles">;

export type UserListQuery = {
  search?: string;
  userType?: UserType;
  isStaff?: boolean;
  isActive?: boolean;
};

export type SellerProfileListQuery = {
  search?: string;
  isVerifiedSeller?: boolean;
};

export type AccountDeletionSummary = DeletionSummary & {
  users: number;
  sellerProfiles: number;
  buyerProfiles: number;
};

type UserNames = Pick<UserRecord, "firstName" | "lastName">;

/** Lowercases the domain part of an address; the local part is kept as typed. */
export function normalizeEmail(email: string) {
  const trimmed = email.trim();
  const at = trimmed.lastIndexOf("@");
  if (at === -1) {
    return email;
  }
  return `${trimmed.slice(0, at)}@${trimmed.slice(at + 1).toLowerCase()}`;
}

export function isBuyer(user: Pick<UserRecord, "userType">) {
  return user.userType === "buyer";
}

export function isSeller(user: Pick<UserRecord, "userType">) {
  return user.userType === "seller";
}

export function getFullName(user: UserNames) {
  return `${user.firstName} ${user.lastName}`.trim();
}

export function getShortName(user: UserNames) {
  return user.firstName;
}

export function describeUser(user: Pick<UserRecord, "email" | "userType">) {
  return `${user.email} (${USER_TYPE_LABELS[user.userType]})`;
}

export function describeSeller(profile: Pick<SellerProfileRecord, "businessName">, user: Pick<UserRecord, "email">) {
  return `${profile.businessName} - ${user.email}`;
}

export function describeBuyer(user: UserNames) {
  return `${getFullName(user)} - Buyer`;
}

export function hasUsablePassword(user: Pick<UserRecord, "passwordHash">) {
  return user.passwordHash !== null;
}

export class AccountService {
  constructor(
    private readonly repositories: AccountRepositories,
    private readonly hasher: PasswordHasher,
    private readonly inventory: SellerInventory
  ) {}

  async createUser(email: string | null | undefined, password?: string | null, extraFields: UserExtraFields = {}) {
    if (!email || !email.trim()) {
      throw new ValidationError("Users must have an email address", { fields: { email: "This field is required" } });
    }

    const normalizedEmail = normalizeEmail(email);
    if (normalizedEmail.length > LIMITS.email) {
      throw new ValidationError("Invalid user payload", { fields: { email: `Ensure this value has at most ${LIMITS.email} characters` } });
    }

    const fields = parseInput(userFieldsSchema, extraFields, "Invalid user payload");
    const passwordHash = password === null || password === undefined ? null : await this.hasher.hash(password);

    return this.repositories.users.create({
      ...fields,
      email: normalizedEmail,
      passwordHash,
      lastLogin: null
    });
  }

  /** Creates a staff superuser; passing `isStaff` or `isSuperuser` as anything but true is a contradiction. */
  async createSuperuser(email: string | null | undefined, password?: string | null, extraFields: UserExtraFields = {}) {
    const fields: UserExtraFields = {
      ...extraFields,
      isStaff: extraFields.isStaff ?? true,
      isSuperuser: extraFields.isSuperuser ?? true,
      isActive: extraFields.isActive ?? true
    };

    if (fields.isStaff !== true) {
      throw new ConfigurationError("Superuser must have isStaff=true.");
    }
    if (fields.isSuperuser !== true) {
      throw new ConfigurationError("Superuser must have isSuperuser=true.");
    }

    return this.createUser(email, password, fields);
  }

  async getUser(id: string) {
    const user = await this.repositories.users.findById(id);
    if (!user) {
      throw new NotFoundError("User", id);
    }
    return user;
  }

  async listUsers(query: UserListQuery = {}) {
    return this.repositories.users.list({
      where: { userType: query.userType, isStaff: query.isStaff, isActive: query.isActive },
      search: query.search ? { term: query.search, fields: ["email", "firstName", "lastName"] } : undefined,
      orderBy: { field: "dateJoined", direction: "desc" }
    });
  }

  async updateUser(id: string, changes: UserUpdateRequest) {
    const existing = await this.getUser(id);
    const { email, ...fields } = parseInput(userUpdateSchema, changes, "Invalid user payload");
    const updated = await this.repositories.users.update(existing.id, {
      ...fields,
      ...(email === undefined ? {} : { email: normalizeEmail(email) })
    });
    if (!updated) {
      throw new NotFoundError("User", id);
    }
    return updated;
  }

  /** A null password leaves the account without a usable password. */
  async setPassword(id: string, password: string | null) {
    const existing = await this.getUser(id);
    const passwordHash = password === null ? null : await this.hasher.hash(password);
    const updated = await this.repositories.users.update(existing.id, { passwordHash });
    if (!updated) {
      throw new NotFoundError("User", id);
    }
    return updated;
  }

  async checkPassword(user: Pick<UserRecord, "passwordHash">, password: string) {
    return this.hasher.verify(password, user.passwordHash);
  }

  async deleteUser(id: string): Promise<AccountDeletionSummary> {
    const user = await this.getUser(id);
    const summary: AccountDeletionSummary = {
      users: 0,
      sellerProfiles: 0,
      buyerProfiles: 0,
      categories: 0,
      products: 0,
      images: 0
    };

    if (await this.repositories.sellerProfiles.findById(user.id)) {
      const removed = await this.deleteSellerProfile(user.id);
      summary.sellerProfiles = removed.sellerProfiles;
      summary.products = removed.products;
      summary.images = removed.images;
    }
    summary.buyerProfiles = await this.repositories.buyerProfiles.deleteWhere({ id: user.id });
    summary.users = await this.repositories.users.deleteWhere({ id: user.id });
    return summary;
  }

  async createSellerProfile(userId: string, input: SellerProfileCreateRequest) {
    const user = await this.getUser(userId);
    const fields = parseInput(sellerProfileCreateSchema, input, "Invalid seller profile payload");
    if (await this.repositories.sellerProfiles.findById(user.id)) {
      throw new UniquenessViolation("Seller profile", "user", user.id);
    }
    return this.repositories.sellerProfiles.create({ ...fields, id: user.id });
  }

  async getSellerProfile(userId: string) {
    const profile = await this.repositories.sellerProfiles.findById(userId);
    if (!profile) {
      throw new NotFoundError("Seller profile", userId);
    }
    return profile;
  }

  async listSellerProfiles(query: SellerProfileListQuery = {}) {
    return this.repositories.sellerProfiles.list({
      where: { isVerifiedSeller: query.isVerifiedSeller },
      search: query.search ? { term: query.search, fields: ["businessName"] } : undefined,
      orderBy: { field: "businessName", direction: "asc" }
    });
  }

  async updateSellerProfile(userId: string, changes: SellerProfileUpdateRequest) {
    const existing = await this.getSellerProfile(userId);
    const fields = parseInput(sellerProfileUpdateSchema, changes, "Invalid seller profile payload");
    const updated = await this.repositories.sellerProfiles.update(existing.id, fields);
    if (!updated) {
      throw new NotFoundError("Seller profile", userId);
    }
    return updated;
  }

  async verifySeller(userId: string, verifiedAt = new Date()) {
    const existing = await this.getSellerProfile(userId);
    const updated = await this.repositories.sellerProfiles.update(existing.id, {
      isVerifiedSeller: true,
      verificationDate: verifiedAt
    });
    if (!updated) {
      throw new NotFoundError("Seller profile", userId);
    }
    return updated;
  }

  /** Removes the profile together with every product it sells. */
  async deleteSellerProfile(userId: string) {
    const profile = await this.getSellerProfile(userId);
    const removed = await this.inventory.removeSellerProducts(profile.id);
    const sellerProfiles = await this.repositories.sellerProfiles.deleteWhere({ id: profile.id });
    return { ...removed, sellerProfiles };
  }

  async createBuyerProfile(userId: string, input: BuyerProfileCreateRequest) {
    const user = await this.getUser(userId);
    const fields = parseInput(buyerProfileCreateSchema, input, "Invalid buyer profile payload");
    if (await this.repositories.buyerProfiles.findById(user.id)) {
      throw new UniquenessViolation("Buyer profile", "user", user.id);
    }
    return this.repositories.buyerProfiles.create({ ...fields, id: user.id });
  }

  async getBuyerProfile(userId: string) {
    const profile = await this.repositories.buyerProfiles.findById(userId);
    if (!profile) {
      throw new NotFoundError("Buyer profile", userId);
    }
    return profile;
  }

  async updateBuyerProfile(userId: string, changes: BuyerProfileUpdateRequest) {
    const existing = await this.getBuyerProfile(userId);
    const fields = parseInput(buyerProfileUpdateSchema, changes, "Invalid buyer profile payload");
    const updated = await this.repositories.buyerProfiles.update(existing.id, fields);
    if (!updated) {
      throw new NotFoundError("Buyer profile", userId);
    }
    return updated;
  }

  async deleteBuyerProfile(userId: string) {
    const profile = await this.getBuyerProfile(userId);
    return this.repositories.buyerProfiles.deleteWhere({ id: profile.id });
  }
}
