import type { Types } from "mongoose";
import type { UserType } from "@produce-market/shared-types";
import { BuyerProfileModel, SellerProfileModel, UserModel } from "../models/user.js";
import { isObjectId } from "../utils/ids.js";
import { toFilter, toListQuery, translateWriteError } from "./mongoQuery.js";
import type {
  BuyerProfileInput,
  BuyerProfileRecord,
  BuyerProfileRepository,
  ListOptions,
  SellerProfileInput,
  SellerProfileRecord,
  SellerProfileRepository,
  UserInput,
  UserRecord,
  UserRepository,
  Where
} from "./types.js";

type UserLean = {
  _id: Types.ObjectId;
  email: string;
  passwordHash: string | null;
  userType: UserType;
  firstName: string;
  lastName: string;
  phoneNumber: string | null;
  profilePicture: string | null;
  address: string;
  city: string;
  state: string;
  isActive: boolean;
  isStaff: boolean;
  isSuperuser: boolean;
  isVerified: boolean;
  dateJoined: Date;
  lastLogin: Date | null;
  updatedAt: Date;
};

type SellerProfileLean = {
  _id: Types.ObjectId;
  businessName: string;
  businessDescription: string;
  businessLogo: string | null;
  taxId: string;
  businessLicense: string;
  bankAccountName: string;
  bankAccountNumber: string;
  bankName: string;
  bankRoutingNumber: string;
  rating: number;
  totalSales: number;
  totalRevenue: number;
  isVerifiedSeller: boolean;
  verificationDate: Date | null;
  createdAt: Date;
  updatedAt: Date;
};

type BuyerProfileLean = {
  _id: Types.ObjectId;
  preferredCategories: Types.ObjectId[];
  totalOrders: number;
  totalSpent: number;
  loyaltyPoints: number;
  createdAt: Date;
  updatedAt: Date;
};

function toUserRecord(doc: UserLean): UserRecord {
  return {
    id: doc._id.toString(),
    email: doc.email,
    passwordHash: doc.passwordHash ?? null,
    userType: doc.userType,
    firstName: doc.firstName ?? "",
    lastName: doc.lastName ?? "",
    phoneNumber: doc.phoneNumber ?? null,
    profilePicture: doc.profilePicture ?? null,
    address: doc.address ?? "",
    city: doc.city ?? "",
    state: doc.state ?? "",
    isActive: doc.isActive,
    isStaff: doc.isStaff,
    isSuperuser: doc.isSuperuser,
    isVerified: doc.isVerified,
    dateJoined: doc.dateJoined,
    lastLogin: doc.lastLogin ?? null,
    updatedAt: doc.updatedAt
  };
}

function toSellerProfileRecord(doc: SellerProfileLean): SellerProfileRecord {
  return {
    id: doc._id.toString(),
    businessName: doc.businessName,
    businessDescription: doc.businessDescription,
    businessLogo: doc.businessLogo ?? null,
    taxId: doc.taxId,
    businessLicense: doc.businessLicense,
    bankAccountName: doc.bankAccountName,
    bankAccountNumber: doc.bankAccountNumber,
    bankName: doc.bankName,
    bankRoutingNumber: doc.bankRoutingNumber,
    rating: doc.rating,
    totalSales: doc.totalSales,
    totalRevenue: doc.totalRevenue,
    isVerifiedSeller: doc.isVerifiedSeller,
    verificationDate: doc.verificationDate ?? null,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt
  };
}

function toBuyerProfileRecord(doc: BuyerProfileLean): BuyerProfileRecord {
  return {
    id: doc._id.toString(),
    preferredCategories: doc.preferredCategories.map((categoryId) => categoryId.toString()),
    totalOrders: doc.totalOrders,
    totalSpent: doc.totalSpent,
    loyaltyPoints: doc.loyaltyPoints,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt
  };
}

export class MongoUserRepository implements UserRepository {
  async findById(id: string) {
    if (!isObjectId(id)) {
      return null;
    }
    const doc = await UserModel.findById(id).lean<UserLean | null>();
    return doc ? toUserRecord(doc) : null;
  }

  async findOne(where: Where<UserRecord>) {
    const doc = await UserModel.findOne(toFilter(UserModel.schema, where)).lean<UserLean | null>();
    return doc ? toUserRecord(doc) : null;
  }

  async exists(where: Where<UserRecord>, excludeId?: string) {
    return (await UserModel.exists(toFilter(UserModel.schema, where, excludeId))) !== null;
  }

  async list(options?: ListOptions<UserRecord>) {
    const { filter, sort } = toListQuery(UserModel.schema, options);
    const docs = await UserModel.find(filter).sort(sort).lean<UserLean[]>();
    return docs.map(toUserRecord);
  }

  async create(input: UserInput) {
    try {
      const created = await UserModel.create(input);
      return toUserRecord(created.toObject<UserLean>());
    } catch (error) {
      return translateWriteError("User", error);
    }
  }

  async update(id: string, changes: Partial<UserInput>) {
    if (!isObjectId(id)) {
      return null;
    }
    try {
      const doc = await UserModel.findByIdAndUpdate(id, { $set: changes }, { new: true, runValidators: true }).lean<UserLean | null>();
      return doc ? toUserRecord(doc) : null;
    } catch (error) {
      return translateWriteError("User", error);
    }
  }

  async deleteWhere(where: Where<UserRecord>) {
    const result = await UserModel.deleteMany(toFilter(UserModel.schema, where));
    return result.deletedCount;
  }
}

export class MongoSellerProfileRepository implements SellerProfileRepository {
  async findById(id: string) {
    if (!isObjectId(id)) {
      return null;
    }
    const doc = await SellerProfileModel.findById(id).lean<SellerProfileLean | null>();
    return doc ? toSellerProfileRecord(doc) : null;
  }

  async findOne(where: Where<SellerProfileRecord>) {
    const doc = await SellerProfileModel.findOne(toFilter(SellerProfileModel.schema, where)).lean<SellerProfileLean | null>();
    return doc ? toSellerProfileRecord(doc) : null;
  }

  async exists(where: Where<SellerProfileRecord>, excludeId?: string) {
    return (await SellerProfileModel.exists(toFilter(SellerProfileModel.schema, where, excludeId))) !== null;
  }

  async list(options?: ListOptions<SellerProfileRecord>) {
    const { filter, sort } = toListQuery(SellerProfileModel.schema, options);
    const docs = await SellerProfileModel.find(filter).sort(sort).lean<SellerProfileLean[]>();
    return docs.map(toSellerProfileRecord);
  }

  async create({ id, ...fields }: SellerProfileInput) {
    try {
      const created = await SellerProfileModel.create({ _id: id, ...fields });
      return toSellerProfileRecord(created.toObject<SellerProfileLean>());
    } catch (error) {
      return translateWriteError("Seller profile", error);
    }
  }

  async update(id: string, changes: Partial<SellerProfileInput>) {
    if (!isObjectId(id)) {
      return null;
    }
    const { id: _ignored, ...fields } = changes;
    try {
      const doc = await SellerProfileModel.findByIdAndUpdate(id, { $set: fields }, { new: true, runValidators: true }).lean<SellerProfileLean | null>();
      return doc ? toSellerProfileRecord(doc) : null;
    } catch (error) {
      return translateWriteError("Seller profile", error);
    }
  }

  async deleteWhere(where: Where<SellerProfileRecord>) {
    const result = await SellerProfileModel.deleteMany(toFilter(SellerProfileModel.schema, where));
    return result.deletedCount;
  }
}

export class MongoBuyerProfileRepository implements BuyerProfileRepository {
  async findById(id: string) {
    if (!isObjectId(id)) {
      return null;
    }
    const doc = await BuyerProfileModel.findById(id).lean<BuyerProfileLean | null>();
    return doc ? toBuyerProfileRecord(doc) : null;
  }

  async findOne(where: Where<BuyerProfileRecord>) {
    const doc = await BuyerProfileModel.findOne(toFilter(BuyerProfileModel.schema, where)).lean<BuyerProfileLean | null>();
    return doc ? toBuyerProfileRecord(doc) : null;
  }

  async exists(where: Where<BuyerProfileRecord>, excludeId?: string) {
    return (await BuyerProfileModel.exists(toFilter(BuyerProfileModel.schema, where, excludeId))) !== null;
  }

  async list(options?: ListOptions<BuyerProfileRecord>) {
    const { filter, sort } = toListQuery(BuyerProfileModel.schema, options);
    const docs = await BuyerProfileModel.find(filter).sort(sort).lean<BuyerProfileLean[]>();
    return docs.map(toBuyerProfileRecord);
  }

  async create({ id, ...fields }: BuyerProfileInput) {
    try {
      const created = await BuyerProfileModel.create({ _id: id, ...fields });
      return toBuyerProfileRecord(created.toObject<BuyerProfileLean>());
    } catch (error) {
      return translateWriteError("Buyer profile", error);
    }
  }

  async update(id: string, changes: Partial<BuyerProfileInput>) {
    if (!isObjectId(id)) {
      return null;
    }
    const { id: _ignored, ...fields } = changes;
    try {
      const doc = await BuyerProfileModel.findByIdAndUpdate(id, { $set: fields }, { new: true, runValidators: true }).lean<BuyerProfileLean | null>();
      return doc ? toBuyerProfileRecord(doc) : null;
    } catch (error) {
      return translateWriteError("Buyer profile", error);
    }
  }

  async deleteWhere(where: Where<BuyerProfileRecord>) {
    const result = await BuyerProfileModel.deleteMany(toFilter(BuyerProfileModel.schema, where));
    return result.deletedCount;
  }
}
