import { Schema, model } from "mongoose";
import { DECIMALS, LIMITS, PHONE_ERROR_MESSAGE, PHONE_PATTERN, USER_TYPES, maxDecimalValue } from "@produce-market/shared-types";

const userSchema = new Schema(
  {
    email: { type: String, required: true, trim: true, maxlength: LIMITS.email, unique: true },
    passwordHash: { type: String, default: null },
    userType: { type: String, enum: [...USER_TYPES], required: true, index: true },
    firstName: { type: String, trim: true, maxlength: LIMITS.name, default: "" },
    lastName: { type: String, trim: true, maxlength: LIMITS.name, default: "" },
    phoneNumber: { type: String, maxlength: LIMITS.phone, match: [PHONE_PATTERN, PHONE_ERROR_MESSAGE], default: null },
    profilePicture: { type: String, default: null },
    address: { type: String, maxlength: LIMITS.address, default: "" },
    city: { type: String, maxlength: LIMITS.city, default: "", index: true },
    state: { type: String, maxlength: LIMITS.state, default: "" },
    isActive: { type: Boolean, default: true },
    isStaff: { type: Boolean, default: false },
    isSuperuser: { type: Boolean, default: false },
    isVerified: { type: Boolean, default: false },
    dateJoined: { type: Date, default: Date.now },
    lastLogin: { type: Date, default: null }
  },
  { timestamps: { createdAt: false, updatedAt: true } }
);

userSchema.index({ email: 1, userType: 1 });
userSchema.index({ userType: 1, isActive: 1 });
userSchema.index({ city: 1, userType: 1 });

// Both profiles reuse the owning user's _id.
const sellerProfileSchema = new Schema(
  {
    _id: { type: Schema.Types.ObjectId, ref: "User", required: true },
    businessName: { type: String, required: true, trim: true, maxlength: LIMITS.businessName, unique: true },
    businessDescription: { type: String, default: "" },
    businessLogo: { type: String, default: null },
    taxId: { type: String, maxlength: LIMITS.taxId, default: "" },
    businessLicense: { type: String, maxlength: LIMITS.businessLicense, default: "" },
    bankAccountName: { type: String, maxlength: LIMITS.businessName, default: "" },
    bankAccountNumber: { type: String, maxlength: LIMITS.bankAccount, default: "" },
    bankName: { type: String, maxlength: LIMITS.bankName, default: "" },
    bankRoutingNumber: { type: String, maxlength: LIMITS.bankRouting, default: "" },
    rating: { type: Number, min: 0, max: maxDecimalValue(DECIMALS.rating), default: 0 },
    totalSales: { type: Number, min: 0, default: 0 },
    totalRevenue: { type: Number, min: 0, max: maxDecimalValue(DECIMALS.revenue), default: 0 },
    isVerifiedSeller: { type: Boolean, default: false },
    verificationDate: { type: Date, default: null }
  },
  { timestamps: true }
);

sellerProfileSchema.index({ rating: 1, isVerifiedSeller: 1 });

const buyerProfileSchema = new Schema(
  {
    _id: { type: Schema.Types.ObjectId, ref: "User", required: true },
    preferredCategories: { type: [{ type: Schema.Types.ObjectId, ref: "Category" }], default: [] },
    totalOrders: { type: Number, min: 0, default: 0 },
    totalSpent: { type: Number, min: 0, max: maxDecimalValue(DECIMALS.revenue), default: 0 },
    loyaltyPoints: { type: Number, min: 0, default: 0 }
  },
  { timestamps: true }
);

export const UserModel = model("User", userSchema);
export const SellerProfileModel = model("SellerProfile", sellerProfileSchema);
export const BuyerProfileModel = model("BuyerProfile", buyerProfileSchema);
