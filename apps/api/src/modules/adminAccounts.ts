import { Router } from "express";
import {
  buyerProfileCreateSchema,
  buyerProfileUpdateSchema,
  sellerProfileCreateSchema,
  sellerProfileUpdateSchema,
  setPasswordSchema,
  userCreateSchema,
  userTypeSchema,
  userUpdateSchema
} from "@produce-market/shared-types";
import { z } from "zod";
import type { AccountService } from "../services/accounts.js";
import { booleanQuerySchema, searchQuerySchema } from "../utils/query.js";
import { toBuyerProfile, toSellerProfile, toUserDetail, toUserRow } from "./serializers.js";

const userFilterSchema = z.object({
  search: searchQuerySchema,
  userType: userTypeSchema.optional(),
  isStaff: booleanQuerySchema.optional(),
  isActive: booleanQuerySchema.optional()
});

// Flags stay unset unless sent so the superuser defaults apply.
const superuserCreateSchema = userCreateSchema.extend({
  isActive: z.boolean().optional(),
  isStaff: z.boolean().optional(),
  isSuperuser: z.boolean().optional()
});

const sellerProfileFilterSchema = z.object({
  search: searchQuerySchema,
  isVerifiedSeller: booleanQuerySchema.optional()
});

export function createAdminAccountsRouter(accounts: AccountService) {
  const adminRouter = Router();

  adminRouter.get("/users", async (req, res) => {
    const parsed = userFilterSchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid user filters", issues: parsed.error.issues });
      return;
    }
    const users = await accounts.listUsers(parsed.data);
    res.json(users.map(toUserRow));
  });

  adminRouter.post("/users", async (req, res) => {
    const parsed = userCreateSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid user payload", issues: parsed.error.issues });
      return;
    }
    const { email, password, ...fields } = parsed.data;
    const user = await accounts.createUser(email, password, fields);
    res.status(201).json(toUserDetail(user));
  });

  adminRouter.post("/users/superusers", async (req, res) => {
    const parsed = superuserCreateSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid user payload", issues: parsed.error.issues });
      return;
    }
    const { email, password, ...fields } = parsed.data;
    const user = await accounts.createSuperuser(email, password, fields);
    res.status(201).json(toUserDetail(user));
  });

  adminRouter.get("/users/:id", async (req, res) => {
    res.json(toUserDetail(await accounts.getUser(req.params.id)));
  });

  adminRouter.patch("/users/:id", async (req, res) => {
    const parsed = userUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid user payload", issues: parsed.error.issues });
      return;
    }
    res.json(toUserDetail(await accounts.updateUser(req.params.id, parsed.data)));
  });

  adminRouter.post("/users/:id/password", async (req, res) => {
    const parsed = setPasswordSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid password payload", issues: parsed.error.issues });
      return;
    }
    res.json(toUserDetail(await accounts.setPassword(req.params.id, parsed.data.password)));
  });

  adminRouter.delete("/users/:id", async (req, res) => {
    res.json(await accounts.deleteUser(req.params.id));
  });

  adminRouter.get("/seller-profiles", async (req, res) => {
    const parsed = sellerProfileFilterSchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid seller profile filters", issues: parsed.error.issues });
      return;
    }
    const profiles = await accounts.listSellerProfiles(parsed.data);
    res.json(profiles.map(toSellerProfile));
  });

  adminRouter.post("/users/:id/seller-profile", async (req, res) => {
    const parsed = sellerProfileCreateSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid seller profile payload", issues: parsed.error.issues });
      return;
    }
    const profile = await accounts.createSellerProfile(req.params.id, parsed.data);
    res.status(201).json(toSellerProfile(profile));
  });

  adminRouter.get("/users/:id/seller-profile", async (req, res) => {
    res.json(toSellerProfile(await accounts.getSellerProfile(req.params.id)));
  });

  adminRouter.patch("/users/:id/seller-profile", async (req, res) => {
    const parsed = sellerProfileUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid seller profile payload", issues: parsed.error.issues });
      return;
    }
    res.json(toSellerProfile(await accounts.updateSellerProfile(req.params.id, parsed.data)));
  });

  adminRouter.post("/users/:id/seller-profile/verify", async (req, res) => {
    res.json(toSellerProfile(await accounts.verifySeller(req.params.id)));
  });

  adminRouter.delete("/users/:id/seller-profile", async (req, res) => {
    res.json(await accounts.deleteSellerProfile(req.params.id));
  });

  adminRouter.post("/users/:id/buyer-profile", async (req, res) => {
    const parsed = buyerProfileCreateSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid buyer profile payload", issues: parsed.error.issues });
      return;
    }
    const profile = await accounts.createBuyerProfile(req.params.id, parsed.data);
    res.status(201).json(toBuyerProfile(profile));
  });

  adminRouter.get("/users/:id/buyer-profile", async (req, res) => {
    res.json(toBuyerProfile(await accounts.getBuyerProfile(req.params.id)));
  });

  adminRouter.patch("/users/:id/buyer-profile", async (req, res) => {
    const parsed = buyerProfileUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid buyer profile payload", issues: parsed.error.issues });
      return;
    }
    res.json(toBuyerProfile(await accounts.updateBuyerProfile(req.params.id, parsed.data)));
  });

  adminRouter.delete("/users/:id/buyer-profile", async (req, res) => {
    const buyerProfiles = await accounts.deleteBuyerProfile(req.params.id);
    res.json({ buyerProfiles });
  });

  return adminRouter;
}
