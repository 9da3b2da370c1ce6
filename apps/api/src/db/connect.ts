import mongoose from "mongoose";
import { env } from "../config/env.js";

let isConnected = false;

export async function connectDatabase() {
  if (isConnected) {
    return;
  }

  await mongoose.connect(env.MONGODB_URI, {
    dbName: env.MONGODB_DB_NAME,
    serverSelectionTimeoutMS: 15000,
    tls: env.MONGODB_TLS,
    family: 4
  });
  isConnected = true;
}

export async function disconnectDatabase() {
  if (!isConnected) {
    return;
  }
  await mongoose.disconnect();
  isConnected = false;
}
