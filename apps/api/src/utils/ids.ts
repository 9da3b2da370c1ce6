import { Types } from "mongoose";

export function isObjectId(id: string) {
  return Types.ObjectId.isValid(id);
}
