import bcrypt from "bcryptjs";

const SALT_ROUNDS = 10;

export interface PasswordHasher {
  hash(value: string): Promise<string>;
  verify(value: string, hash: string | null | undefined): Promise<boolean>;
}

export async function hashValue(value: string, rounds = SALT_ROUNDS) {
  return bcrypt.hash(value, rounds);
}

export async function compareValue(value: string, hash: string | null | undefined) {
  if (!hash) {
    return false;
  }
  return bcrypt.compare(value, hash);
}

export function createBcryptHasher(rounds = SALT_ROUNDS): PasswordHasher {
  return {
    hash: (value) => hashValue(value, rounds),
    verify: compareValue
  };
}
