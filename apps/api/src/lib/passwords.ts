import { hash as argon2Hash, verify as argon2Verify } from '@node-rs/argon2';

export interface PasswordHasher {
  hash(plaintext: string): Promise<string>;
  verify(digest: string, plaintext: string): Promise<boolean>;
}

const ARGON2_OPTIONS = {
  memoryCost: 19456,
  timeCost: 2,
  parallelism: 1,
};

export const argon2Hasher: PasswordHasher = {
  hash: (plaintext) => argon2Hash(plaintext, ARGON2_OPTIONS),
  verify: async (digest, plaintext) => {
    try {
      return await argon2Verify(digest, plaintext);
    } catch {
      // Malformed digest in the users table reads as a failed match
      return false;
    }
  },
};
