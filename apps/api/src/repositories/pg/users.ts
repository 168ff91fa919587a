import type { TransactionSql } from '@attendwell/db';
import type { Organization, Principal, User } from '@attendwell/shared';
import type {
  NewUser,
  OrganizationRepository,
  UserCredentials,
  UserRepository,
} from '../types.js';
import { translateUnique } from './errors.js';

export function pgUsers(tx: TransactionSql): UserRepository {
  return {
    async findActivePrincipalByEmail(email) {
      const [row] = await tx<Principal[]>`
        SELECT user_id, username, email, role, organization_id, location_id, is_active
        FROM users
        WHERE email = ${email} AND is_active = TRUE
      `;
      return row ?? null;
    },

    async findCredentialsByEmail(email) {
      const [row] = await tx<UserCredentials[]>`
        SELECT user_id, username, email, role, organization_id, location_id, is_active, password_hash
        FROM users
        WHERE email = ${email}
      `;
      return row ?? null;
    },

    async existsByEmailOrUsername(email, username) {
      const [row] = await tx<{ exists: boolean }[]>`
        SELECT EXISTS (
          SELECT 1 FROM users WHERE email = ${email} OR username = ${username}
        ) AS exists
      `;
      return row?.exists ?? false;
    },

    async recordLogin(userId, at) {
      await tx`UPDATE users SET last_login = ${at} WHERE user_id = ${userId}`;
    },

    async create(input: NewUser) {
      const [row] = await translateUnique(tx<User[]>`
        INSERT INTO users (username, email, password_hash, role, organization_id, location_id)
        VALUES (
          ${input.username}, ${input.email}, ${input.password_hash}, ${input.role},
          ${input.organization_id}, ${input.location_id}
        )
        RETURNING user_id, username, email, role, organization_id, location_id, is_active,
                  created_at, updated_at, last_login
      `);
      if (!row) throw new Error('User insert returned no row');
      return row;
    },

    async findById(userId) {
      const [row] = await tx<User[]>`
        SELECT user_id, username, email, role, organization_id, location_id, is_active,
               created_at, updated_at, last_login
        FROM users
        WHERE user_id = ${userId}
      `;
      return row ?? null;
    },

    async list(organizationId) {
      return tx<User[]>`
        SELECT user_id, username, email, role, organization_id, location_id, is_active,
               created_at, updated_at, last_login
        FROM users
        WHERE (${organizationId}::UUID IS NULL OR organization_id = ${organizationId})
        ORDER BY created_at DESC
      `;
    },

    async setActive(userId, isActive) {
      const [row] = await tx<User[]>`
        UPDATE users SET is_active = ${isActive}, updated_at = NOW()
        WHERE user_id = ${userId}
        RETURNING user_id, username, email, role, organization_id, location_id, is_active,
                  created_at, updated_at, last_login
      `;
      return row ?? null;
    },
  };
}

export function pgOrganizations(tx: TransactionSql): OrganizationRepository {
  return {
    async findById(organizationId) {
      const [row] = await tx<Organization[]>`
        SELECT organization_id, name, status, created_at, updated_at
        FROM organizations
        WHERE organization_id = ${organizationId}
      `;
      return row ?? null;
    },

    async listActive() {
      return tx<Organization[]>`
        SELECT organization_id, name, status, created_at, updated_at
        FROM organizations
        WHERE status = 'active'
        ORDER BY name
      `;
    },
  };
}
