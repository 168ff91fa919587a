export { createSql, closeDb, type Sql, type TransactionSql, type DbTypes, type CreateSqlOptions } from './client.js';
export {
  applyTenantContext,
  withTenantContext,
  withoutTenantContext,
  ROLE_SETTING,
  ORG_SETTING,
  type TenantContext,
  type TaggedQuery,
} from './tenancy.js';
