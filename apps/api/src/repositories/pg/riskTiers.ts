import type { TransactionSql } from '@attendwell/db';
import type { RiskTier } from '@attendwell/shared';
import type { NewRiskTier, RiskTierPatch, RiskTierRepository } from '../types.js';
import { translateUnique } from './errors.js';

const TIER_COLUMNS = [
  'tier_id', 'organization_id', 'tier_label', 'tier_description', 'recommended_actions',
  'risk_level_range_low', 'risk_level_range_high', 'color', 'sort_order',
  'auto_flag_for_followup', 'status', 'created_at', 'updated_at',
];

export function pgRiskTiers(tx: TransactionSql): RiskTierRepository {
  const columns = tx(TIER_COLUMNS);

  return {
    async findById(tierId) {
      const [row] = await tx<RiskTier[]>`SELECT ${columns} FROM risk_tiers WHERE tier_id = ${tierId}`;
      return row ?? null;
    },

    async list(filter) {
      return tx<RiskTier[]>`
        SELECT ${columns} FROM risk_tiers
        WHERE (${filter.organization_id ?? null}::UUID IS NULL OR organization_id = ${filter.organization_id ?? null})
          AND (${filter.status ?? null}::TEXT IS NULL OR status = ${filter.status ?? null})
        ORDER BY sort_order, tier_label
      `;
    },

    async create(input: NewRiskTier) {
      const [row] = await translateUnique(tx<RiskTier[]>`
        INSERT INTO risk_tiers ${tx(input)}
        RETURNING ${columns}
      `);
      if (!row) throw new Error('Risk tier insert returned no row');
      return row;
    },

    async update(tierId, patch: RiskTierPatch) {
      const [row] = await translateUnique(tx<RiskTier[]>`
        UPDATE risk_tiers SET
          tier_label             = COALESCE(${patch.tier_label ?? null}, tier_label),
          tier_description       = COALESCE(${patch.tier_description ?? null}, tier_description),
          recommended_actions    = COALESCE(${patch.recommended_actions ?? null}, recommended_actions),
          risk_level_range_low   = COALESCE(${patch.risk_level_range_low ?? null}::NUMERIC, risk_level_range_low),
          risk_level_range_high  = COALESCE(${patch.risk_level_range_high ?? null}::NUMERIC, risk_level_range_high),
          color                  = COALESCE(${patch.color ?? null}, color),
          sort_order             = COALESCE(${patch.sort_order ?? null}::INT, sort_order),
          auto_flag_for_followup = COALESCE(${patch.auto_flag_for_followup ?? null}::BOOLEAN, auto_flag_for_followup),
          status                 = COALESCE(${patch.status ?? null}, status),
          updated_at             = NOW()
        WHERE tier_id = ${tierId}
        RETURNING ${columns}
      `);
      return row ?? null;
    },

    async delete(tierId) {
      const rows = await tx`DELETE FROM risk_tiers WHERE tier_id = ${tierId}`;
      return rows.count > 0;
    },
  };
}
