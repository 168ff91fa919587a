// =============================================================================
// Attendwell API: Weekly risk / engagement classification
//
// risk score = hours still needed / clinic hours still open this week
//
//   0          requirement already met
//   0 < s <= 1 still reachable with the remaining capacity   → at_risk
//   s > 1      cannot be reached this week                    → non_compliant
//   MAX        hours needed but the clinic has no hours left  → non_compliant
//
// Compliance comes from the unrounded hours; only the reported score is
// rounded to two decimals. The score is then placed in the tenant's risk tiers: half-open ranges
// [low, high), lowest sort_order first, tier_label breaking ties.
// =============================================================================

import {
  MAX_RISK_SCORE,
  type ComplianceStatus,
  type EngagementCategory,
  type RiskTier,
} from '@attendwell/shared';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type TierCandidate = Pick<
  RiskTier,
  'tier_label' | 'risk_level_range_low' | 'risk_level_range_high' | 'sort_order' | 'status'
>;

export interface ClassificationInput<T extends TierCandidate> {
  /** False when the patient lacks a program or a location. */
  assigned: boolean;
  hoursAttended: number;
  hoursRequired: number;
  clinicHoursRemaining: number;
  tiers: readonly T[];
}

export interface Classification<T extends TierCandidate> {
  hoursRemainingNeeded: number;
  riskScore: number;
  complianceStatus: ComplianceStatus;
  matchedTier: T | null;
  needsFollowup: boolean;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function compareTiers(a: TierCandidate, b: TierCandidate): number {
  if (a.sort_order !== b.sort_order) return a.sort_order - b.sort_order;
  if (a.tier_label < b.tier_label) return -1;
  if (a.tier_label > b.tier_label) return 1;
  return 0;
}

/** Active tiers in classification order. */
export function orderTiers<T extends TierCandidate>(tiers: readonly T[]): T[] {
  return tiers.filter((t) => t.status === 'active').sort(compareTiers);
}

export function matchTier<T extends TierCandidate>(score: number, tiers: readonly T[]): T | null {
  return (
    orderTiers(tiers).find(
      (t) => t.risk_level_range_low <= score && score < t.risk_level_range_high,
    ) ?? null
  );
}

/** Active tiers whose range intersects `candidate`'s. */
export function overlappingTiers<T extends TierCandidate & { tier_id: string }>(
  candidate: Pick<TierCandidate, 'risk_level_range_low' | 'risk_level_range_high'> & { tier_id?: string },
  tiers: readonly T[],
): T[] {
  return tiers.filter(
    (t) =>
      t.status === 'active' &&
      t.tier_id !== candidate.tier_id &&
      t.risk_level_range_low < candidate.risk_level_range_high &&
      candidate.risk_level_range_low < t.risk_level_range_high,
  );
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

/** Float noise from subtracting two-decimal hour values, not a real shortfall. */
const HOURS_EPSILON = 1e-9;

export function riskScoreFor(hoursRemainingNeeded: number, clinicHoursRemaining: number): number {
  if (hoursRemainingNeeded <= 0) return 0;
  if (clinicHoursRemaining <= 0) return MAX_RISK_SCORE;
  return Math.min(MAX_RISK_SCORE, round2(hoursRemainingNeeded / clinicHoursRemaining));
}

export function classify<T extends TierCandidate & { auto_flag_for_followup: boolean }>(
  input: ClassificationInput<T>,
): Classification<T> {
  const shortfall = input.hoursRequired - input.hoursAttended;
  const needed = shortfall > HOURS_EPSILON ? shortfall : 0;
  const hoursRemainingNeeded = round2(needed);

  if (!input.assigned) {
    return {
      hoursRemainingNeeded,
      riskScore: 0,
      complianceStatus: 'unassigned',
      matchedTier: null,
      needsFollowup: false,
    };
  }

  const riskScore = riskScoreFor(needed, input.clinicHoursRemaining);

  let complianceStatus: ComplianceStatus;
  if (needed === 0) {
    complianceStatus = 'compliant';
  } else if (input.clinicHoursRemaining > 0 && needed - input.clinicHoursRemaining <= HOURS_EPSILON) {
    complianceStatus = 'at_risk';
  } else {
    complianceStatus = 'non_compliant';
  }

  const matchedTier = matchTier(riskScore, input.tiers);

  return {
    hoursRemainingNeeded,
    riskScore,
    complianceStatus,
    matchedTier,
    needsFollowup: matchedTier?.auto_flag_for_followup ?? false,
  };
}

// ---------------------------------------------------------------------------
// Dashboard categories
// ---------------------------------------------------------------------------

export function engagementCategory(
  assigned: boolean,
  hoursAttended: number,
  hoursRemainingNeeded: number,
): EngagementCategory {
  if (!assigned) return 'unassigned';
  if (hoursRemainingNeeded === 0) return 'engaged';
  if (hoursAttended > 0) return 'partial';
  return 'unengaged';
}

/** Lower-cased tier label, or 'na' when no tier matched. */
export function riskCategory(tier: Pick<TierCandidate, 'tier_label'> | null): string {
  return tier ? tier.tier_label.toLowerCase() : 'na';
}

export function completionPercentage(hoursAttended: number, hoursRequired: number): number {
  if (hoursRequired <= 0) return 100;
  return Math.min(100, Math.round((hoursAttended / hoursRequired) * 1000) / 10);
}
