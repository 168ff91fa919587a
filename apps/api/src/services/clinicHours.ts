// =============================================================================
// Attendwell API: Clinic opening hours
//
// Hours "remaining" for a week are the location's scheduled open hours less
// the hours already consumed by attended sessions held there that week.
// =============================================================================

import { DAYS_OF_WEEK, type WeeklySchedule } from '@attendwell/shared';
import { round2 } from './riskClassifier.js';

function secondsOfDay(time: string): number {
  const [h = '0', m = '0', s = '0'] = time.split(':');
  return Number(h) * 3600 + Number(m) * 60 + Number(s);
}

export function weeklyScheduledHours(schedule: WeeklySchedule): number {
  const seconds = DAYS_OF_WEEK.reduce((total, day) => {
    const open = schedule[`${day}_open`];
    const close = schedule[`${day}_close`];
    if (!open || !close) return total;
    return total + Math.max(0, secondsOfDay(close) - secondsOfDay(open));
  }, 0);
  return round2(seconds / 3600);
}

/** Never negative: sessions running past the schedule leave nothing open. */
export function remainingClinicHours(schedule: WeeklySchedule, hoursUsed: number): number {
  return round2(Math.max(0, weeklyScheduledHours(schedule) - hoursUsed));
}
