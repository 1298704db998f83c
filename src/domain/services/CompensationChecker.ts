/**
 * Compensation Checker
 *
 * Rate ceiling and minimum availability, both inclusive.
 * Rates are compared as given: there is no currency conversion, so a
 * non-reference currency is only called out in the reason.
 */

import type { CompensationPolicy, Currency } from '../../config/ScreeningPolicy.js';

export interface CompensationResult {
  passed: boolean;
  reason: string;
  rateWithinCeiling: boolean;
  availabilitySufficient: boolean;
}

export class CompensationChecker {
  constructor(private readonly policy: CompensationPolicy) {}

  check(preferredRate: number, availabilityHours: number, currency?: Currency): CompensationResult {
    const { rateCeiling, minHoursPerWeek, referenceCurrency } = this.policy;

    const rateWithinCeiling = preferredRate <= rateCeiling;
    const availabilitySufficient = availabilityHours >= minHoursPerWeek;
    const passed = rateWithinCeiling && availabilitySufficient;

    let reason: string;
    if (passed) {
      reason = `$${preferredRate}/hr (<= $${rateCeiling}/hr) and ${availabilityHours} hrs/wk (>= ${minHoursPerWeek} hrs/wk)`;
    } else {
      const failures: string[] = [];
      if (!rateWithinCeiling) {
        failures.push(`rate $${preferredRate}/hr exceeds $${rateCeiling}/hr ceiling`);
      }
      if (!availabilitySufficient) {
        failures.push(`availability ${availabilityHours} hrs/wk below ${minHoursPerWeek} hrs/wk minimum`);
      }
      reason = failures.join('; ');
    }

    if (currency && currency !== referenceCurrency) {
      reason += ` (rate in ${currency}, compared to ${referenceCurrency} ceiling without conversion)`;
    }

    return { passed, reason, rateWithinCeiling, availabilitySufficient };
  }
}
