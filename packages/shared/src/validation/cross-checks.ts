/**
 * Template-level checks that compare fields with each other.
 */

import { differenceInCalendarDays } from 'date-fns';
import type { ValidationRulesDocument } from '../templates/types';
import type { FieldIssue, ServiceType } from '../types';

export const USAGE_AMOUNT_TOLERANCE = 0.2;
export const MAX_BILLING_PERIOD_DAYS = 100;

/** Plausible per-unit rates by service */
export const RATE_BANDS: Readonly<Record<ServiceType, { min: number; max: number }>> = {
  Electricity: { min: 0.1, max: 0.6 },
  Gas: { min: 0.02, max: 0.1 },
  Water: { min: 0.001, max: 0.01 },
};

export interface CrossCheckInput {
  serviceType: ServiceType;
  totalAmount: number | null;
  usageQuantity: number | null;
  usageRate: number | null;
  serviceCharge: number | null;
  periodStart: Date | null;
  periodEnd: Date | null;
}

function failure(message: string): FieldIssue {
  return { code: 'ValidationFailure', field: null, message };
}

export function checkAmountUsageCorrelation(input: CrossCheckInput): FieldIssue | null {
  const { totalAmount, usageQuantity, usageRate, serviceCharge } = input;
  if (totalAmount === null || usageQuantity === null || usageRate === null || totalAmount <= 0) {
    return null;
  }
  const expected = usageQuantity * usageRate + (serviceCharge ?? 0);
  const deviation = Math.abs(expected - totalAmount) / totalAmount;
  if (deviation <= USAGE_AMOUNT_TOLERANCE) return null;
  return failure(
    `Usage charges ${expected.toFixed(2)} differ from total ${totalAmount.toFixed(2)} by ${Math.round(deviation * 100)}%`
  );
}

export function checkDateSequence(input: CrossCheckInput): FieldIssue | null {
  const { periodStart, periodEnd } = input;
  if (!periodStart || !periodEnd) return null;
  const days = differenceInCalendarDays(periodEnd, periodStart);
  if (days < 1) {
    return failure('Billing period end is not after its start');
  }
  if (days > MAX_BILLING_PERIOD_DAYS) {
    return failure(`Billing period of ${days} days exceeds ${MAX_BILLING_PERIOD_DAYS}`);
  }
  return null;
}

export function checkReasonableRate(input: CrossCheckInput): FieldIssue | null {
  if (input.usageRate === null) return null;
  const band = RATE_BANDS[input.serviceType];
  if (input.usageRate >= band.min && input.usageRate <= band.max) return null;
  return failure(
    `${input.serviceType} rate ${input.usageRate} is outside ${band.min}-${band.max} per unit`
  );
}

export function runCrossChecks(
  rules: Readonly<Required<ValidationRulesDocument>>,
  input: CrossCheckInput
): FieldIssue[] {
  const results = [
    rules.amount_usage_correlation ? checkAmountUsageCorrelation(input) : null,
    rules.date_sequence_check ? checkDateSequence(input) : null,
    rules.reasonable_rates_check ? checkReasonableRate(input) : null,
  ];
  return results.filter((issue): issue is FieldIssue => issue !== null);
}
