import { Injectable, Logger } from '@nestjs/common';
import type { FormulaResult, FormulaType } from '../types/scoring';
import type { VolumeStep } from '../config/pricing-tables';
import { DEAL_SIZE_VOLUME_STEPS, DEFAULT_SEATS, SEGMENT_SEATS } from '../config/pricing-tables';
import { formatAmount, roundTo } from '../math/rounding';

export interface FormulaInputs {
  costPerUnit: number;
  /** Price that hits the target margin on one unit. */
  price: number;
  targetMargin: number;
  dealSize: number;
  customerSegment: string;
}

type FormulaBuilder = (inputs: FormulaInputs) => FormulaResult;

export function monthlyUnitsForDealSize(
  dealSize: number,
  steps: readonly VolumeStep[] = DEAL_SIZE_VOLUME_STEPS,
): number {
  const step = steps.find((s) => dealSize <= s.maxDealSize);
  return step ? step.monthlyUnits : 0;
}

export function seatsForSegment(segment: string): number {
  return SEGMENT_SEATS.get(segment) ?? DEFAULT_SEATS;
}

export function emptyFormulaResult(): FormulaResult {
  return {
    modelName: '',
    platformFeeAnnual: 0,
    platformFeeMonthly: 0,
    includedUnits: 0,
    overageRate: 0,
    effectivePricePerUnit: 0,
    grossMargin: 0,
    explanation: '',
  };
}

const money = (value: number) => roundTo(value, 2);
const percent = (value: number) => roundTo(value, 1);

function hybridFormula({ costPerUnit, price, dealSize }: FormulaInputs): FormulaResult {
  const monthlyUnits = monthlyUnitsForDealSize(dealSize);
  const feeMonthly = money(costPerUnit * monthlyUnits * 2);
  const feeAnnual = money(feeMonthly * 12);
  const included = Math.max(1, Math.floor(feeAnnual / (price * 1.5)));
  const overage = money(price * 1.2);
  const grossMargin = feeAnnual > 0 ? percent(((feeAnnual - costPerUnit * included) / feeAnnual) * 100) : 0;

  return {
    modelName: 'Hybrid (Base + Usage)',
    platformFeeAnnual: feeAnnual,
    platformFeeMonthly: feeMonthly,
    includedUnits: included,
    overageRate: overage,
    effectivePricePerUnit: money(price),
    grossMargin,
    explanation:
      `Charge $${formatAmount(feeMonthly, 0)}/mo platform fee covering ` +
      `${formatAmount(included, 0)} included units/yr. ` +
      `Additional units at $${formatAmount(overage, 2)} each.`,
  };
}

function outcomeFormula({ price, targetMargin, dealSize }: FormulaInputs): FormulaResult {
  const minCommit = money(dealSize * 0.7);
  const estimatedOutcomes = Math.max(1, Math.floor(minCommit / price));
  const feeMonthly = money(minCommit / 12);

  return {
    modelName: 'Outcome-based',
    platformFeeAnnual: minCommit,
    platformFeeMonthly: feeMonthly,
    includedUnits: estimatedOutcomes,
    overageRate: money(price),
    effectivePricePerUnit: money(price),
    grossMargin: percent(targetMargin),
    explanation:
      `$${formatAmount(price, 2)} per outcome with $${formatAmount(minCommit, 0)}/yr minimum ` +
      `commitment (~${formatAmount(estimatedOutcomes, 0)} outcomes). ` +
      'Same rate for additional outcomes.',
  };
}

function workflowFormula({ price, targetMargin, dealSize }: FormulaInputs): FormulaResult {
  const monthlyTasks = monthlyUnitsForDealSize(dealSize);
  const feeMonthly = money(monthlyTasks * price);
  const feeAnnual = money(feeMonthly * 12);
  const discounted = money(price * 0.85);

  return {
    modelName: 'Workflow-based (Per Task)',
    platformFeeAnnual: feeAnnual,
    platformFeeMonthly: feeMonthly,
    includedUnits: monthlyTasks * 12,
    overageRate: discounted,
    effectivePricePerUnit: money(price),
    grossMargin: percent(targetMargin),
    explanation:
      `$${formatAmount(price, 2)} per task × ${formatAmount(monthlyTasks, 0)} tasks/mo = ` +
      `$${formatAmount(feeMonthly, 0)}/mo. ` +
      `15% volume discount at 2× volume ($${formatAmount(discounted, 2)}/task).`,
  };
}

function perSeatFormula({ costPerUnit, dealSize, customerSegment }: FormulaInputs): FormulaResult {
  const seats = seatsForSegment(customerSegment);
  const monthlyPerSeat = money(dealSize / 12 / seats);
  const feeMonthly = money(monthlyPerSeat * seats);
  const feeAnnual = money(feeMonthly * 12);
  const extraSeat = money(monthlyPerSeat * 1.5);

  const costPerSeat = costPerUnit * (monthlyUnitsForDealSize(dealSize) / seats);
  const grossMargin =
    monthlyPerSeat > 0 ? percent(((monthlyPerSeat - costPerSeat) / monthlyPerSeat) * 100) : 0;

  return {
    modelName: 'Per-seat + Feature Tiers',
    platformFeeAnnual: feeAnnual,
    platformFeeMonthly: feeMonthly,
    includedUnits: seats,
    overageRate: extraSeat,
    effectivePricePerUnit: monthlyPerSeat,
    grossMargin,
    explanation:
      `$${formatAmount(monthlyPerSeat, 0)}/seat/month × ${seats} seats = ` +
      `$${formatAmount(feeMonthly, 0)}/mo. ` +
      `Additional seats at $${formatAmount(extraSeat, 0)}/mo each.`,
  };
}

const FORMULAS: Record<FormulaType, FormulaBuilder> = {
  hybrid: hybridFormula,
  outcome: outcomeFormula,
  workflow: workflowFormula,
  per_seat: perSeatFormula,
};

@Injectable()
export class PricingFormulaService {
  private readonly logger = new Logger(PricingFormulaService.name);

  generateFormula(
    costPerUnit: number,
    targetMargin: number,
    dealSize: number,
    formulaType: FormulaType,
    customerSegment = 'mid_market',
  ): FormulaResult {
    if (costPerUnit <= 0 || targetMargin >= 100) {
      this.logger.warn(`Cannot price: costPerUnit=${costPerUnit}, targetMargin=${targetMargin}`);
      return emptyFormulaResult();
    }

    const price = costPerUnit / (1 - targetMargin / 100);

    return FORMULAS[formulaType]({ costPerUnit, price, targetMargin, dealSize, customerSegment });
  }
}
