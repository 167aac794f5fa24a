import { Injectable } from '@nestjs/common';
import { roundTo } from '../common/math/rounding';

export const SAAS_BENCHMARK_MARGIN = 80;
export const AI_AVERAGE_MARGIN = 55;

export type MarginBand = 'strong' | 'typical' | 'weak';

export interface GrossMarginInputs {
  costPerUnit: number;
  pricePerUnit: number;
  unitsPerCustomer: number;
  customers: number;
}

export interface GrossMarginResult {
  grossMargin: number;
  monthlyProfitPerCustomer: number;
  monthlyTotalProfit: number;
  band: MarginBand;
  benchmarks: { saas: number; aiAverage: number };
}

@Injectable()
export class GrossMarginService {
  calculate({ costPerUnit, pricePerUnit, unitsPerCustomer, customers }: GrossMarginInputs): GrossMarginResult {
    const margin = pricePerUnit > 0 ? ((pricePerUnit - costPerUnit) / pricePerUnit) * 100 : 0;
    const profitPerCustomer = (pricePerUnit - costPerUnit) * unitsPerCustomer;

    return {
      grossMargin: roundTo(margin, 1),
      monthlyProfitPerCustomer: roundTo(profitPerCustomer, 2),
      monthlyTotalProfit: roundTo(profitPerCustomer * customers, 2),
      band: this.getBand(margin),
      benchmarks: { saas: SAAS_BENCHMARK_MARGIN, aiAverage: AI_AVERAGE_MARGIN },
    };
  }

  private getBand(margin: number): MarginBand {
    if (margin > 65) return 'strong';
    if (margin >= 50) return 'typical';
    return 'weak';
  }
}
