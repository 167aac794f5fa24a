import { Injectable } from '@nestjs/common';
import { CUSTOM_PROVIDER_DEFAULT_COST, llmPresets } from '../common/config/llm-presets';
import { roundTo } from '../common/math/rounding';

export type InferenceMethod = 'tokens' | 'monthly_bill';

export interface UnitCostInputs {
  inferenceMethod: InferenceMethod;
  provider?: string;
  /** Overrides the provider preset when given. */
  costPer1kTokens?: number;
  tokensPerInteraction: number;
  llmCallsPerUnit: number;
  monthlyApiSpend: number;
  unitsPerMonth: number;
  humanReview: boolean;
  reviewPercent: number;
  minutesPerReview: number;
  reviewerHourlyCost: number;
  monthlyInfraCost: number;
  monthlyUnits: number;
  targetMargin: number;
}

export interface UnitCostBreakdown {
  inferenceCost: number;
  humanCost: number;
  infrastructureCost: number;
  totalCost: number;
  shares: { inference: number; human: number; infrastructure: number };
  targetMargin: number;
  minimumPrice: number;
}

@Injectable()
export class UnitCostService {
  getPresets() {
    return llmPresets;
  }

  calculate(inputs: UnitCostInputs): UnitCostBreakdown {
    const inference = this.inferenceCost(inputs);
    const human = inputs.humanReview
      ? (inputs.reviewPercent / 100) * (inputs.minutesPerReview / 60) * inputs.reviewerHourlyCost
      : 0;
    const infrastructure = inputs.monthlyUnits > 0 ? inputs.monthlyInfraCost / inputs.monthlyUnits : 0;
    const total = inference + human + infrastructure;

    const share = (part: number) => (total > 0 ? roundTo((part / total) * 100, 1) : 0);
    const minimumPrice =
      total > 0 && inputs.targetMargin < 100 ? roundTo(total / (1 - inputs.targetMargin / 100), 2) : 0;

    return {
      inferenceCost: roundTo(inference, 4),
      humanCost: roundTo(human, 4),
      infrastructureCost: roundTo(infrastructure, 4),
      totalCost: roundTo(total, 4),
      shares: { inference: share(inference), human: share(human), infrastructure: share(infrastructure) },
      targetMargin: inputs.targetMargin,
      minimumPrice,
    };
  }

  private inferenceCost(inputs: UnitCostInputs): number {
    if (inputs.inferenceMethod === 'monthly_bill') {
      return inputs.unitsPerMonth > 0 ? inputs.monthlyApiSpend / inputs.unitsPerMonth : 0;
    }
    const costPer1k = inputs.costPer1kTokens ?? this.presetCost(inputs.provider);
    return (inputs.tokensPerInteraction / 1000) * costPer1k * inputs.llmCallsPerUnit;
  }

  private presetCost(provider: string | undefined): number {
    const preset = llmPresets.find((p) => p.provider === provider);
    return preset?.costPer1kTokens ?? CUSTOM_PROVIDER_DEFAULT_COST;
  }
}
