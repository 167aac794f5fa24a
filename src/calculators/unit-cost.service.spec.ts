import { Test } from '@nestjs/testing';
import { UnitCostService } from './unit-cost.service';
import type { UnitCostInputs } from './unit-cost.service';

const BASE: UnitCostInputs = {
  inferenceMethod: 'tokens',
  tokensPerInteraction: 2000,
  llmCallsPerUnit: 1,
  monthlyApiSpend: 500,
  unitsPerMonth: 5000,
  humanReview: false,
  reviewPercent: 20,
  minutesPerReview: 5,
  reviewerHourlyCost: 50,
  monthlyInfraCost: 0,
  monthlyUnits: 1000,
  targetMargin: 65,
};

describe('UnitCostService', () => {
  let service: UnitCostService;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [UnitCostService],
    }).compile();

    service = moduleRef.get(UnitCostService);
  });

  it('prices inference from a provider preset', () => {
    const result = service.calculate({ ...BASE, provider: 'Anthropic (Claude Haiku)', llmCallsPerUnit: 3 });

    expect(result.inferenceCost).toBe(0.012);
    expect(result.totalCost).toBe(0.012);
    expect(result.shares).toEqual({ inference: 100, human: 0, infrastructure: 0 });
    expect(result.minimumPrice).toBe(0.03);
  });

  it('uses the custom default when the provider has no preset', () => {
    const result = service.calculate({ ...BASE, provider: 'Other / custom', tokensPerInteraction: 1000 });
    expect(result.inferenceCost).toBe(0.005);
  });

  it('prefers an explicit cost per 1K tokens over the preset', () => {
    const result = service.calculate({ ...BASE, provider: 'OpenAI (GPT-4o)', costPer1kTokens: 0.02 });
    expect(result.inferenceCost).toBe(0.04);
  });

  it('combines bill-based inference, human review and infrastructure', () => {
    const result = service.calculate({
      ...BASE,
      inferenceMethod: 'monthly_bill',
      humanReview: true,
      monthlyInfraCost: 300,
    });

    expect(result).toEqual({
      inferenceCost: 0.1,
      humanCost: 0.8333,
      infrastructureCost: 0.3,
      totalCost: 1.2333,
      shares: { inference: 8.1, human: 67.6, infrastructure: 24.3 },
      targetMargin: 65,
      minimumPrice: 3.52,
    });
  });

  it('returns zero shares and price when nothing costs anything', () => {
    const result = service.calculate({ ...BASE, costPer1kTokens: 0 });
    expect(result.totalCost).toBe(0);
    expect(result.shares).toEqual({ inference: 0, human: 0, infrastructure: 0 });
    expect(result.minimumPrice).toBe(0);
  });
});
