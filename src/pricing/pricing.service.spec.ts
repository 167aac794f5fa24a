import { Test } from '@nestjs/testing';
import { PricingService } from './pricing.service';
import { PricingFormulaService } from '../common/scoring/pricing-formula.service';
import { businessModels } from '../common/config/business-models';

describe('PricingService', () => {
  let service: PricingService;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [PricingService, PricingFormulaService],
    }).compile();

    service = moduleRef.get(PricingService);
  });

  describe('recommend', () => {
    it.each([
      ['Copilot', 'Revenue Engine', 'low', 'Per-seat + Feature Tiers', 'per_seat'],
      ['Copilot', 'Revenue Engine', 'high', 'Hybrid (Base + Usage Tiers)', 'hybrid'],
      ['Copilot', 'Promise Zone', 'low', 'Hybrid (Base + Usage Tiers)', 'hybrid'],
      ['Agent', 'Efficiency Machine', 'moderate', 'Outcome-based', 'outcome'],
      ['Agent', 'Revenue Engine', 'high', 'Hybrid (Base + Outcome Credits)', 'hybrid'],
      ['Agent', 'Promise Zone', 'low', 'Workflow-based (Per Task)', 'workflow'],
      ['AI-enabled Service', 'Revenue Engine', 'high', 'Outcome-based (Per Deliverable)', 'outcome'],
      ['AI-enabled Service', 'Danger Zone', 'moderate', 'Workflow-based + SLA Tiers', 'workflow'],
    ] as const)('%s in %s with %s variance -> %s', (model, quadrant, variance, name, formulaType) => {
      const rec = service.recommend(model, quadrant, variance);
      expect(rec.modelName).toBe(name);
      expect(rec.formulaType).toBe(formulaType);
    });
  });

  describe('generate', () => {
    it('feeds the recommended formula type into the formula generator', () => {
      const report = service.generate({
        businessModel: 'Agent',
        quadrant: 'Efficiency Machine',
        costVariance: 'moderate',
        costPerUnit: 2,
        targetMargin: 50,
        dealSize: 60_000,
        customerSegment: 'mid_market',
      });

      expect(report.recommendation.formulaType).toBe('outcome');
      expect(report.formula.modelName).toBe('Outcome-based');
      expect(report.formula.platformFeeAnnual).toBe(42_000);
      expect(report.comps.map((c) => c.name)).toEqual(['Intercom (Fin)', 'Leena AI', 'Resolve AI']);
      expect(report.principles).toEqual(businessModels.Agent.principles);
    });

    it('uses the segment seat count for per-seat recommendations', () => {
      const report = service.generate({
        businessModel: 'Copilot',
        quadrant: 'Revenue Engine',
        costVariance: 'low',
        costPerUnit: 2,
        targetMargin: 50,
        dealSize: 60_000,
        customerSegment: 'enterprise',
      });

      expect(report.formula.includedUnits).toBe(100);
      expect(report.comps.map((c) => c.name)).toEqual(['DeepL']);
    });
  });
});
