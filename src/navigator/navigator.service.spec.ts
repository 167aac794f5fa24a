import { Test } from '@nestjs/testing';
import { CommonModule } from '../common/common.module';
import { NavigatorModule } from './navigator.module';
import { NavigatorService } from './navigator.service';
import type { NavigatorInput } from './navigator.service';

const INPUT: NavigatorInput = {
  classifierAnswers: { m1_q1: 'no', m1_q2: 'yes', m1_q3: 'no', m1_q4: 'automation', m1_q5: 'executor' },
  valueAnswers: { m2_q1: 'cost_reduction', m2_q2: 'yes', m2_q3: 'slower', m2_q4: 'dashboard', m2_q5: 'yes' },
  pricing: {
    costPerUnit: 2,
    customerSegment: 'mid_market',
    dealSize: 60_000,
    targetMargin: 50,
    costVariance: 'moderate',
  },
  healthRatings: {
    m4_q1: 4,
    m4_q2: 2,
    m4_q3: 5,
    m4_q4: 1,
    m4_q5: 3,
    m4_q6: 3,
    m4_q7: 2,
    m4_q8: 4,
    m4_q9: 3,
    m4_q10: 5,
  },
};

describe('NavigatorService', () => {
  let service: NavigatorService;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [CommonModule, NavigatorModule],
    }).compile();

    service = moduleRef.get(NavigatorService);
  });

  it('threads model and quadrant into the pricing recommendation', () => {
    const assessment = service.assess(INPUT);

    expect(assessment.classification.model).toBe('Agent');
    expect(assessment.position.quadrant).toBe('Efficiency Machine');
    expect(assessment.pricing.recommendation.modelName).toBe('Outcome-based');
    expect(assessment.pricing.formula.platformFeeAnnual).toBe(42_000);
    expect(assessment.health.percentage).toBe(64);
    expect(assessment.health.priorityIds).toEqual(['m4_q4', 'm4_q2', 'm4_q7']);
  });

  it('switches to per-task pricing when the ROI is soft', () => {
    const assessment = service.assess({
      ...INPUT,
      valueAnswers: { m2_q1: 'time_savings', m2_q2: 'no', m2_q3: 'no_pain', m2_q4: 'qualitative', m2_q5: 'partial' },
    });

    expect(assessment.position.quadrant).toBe('Danger Zone');
    expect(assessment.position.renewalWarning).not.toBeNull();
    expect(assessment.pricing.recommendation.formulaType).toBe('workflow');
    expect(assessment.pricing.formula.platformFeeMonthly).toBe(2_000);
  });

  it('returns the same assessment for the same input', () => {
    expect(service.assess(INPUT)).toEqual(service.assess(INPUT));
  });
});
