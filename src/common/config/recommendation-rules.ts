import type { BusinessModel, CostVariance, PricingRecommendation } from '../types/scoring';

export interface RecommendationRule {
  model: BusinessModel;
  /** Omitted matches either ROI type. */
  hardRoi?: boolean;
  /** Omitted matches any variance. */
  costVariance?: CostVariance[];
  recommendation: PricingRecommendation;
}

/** Evaluated top to bottom; the first matching rule wins. */
export const recommendationRules: RecommendationRule[] = [
  {
    model: 'Copilot',
    hardRoi: true,
    costVariance: ['low'],
    recommendation: {
      modelName: 'Per-seat + Feature Tiers',
      rationale:
        'Your copilot delivers measurable value with predictable costs. Per-seat pricing captures value as adoption grows, while feature tiers let you segment by willingness-to-pay.',
      formulaType: 'per_seat',
    },
  },
  {
    model: 'Copilot',
    recommendation: {
      modelName: 'Hybrid (Base + Usage Tiers)',
      rationale:
        'A platform fee provides revenue predictability while usage-based tiers align your revenue with the value users extract. This protects margins when costs are variable or ROI is soft.',
      formulaType: 'hybrid',
    },
  },
  {
    model: 'Agent',
    hardRoi: true,
    costVariance: ['low', 'moderate'],
    recommendation: {
      modelName: 'Outcome-based',
      rationale:
        'Your agent delivers measurable results with manageable cost variance. Charging per outcome aligns your price directly with the value customers receive, making the ROI self-evident.',
      formulaType: 'outcome',
    },
  },
  {
    model: 'Agent',
    hardRoi: true,
    costVariance: ['high'],
    recommendation: {
      modelName: 'Hybrid (Base + Outcome Credits)',
      rationale:
        'Your agent delivers hard ROI but high cost variance means pure outcome pricing risks margin erosion. A base fee covers fixed costs while outcome credits capture upside.',
      formulaType: 'hybrid',
    },
  },
  {
    model: 'Agent',
    recommendation: {
      modelName: 'Workflow-based (Per Task)',
      rationale:
        'With soft ROI, charging per task completed makes the price concrete and predictable for buyers. It also naturally caps your cost exposure per unit of revenue.',
      formulaType: 'workflow',
    },
  },
  {
    model: 'AI-enabled Service',
    hardRoi: true,
    recommendation: {
      modelName: 'Outcome-based (Per Deliverable)',
      rationale:
        'Your service delivers measurable results that replace existing spend. Per-deliverable pricing anchors to the service you replace and makes ROI calculation trivial for the buyer.',
      formulaType: 'outcome',
    },
  },
  {
    model: 'AI-enabled Service',
    recommendation: {
      modelName: 'Workflow-based + SLA Tiers',
      rationale:
        'With soft ROI, workflow-based pricing keeps the unit economics clear while SLA tiers (turnaround time, quality guarantees) let you capture willingness-to-pay from premium customers.',
      formulaType: 'workflow',
    },
  },
];
