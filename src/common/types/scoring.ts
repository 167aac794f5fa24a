export type BusinessModel = 'Copilot' | 'Agent' | 'AI-enabled Service';

export type ModelDimension = 'copilotScore' | 'agentScore' | 'serviceScore';

export type ModelWeights = Partial<Record<ModelDimension, number>>;

export type ModelTotals = Record<ModelDimension, number>;

export interface ClassificationResult {
  model: BusinessModel;
  confidence: number;
  totals: ModelTotals;
}

export type PositionAxis = 'xScore' | 'yScore';

export type PositionWeights = Record<PositionAxis, number>;

export type Quadrant = 'Revenue Engine' | 'Efficiency Machine' | 'Promise Zone' | 'Danger Zone';

export interface ValuePosition {
  xScore: number;
  yScore: number;
  quadrant: Quadrant;
}

export type FormulaType = 'hybrid' | 'outcome' | 'workflow' | 'per_seat';

export type CustomerSegment = 'smb' | 'mid_market' | 'enterprise';

export type CostVariance = 'low' | 'moderate' | 'high';

export interface FormulaResult {
  modelName: string;
  platformFeeAnnual: number;
  platformFeeMonthly: number;
  includedUnits: number;
  overageRate: number;
  effectivePricePerUnit: number;
  grossMargin: number;
  explanation: string;
}

export interface PricingRecommendation {
  modelName: string;
  rationale: string;
  formulaType: FormulaType;
}

export type HealthLabel = 'Early Stage' | 'Developing' | 'Strong' | 'Advanced';

export interface HealthScoreResult {
  percentage: number;
  label: HealthLabel;
  priorityIds: string[];
}
