import type { CostVariance, CustomerSegment } from '../types/scoring';
import type { PricingInputQuestion } from '../types/questionnaire';

export interface VolumeStep {
  maxDealSize: number;
  monthlyUnits: number;
}

/** Annual deal size -> estimated monthly units. First step whose ceiling covers the deal wins. */
export const DEAL_SIZE_VOLUME_STEPS: readonly VolumeStep[] = [
  { maxDealSize: 5_000, monthlyUnits: 50 },
  { maxDealSize: 25_000, monthlyUnits: 200 },
  { maxDealSize: 100_000, monthlyUnits: 500 },
  { maxDealSize: Infinity, monthlyUnits: 1_000 },
];

export const SEGMENT_SEATS: ReadonlyMap<string, number> = new Map<string, number>([
  ['smb', 5],
  ['mid_market', 25],
  ['enterprise', 100],
]);

export const DEFAULT_SEATS = 25;

export interface PricingDefaults {
  costPerUnit: number;
  customerSegment: CustomerSegment;
  dealSize: number;
  targetMargin: number;
  costVariance: CostVariance;
}

export const PRICING_DEFAULTS: PricingDefaults = {
  costPerUnit: 1.0,
  customerSegment: 'mid_market',
  dealSize: 15_000,
  targetMargin: 65,
  costVariance: 'moderate',
};

export const pricingQuestions: PricingInputQuestion[] = [
  {
    id: 'm3_q1',
    field: 'costPerUnit',
    kind: 'number',
    text: 'What does it cost you to deliver one unit of value?',
    helpText: 'Use the Unit Cost Calculator if you are not sure. Include inference, human review and infrastructure.',
    min: 0.01,
    default: PRICING_DEFAULTS.costPerUnit,
  },
  {
    id: 'm3_q2',
    field: 'customerSegment',
    kind: 'radio',
    text: 'Who is your primary customer?',
    helpText: 'Segment drives the typical seat count per account.',
    default: PRICING_DEFAULTS.customerSegment,
    options: [
      { value: 'smb', label: 'Small business' },
      { value: 'mid_market', label: 'Mid-market' },
      { value: 'enterprise', label: 'Enterprise' },
    ],
  },
  {
    id: 'm3_q3',
    field: 'dealSize',
    kind: 'number',
    text: 'What annual deal size are you targeting per customer ($)?',
    helpText: 'Deal size drives the expected monthly volume per account.',
    min: 0,
    default: PRICING_DEFAULTS.dealSize,
  },
  {
    id: 'm3_q4',
    field: 'targetMargin',
    kind: 'slider',
    text: 'What gross margin are you targeting (%)?',
    helpText: 'SaaS companies target 80%+. AI companies typically run 50-65%.',
    min: 40,
    max: 85,
    default: PRICING_DEFAULTS.targetMargin,
  },
  {
    id: 'm3_q5',
    field: 'costVariance',
    kind: 'radio',
    text: 'How much does your cost per unit vary between customers?',
    helpText: 'Heavy users, long prompts and multi-step agents all widen the spread.',
    default: PRICING_DEFAULTS.costVariance,
    options: [
      { value: 'low', label: 'Low, costs are predictable' },
      { value: 'moderate', label: 'Moderate, within 2x' },
      { value: 'high', label: 'High, some customers cost 5x more' },
    ],
  },
];
