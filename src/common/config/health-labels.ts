import type { HealthLabel } from '../types/scoring';

export interface HealthLabelData {
  label: HealthLabel;
  minPercentage: number;
  color: string;
  badge: string;
}

export const healthLabels: Record<HealthLabel, HealthLabelData> = {
  'Early Stage': {
    label: 'Early Stage',
    minPercentage: 0,
    color: '#EF4444',
    badge: 'Focus on the fundamentals before scaling',
  },
  Developing: {
    label: 'Developing',
    minPercentage: 50,
    color: '#EAB308',
    badge: 'Good foundation, key gaps to address',
  },
  Strong: {
    label: 'Strong',
    minPercentage: 70,
    color: '#22C55E',
    badge: 'Well-positioned, fine-tune the details',
  },
  Advanced: {
    label: 'Advanced',
    minPercentage: 85,
    color: '#0EA5E9',
    badge: 'Pricing is a competitive advantage',
  },
};

/** Highest threshold first; the first label whose floor the percentage reaches wins. */
export const healthLabelOrder: HealthLabel[] = ['Advanced', 'Strong', 'Developing', 'Early Stage'];
