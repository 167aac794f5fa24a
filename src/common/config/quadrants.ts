import type { Quadrant } from '../types/scoring';

export interface QuadrantData {
  quadrant: Quadrant;
  description: string;
  pricingImplication: string;
  hardRoi: boolean;
  renewalRisk: boolean;
}

export const RENEWAL_RISK_WARNING =
  'Products in this quadrant face the highest renewal risk as AI pilots hit their first renewal cycles. Consider: can you move toward harder ROI by closing the loop on outcomes?';

export const quadrants: Record<Quadrant, QuadrantData> = {
  'Revenue Engine': {
    quadrant: 'Revenue Engine',
    description:
      'Your product delivers measurable, hard-to-argue-with ROI that directly drives revenue growth. Customers can point to concrete revenue gains.',
    pricingImplication:
      'You have pricing power. Anchor to the revenue you generate and consider value-based or outcome-based pricing with confidence.',
    hardRoi: true,
    renewalRisk: false,
  },
  'Efficiency Machine': {
    quadrant: 'Efficiency Machine',
    description:
      'Your product delivers hard, measurable ROI through cost reduction. Customers can calculate exactly what they save by using you.',
    pricingImplication:
      'Price as a fraction of documented savings. Budget replacement framing makes procurement straightforward, but watch for deflationary pressure.',
    hardRoi: true,
    renewalRisk: false,
  },
  'Promise Zone': {
    quadrant: 'Promise Zone',
    description:
      "Your product enables revenue upside but the ROI is hard to quantify. Customers believe in the value but can't easily prove it with data.",
    pricingImplication:
      'Build measurement into your product to move toward hard ROI. In the meantime, use hybrid pricing with a low base to reduce purchase friction.',
    hardRoi: false,
    renewalRisk: true,
  },
  'Danger Zone': {
    quadrant: 'Danger Zone',
    description:
      "Your product saves costs but the ROI is hard to prove. This is the hardest position to price from: you're competing for budget without concrete evidence of impact.",
    pricingImplication:
      'Prioritize building ROI dashboards and concrete metrics. Keep pricing low and simple to minimize purchase friction while you build proof points.',
    hardRoi: false,
    renewalRisk: true,
  },
};

export const quadrantOrder: Quadrant[] = ['Revenue Engine', 'Efficiency Machine', 'Promise Zone', 'Danger Zone'];
