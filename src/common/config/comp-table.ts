import type { BusinessModel } from '../types/scoring';

export interface ComparableCompany {
  name: string;
  modelType: BusinessModel;
  pricingModel: string;
  pricingDetail: string;
  valueDriver: string;
}

export const compTable: ComparableCompany[] = [
  { name: 'DeepL', modelType: 'Copilot', pricingModel: 'Hybrid', pricingDetail: 'Per user + per editable file', valueDriver: 'Accuracy & customization' },
  { name: 'EvenUp', modelType: 'AI-enabled Service', pricingModel: 'Outcome-based', pricingDetail: 'Per AI-generated demand package', valueDriver: 'Legal time saved' },
  { name: 'Graph AI', modelType: 'AI-enabled Service', pricingModel: 'Outcome-based', pricingDetail: 'Per case processed', valueDriver: 'Regulatory compliance' },
  { name: 'Intercom (Fin)', modelType: 'Agent', pricingModel: 'Outcome-based', pricingDetail: '$0.99 per AI resolution', valueDriver: 'Support efficiency' },
  { name: 'Leena AI', modelType: 'Agent', pricingModel: 'Outcome-based', pricingDetail: 'ROI-basis, ticket threshold', valueDriver: 'Back office automation' },
  { name: 'Pepper Content', modelType: 'AI-enabled Service', pricingModel: 'Outcome-based', pricingDetail: 'Per word/graphic/content piece', valueDriver: 'Assets created' },
  { name: 'Resolve AI', modelType: 'Agent', pricingModel: 'Outcome-based', pricingDetail: 'Pay when AI ensures uptime', valueDriver: 'Reliability' },
  { name: 'Sett.ai', modelType: 'Agent', pricingModel: 'Hybrid', pricingDetail: 'Per module + share of ad spend', valueDriver: 'Campaign performance' },
  { name: 'Zenskar', modelType: 'AI-enabled Service', pricingModel: 'Hybrid', pricingDetail: 'Annual subscription + usage fees', valueDriver: 'Billing automation' },
];

export function compsForModel(model: BusinessModel): ComparableCompany[] {
  return compTable.filter((c) => c.modelType === model);
}
