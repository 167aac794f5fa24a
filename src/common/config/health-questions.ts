import type { RatingQuestion } from '../types/questionnaire';

const rating = (
  id: string,
  text: string,
  radarLabel: string,
  action: string,
): RatingQuestion => ({ id, text, radarLabel, action, min: 1, max: 5, default: 3 });

export const healthQuestions: RatingQuestion[] = [
  rating(
    'm4_q1',
    'How well do you understand how AI unit economics differ from SaaS?',
    'AI Economics',
    'Study the key differences between AI and SaaS unit economics. AI companies typically have 50-60% gross margins vs 80-90% for SaaS. Factor in inference costs, model training, and data processing when calculating your true margins.',
  ),
  rating(
    'm4_q2',
    'How well does your pricing model match the way your product delivers value?',
    'Model Fit',
    "Map your product's delivery model (copilot, agent, or service) to the pricing models that align with customer expectations. Misalignment between how value is delivered and how you charge is the #1 cause of pricing friction.",
  ),
  rating(
    'm4_q3',
    'How quickly can a first-time visitor understand what they will pay?',
    'Price Clarity',
    "Simplify your pricing page to pass the '5-second test'. Consider removing usage dimensions that require explanation and anchoring on a metric your buyer already tracks.",
  ),
  rating(
    'm4_q4',
    'How well do you monitor and control per-customer inference costs?',
    'Cost Management',
    'Build a cost monitoring dashboard tracking per-customer inference costs. Set up alerts for cost spikes and consider usage caps, prompt caching, or model cascading to reduce cost variance.',
  ),
  rating(
    'm4_q5',
    'How clearly have you defined the moment a free user should convert to paid?',
    'Free→Paid',
    'Define specific activation signals (e.g., 3+ high-value outputs, team sharing, integration setup) that indicate a user has experienced enough value to convert. Time-based trials often underperform value-based triggers for AI products.',
  ),
  rating(
    'm4_q6',
    'How well do you track AI-specific business metrics?',
    'AI Metrics',
    "Start tracking AI-specific metrics: cost per AI interaction, AI resolution rate, value delivered per dollar of inference cost, and output quality scores. These supplement but don't replace NRR and CAC.",
  ),
  rating(
    'm4_q7',
    'How complete is your unit economics model, including hidden costs?',
    'Unit Economics',
    'Build a unit economics model that includes all hidden costs: inference API calls, fine-tuning, human review time, data storage, and retraining cycles. Many AI companies underestimate true costs by 30-50%.',
  ),
  rating(
    'm4_q8',
    'How defensible is your pricing against competitors built on the same models?',
    'Pricing Moat',
    'If you and competitors use similar foundation models, your pricing differentiation must come from proprietary data, fine-tuning, workflow integration, or domain expertise. Price the outcome, not the model.',
  ),
  rating(
    'm4_q9',
    'How confident are you that your pricing survives cost or usage shocks?',
    'Sustainability',
    'Stress-test your pricing against 3 scenarios: inference costs increase 2x, customer usage doubles, and a competitor offers a free tier. If your pricing breaks under any scenario, you have a sustainability gap to address.',
  ),
  rating(
    'm4_q10',
    'How well does your pricing scale without manual work?',
    'Scalability',
    'Audit your pricing for scalability friction: custom quotes, manual provisioning, complex metering, or per-customer exceptions. Each adds operational overhead that compounds. Design for self-serve where possible.',
  ),
];
