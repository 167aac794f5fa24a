import type { BusinessModel } from '../types/scoring';

export interface BusinessModelData {
  model: BusinessModel;
  description: string;
  examples: string[];
  pricingImplications: string;
  principles: string[];
}

export const businessModels: Record<BusinessModel, BusinessModelData> = {
  Copilot: {
    model: 'Copilot',
    description:
      'Your AI works alongside a human user in real time, augmenting their capabilities rather than replacing them. The user stays in the driver\'s seat while your AI suggests, drafts, and recommends. Value scales with how many people adopt the tool across an organization.',
    examples: [
      'GitHub Copilot - AI pair programmer that suggests code in-editor',
      'Grammarly - AI writing assistant that improves text as you type',
      "Notion AI - drafts, summarizes, and edits within the user's workflow",
    ],
    pricingImplications:
      'Per-seat pricing works well because value is tied to individual users. Consider feature tiers to capture different willingness-to-pay across segments.',
    principles: [
      'Price for adoption: copilots succeed when every user activates. Keep per-seat prices accessible enough for org-wide rollout.',
      "Feature-gate, don't usage-gate: copilot value is continuous. Users shouldn't worry about running out of interactions.",
      'Track seats x engagement: revenue scales with both headcount and daily active usage.',
    ],
  },
  Agent: {
    model: 'Agent',
    description:
      'Your AI operates autonomously or semi-autonomously, completing entire tasks or workflows with minimal human intervention. The user defines the goal and the AI executes, sometimes with a human review step. Value is measured in outcomes delivered, not time spent using the product.',
    examples: [
      'Intercom Fin - AI agent that resolves customer support tickets autonomously',
      'Devin - AI software engineer that completes coding tasks end-to-end',
      'Resolve AI - autonomous incident response and uptime management',
    ],
    pricingImplications:
      'Outcome-based or per-task pricing aligns cost with value delivered. Customers pay for results, not access, which de-risks the purchase decision.',
    principles: [
      'Charge for outcomes, not effort: agents replace work. Price the result, not the compute behind it.',
      'Cap your downside: use minimum commitments to protect against usage variance while keeping the outcome promise.',
      'Build trust with transparency: show customers what the agent did and how much it saved. This drives upsell.',
    ],
  },
  'AI-enabled Service': {
    model: 'AI-enabled Service',
    description:
      'Your AI delivers a finished output or service result, often replacing work previously done by agencies, consultants, or service providers. There may be a human QA layer, but the AI does the heavy lifting. Customers evaluate you against the cost of the service you replace.',
    examples: [
      'EvenUp - AI-generated legal demand packages replacing paralegal work',
      'Pepper Content - AI content creation replacing freelance writers',
      'Jasper - AI marketing content replacing agency copywriting',
    ],
    pricingImplications:
      'Price anchored to the cost of the service you replace, typically at a discount. Per-deliverable pricing makes the value proposition concrete.',
    principles: [
      'Anchor to what you replace: your pricing ceiling is the cost of the human service you displace, minus a discount for switching risk.',
      'Per-deliverable makes ROI obvious: when customers pay per output, they can directly compare cost against the alternative.',
      'Add SLA tiers for premium capture: speed, quality guarantees, and dedicated support justify 2-3x pricing for enterprise.',
    ],
  },
};

export const businessModelOrder: BusinessModel[] = ['Copilot', 'Agent', 'AI-enabled Service'];
