export interface LlmPreset {
  provider: string;
  /** Blended input/output cost per 1K tokens; null when the user must supply it. */
  costPer1kTokens: number | null;
}

export const CUSTOM_PROVIDER_DEFAULT_COST = 0.005;

export const llmPresets: LlmPreset[] = [
  { provider: 'OpenAI (GPT-4o)', costPer1kTokens: 0.01 },
  { provider: 'OpenAI (GPT-4o mini)', costPer1kTokens: 0.0004 },
  { provider: 'Anthropic (Claude Sonnet)', costPer1kTokens: 0.009 },
  { provider: 'Anthropic (Claude Haiku)', costPer1kTokens: 0.002 },
  { provider: 'Open source / self-hosted', costPer1kTokens: 0.001 },
  { provider: 'Other / custom', costPer1kTokens: null },
];
