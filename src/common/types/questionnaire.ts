export type AnswerValue = string | number;

/** Question id -> selected option value. Unanswered questions are absent. */
export type AnswerSet = Readonly<Record<string, AnswerValue>>;

/** Question id -> 1-5 self-assessment rating. */
export type RatingMap = Readonly<Record<string, number>>;

export interface AnswerOption<S> {
  value: string;
  label: string;
  example?: string;
  scores: S;
}

export interface ChoiceQuestion<S> {
  id: string;
  text: string;
  helpText: string;
  options: AnswerOption<S>[];
}

export interface RatingQuestion {
  id: string;
  text: string;
  radarLabel: string;
  min: number;
  max: number;
  default: number;
  action: string;
}

export type PricingInputKind = 'number' | 'slider' | 'radio';

export interface PricingInputQuestion {
  id: string;
  field: string;
  kind: PricingInputKind;
  text: string;
  helpText: string;
  min?: number;
  max?: number;
  default: AnswerValue;
  options?: { value: string; label: string }[];
}
