import type { ChoiceQuestion } from '../types/questionnaire';
import type { PositionWeights } from '../types/scoring';

// xScore: cost savings (-1) .. revenue uplift (+1)
// yScore: soft ROI (-1) .. hard ROI (+1)
export const valueQuestions: ChoiceQuestion<PositionWeights>[] = [
  {
    id: 'm2_q1',
    text: 'What is the primary value your product delivers?',
    helpText: 'Choose the outcome your buyer cites when justifying the purchase.',
    options: [
      { value: 'revenue', label: 'More revenue or pipeline', scores: { xScore: 1.0, yScore: 0.0 } },
      { value: 'cost_reduction', label: 'Lower costs or headcount', scores: { xScore: -1.0, yScore: 0.25 } },
      { value: 'time_savings', label: 'Time saved for the team', scores: { xScore: -0.5, yScore: -0.5 } },
    ],
  },
  {
    id: 'm2_q2',
    text: 'Can customers measure the impact of your product in dollars?',
    helpText: 'Could the buyer show the number to their CFO?',
    options: [
      { value: 'yes', label: 'Yes, with data they already have', scores: { xScore: 0.0, yScore: 1.0 } },
      { value: 'partial', label: 'Roughly, with some assumptions', scores: { xScore: 0.0, yScore: 0.0 } },
      { value: 'no', label: 'No, the benefit is mostly qualitative', scores: { xScore: 0.0, yScore: -1.0 } },
    ],
  },
  {
    id: 'm2_q3',
    text: 'What happens if a customer stops using your product tomorrow?',
    helpText: 'Think about the first thing the customer would notice.',
    options: [
      { value: 'lose_revenue', label: 'They lose revenue', scores: { xScore: 1.0, yScore: 0.5 } },
      { value: 'slower', label: 'Work gets slower and costs go up', scores: { xScore: -0.5, yScore: 0.25 } },
      { value: 'no_pain', label: 'Not much changes right away', scores: { xScore: 0.0, yScore: -1.0 } },
    ],
  },
  {
    id: 'm2_q4',
    text: 'How do customers see the results your product produces?',
    helpText: 'Where does the evidence of value live today?',
    options: [
      { value: 'dashboard', label: 'A dashboard with hard metrics', scores: { xScore: 0.0, yScore: 0.5 } },
      { value: 'reports', label: 'Periodic reports we put together', scores: { xScore: 0.0, yScore: 0.0 } },
      { value: 'qualitative', label: 'Anecdotes and user feedback', scores: { xScore: 0.0, yScore: -0.5 } },
    ],
  },
  {
    id: 'm2_q5',
    text: 'Does your product replace existing headcount or budget?',
    helpText: 'Budget replacement makes procurement easier but invites cost comparisons.',
    options: [
      { value: 'yes', label: 'Yes, it replaces a line item', scores: { xScore: -1.0, yScore: 0.5 } },
      { value: 'partial', label: 'It offsets part of an existing cost', scores: { xScore: -0.5, yScore: 0.0 } },
      { value: 'no', label: 'No, it is net-new spend', scores: { xScore: 0.5, yScore: 0.0 } },
    ],
  },
];
