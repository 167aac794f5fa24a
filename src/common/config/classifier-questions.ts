import type { ChoiceQuestion } from '../types/questionnaire';
import type { ModelWeights } from '../types/scoring';

export const classifierQuestions: ChoiceQuestion<ModelWeights>[] = [
  {
    id: 'm1_q1',
    text: 'Does a human work alongside your AI while it produces each result?',
    helpText: 'Think about whether a person is in the loop in real time, not just reviewing afterwards.',
    options: [
      { value: 'yes', label: 'Yes, the user drives and the AI assists', example: 'An in-editor coding assistant', scores: { copilotScore: 3 } },
      { value: 'partial', label: 'Sometimes, a person checks or edits the output', scores: { copilotScore: 1, serviceScore: 1 } },
      { value: 'no', label: 'No, the AI works on its own', example: 'A bot that resolves support tickets end-to-end', scores: { agentScore: 2, serviceScore: 1 } },
    ],
  },
  {
    id: 'm1_q2',
    text: 'Can your AI complete a whole task without a human stepping in?',
    helpText: 'A task is finished when the customer would consider the job done.',
    options: [
      { value: 'yes', label: 'Yes, start to finish', scores: { agentScore: 3 } },
      { value: 'partial', label: 'Mostly, with a human approval step', scores: { agentScore: 1, serviceScore: 1 } },
      { value: 'no', label: 'No, it helps a person do the task', scores: { copilotScore: 2 } },
    ],
  },
  {
    id: 'm1_q3',
    text: 'Does your product replace work customers used to buy from an agency or service provider?',
    helpText: 'Consultants, freelancers, outsourced teams or agencies.',
    options: [
      { value: 'yes', label: 'Yes, we replace a service they paid for', example: 'Legal demand letters instead of paralegal hours', scores: { serviceScore: 3 } },
      { value: 'partial', label: 'Partly, we cover some of that work', scores: { serviceScore: 1, copilotScore: 1 } },
      { value: 'no', label: 'No, customers did this work in-house', scores: { agentScore: 1, copilotScore: 1 } },
    ],
  },
  {
    id: 'm1_q4',
    text: 'How do customers mostly interact with your product?',
    helpText: 'Pick the interaction that accounts for most of the value delivered.',
    options: [
      { value: 'chat', label: 'Chat or inline suggestions inside their tools', scores: { copilotScore: 2 } },
      { value: 'automation', label: 'They configure it once and it runs in the background', scores: { agentScore: 2 } },
      { value: 'output', label: 'They order and receive a finished deliverable', scores: { serviceScore: 2 } },
    ],
  },
  {
    id: 'm1_q5',
    text: 'How would your customers describe your product to a colleague?',
    helpText: 'Use the words your buyers would use, not your positioning.',
    options: [
      { value: 'advisor', label: '"It makes me faster at my job"', scores: { copilotScore: 2 } },
      { value: 'executor', label: '"It does the job for us"', scores: { agentScore: 2 } },
      { value: 'service_provider', label: '"It replaced our vendor"', scores: { serviceScore: 2 } },
    ],
  },
];
