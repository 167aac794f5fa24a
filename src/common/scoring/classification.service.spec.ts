import { Test } from '@nestjs/testing';
import { ClassificationService } from './classification.service';
import type { ChoiceQuestion } from '../types/questionnaire';
import type { ModelWeights } from '../types/scoring';

const COPILOT_ANSWERS = { m1_q1: 'yes', m1_q2: 'no', m1_q3: 'partial', m1_q4: 'chat', m1_q5: 'advisor' };
const AGENT_ANSWERS = { m1_q1: 'no', m1_q2: 'yes', m1_q3: 'no', m1_q4: 'automation', m1_q5: 'executor' };
const SERVICE_ANSWERS = {
  m1_q1: 'no',
  m1_q2: 'partial',
  m1_q3: 'yes',
  m1_q4: 'output',
  m1_q5: 'service_provider',
};

describe('ClassificationService', () => {
  let service: ClassificationService;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [ClassificationService],
    }).compile();

    service = moduleRef.get(ClassificationService);
  });

  it('classifies a copilot-leaning answer set', () => {
    expect(service.classify(COPILOT_ANSWERS)).toEqual({
      model: 'Copilot',
      confidence: 90.9,
      totals: { copilotScore: 10, agentScore: 0, serviceScore: 1 },
    });
  });

  it('classifies an agent-leaning answer set', () => {
    const result = service.classify(AGENT_ANSWERS);
    expect(result.model).toBe('Agent');
    expect(result.confidence).toBe(83.3);
  });

  it('classifies a service-leaning answer set', () => {
    const result = service.classify(SERVICE_ANSWERS);
    expect(result.model).toBe('AI-enabled Service');
    expect(result.confidence).toBe(75);
  });

  it.each([COPILOT_ANSWERS, AGENT_ANSWERS, SERVICE_ANSWERS])(
    'gives more than half the weight to the winning model',
    (answers) => {
      expect(service.classify(answers).confidence).toBeGreaterThan(50);
    },
  );

  it('returns zero confidence and the default model for no answers', () => {
    expect(service.classify({})).toEqual({
      model: 'Copilot',
      confidence: 0,
      totals: { copilotScore: 0, agentScore: 0, serviceScore: 0 },
    });
  });

  it('ignores unknown questions and values that match no option', () => {
    const result = service.classify({ m1_q1: 'maybe', m1_q2: 1, unknown_q: 'yes' });
    expect(result.confidence).toBe(0);
  });

  it('breaks ties in favour of Copilot, then Agent', () => {
    expect(service.classify({ m1_q4: 'automation', m1_q5: 'advisor' })).toMatchObject({
      model: 'Copilot',
      confidence: 50,
    });
    expect(service.classify({ m1_q4: 'automation', m1_q5: 'service_provider' })).toMatchObject({
      model: 'Agent',
      confidence: 50,
    });
  });

  it('scores against a caller-supplied table', () => {
    const questions: ChoiceQuestion<ModelWeights>[] = [
      {
        id: 'only',
        text: 'Only question',
        helpText: '',
        options: [{ value: 'a', label: 'A', scores: { serviceScore: 1, agentScore: 3 } }],
      },
    ];
    expect(service.classify({ only: 'a' }, questions)).toMatchObject({ model: 'Agent', confidence: 75 });
  });

  it('keeps confidence within 0-100 when a table carries negative weights', () => {
    const questions: ChoiceQuestion<ModelWeights>[] = [
      {
        id: 'penalty',
        text: 'Penalising question',
        helpText: '',
        options: [{ value: 'a', label: 'A', scores: { copilotScore: 3, agentScore: -2 } }],
      },
    ];
    expect(service.classify({ penalty: 'a' }, questions)).toEqual({
      model: 'Copilot',
      confidence: 100,
      totals: { copilotScore: 3, agentScore: -2, serviceScore: 0 },
    });
  });

  it('is deterministic for identical input', () => {
    expect(service.classify(SERVICE_ANSWERS)).toEqual(service.classify(SERVICE_ANSWERS));
  });
});
