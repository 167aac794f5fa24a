import { Injectable, Logger } from '@nestjs/common';
import type { AnswerSet, ChoiceQuestion } from '../types/questionnaire';
import type {
  BusinessModel,
  ClassificationResult,
  ModelDimension,
  ModelTotals,
  ModelWeights,
} from '../types/scoring';
import { classifierQuestions } from '../config/classifier-questions';
import { clamp, roundTo } from '../math/rounding';

/**
 * Tie-break order for equal totals: a later dimension only wins when its
 * total is strictly greater, so Copilot > Agent > AI-enabled Service.
 */
export const DIMENSION_PRIORITY: readonly ModelDimension[] = ['copilotScore', 'agentScore', 'serviceScore'];

const DIMENSION_MODELS: Record<ModelDimension, BusinessModel> = {
  copilotScore: 'Copilot',
  agentScore: 'Agent',
  serviceScore: 'AI-enabled Service',
};

@Injectable()
export class ClassificationService {
  private readonly logger = new Logger(ClassificationService.name);

  classify(
    answers: AnswerSet,
    questions: ChoiceQuestion<ModelWeights>[] = classifierQuestions,
  ): ClassificationResult {
    const totals = this.accumulate(answers, questions);

    let winner = DIMENSION_PRIORITY[0];
    for (const dim of DIMENSION_PRIORITY) {
      if (totals[dim] > totals[winner]) winner = dim;
    }

    const sum = DIMENSION_PRIORITY.reduce((acc, dim) => acc + totals[dim], 0);
    // Caller-supplied tables may carry negative weights, which push the raw share outside 0-100.
    const confidence = sum > 0 ? clamp(roundTo((100 * totals[winner]) / sum, 1), 0, 100) : 0;

    this.logger.debug(
      `Totals copilot=${totals.copilotScore} agent=${totals.agentScore} service=${totals.serviceScore}`,
    );

    return { model: DIMENSION_MODELS[winner], confidence, totals };
  }

  private accumulate(answers: AnswerSet, questions: ChoiceQuestion<ModelWeights>[]): ModelTotals {
    const totals: ModelTotals = { copilotScore: 0, agentScore: 0, serviceScore: 0 };

    for (const question of questions) {
      const selected = answers[question.id];
      if (selected === undefined) continue;

      const option = question.options.find((opt) => opt.value === selected);
      if (!option) continue;

      for (const dim of DIMENSION_PRIORITY) {
        totals[dim] += option.scores[dim] ?? 0;
      }
    }

    return totals;
  }
}
