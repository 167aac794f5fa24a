import { Injectable } from '@nestjs/common';
import type { AnswerSet, ChoiceQuestion } from '../types/questionnaire';
import type { PositionWeights, Quadrant, ValuePosition } from '../types/scoring';
import { valueQuestions } from '../config/value-questions';
import { clamp, roundTo } from '../math/rounding';

/**
 * y = 0 counts as soft ROI, x = 0 counts as revenue side.
 */
export function quadrantFor(x: number, y: number): Quadrant {
  if (x >= 0 && y > 0) return 'Revenue Engine';
  if (x < 0 && y > 0) return 'Efficiency Machine';
  if (x >= 0) return 'Promise Zone';
  return 'Danger Zone';
}

@Injectable()
export class ValuePositionService {
  mapPosition(
    answers: AnswerSet,
    questions: ChoiceQuestion<PositionWeights>[] = valueQuestions,
  ): ValuePosition {
    const xScores: number[] = [];
    const yScores: number[] = [];

    for (const question of questions) {
      const selected = answers[question.id];
      if (selected === undefined) continue;

      const option = question.options.find((opt) => opt.value === selected);
      if (!option) continue;

      xScores.push(option.scores.xScore);
      yScores.push(option.scores.yScore);
    }

    const xScore = roundTo(clamp(this.mean(xScores), -1, 1), 3);
    const yScore = roundTo(clamp(this.mean(yScores), -1, 1), 3);

    return { xScore, yScore, quadrant: quadrantFor(xScore, yScore) };
  }

  private mean(values: number[]): number {
    if (values.length === 0) return 0;
    return values.reduce((sum, v) => sum + v, 0) / values.length;
  }
}
