import { Injectable } from '@nestjs/common';
import type { RatingMap } from '../types/questionnaire';
import type { HealthLabel, HealthScoreResult } from '../types/scoring';
import { healthLabelOrder, healthLabels } from '../config/health-labels';
import { roundTo } from '../math/rounding';

const MAX_RATING = 5;
const PRIORITY_COUNT = 3;

@Injectable()
export class HealthScoreService {
  /**
   * `order` fixes the tie order of priorities. Without it, object key order applies,
   * which lists integer-like ids first; ids missing from `order` follow in key order.
   */
  scoreHealth(scores: RatingMap, order: readonly string[] = []): HealthScoreResult {
    const entries = this.orderedEntries(scores, order);
    const total = entries.reduce((sum, [, score]) => sum + score, 0);
    const maxPossible = entries.length * MAX_RATING;
    const percentage = maxPossible > 0 ? roundTo((100 * total) / maxPossible, 1) : 0;

    // Array.prototype.sort is stable, so equal scores keep their input order.
    const priorityIds = [...entries]
      .sort(([, a], [, b]) => a - b)
      .slice(0, PRIORITY_COUNT)
      .map(([id]) => id);

    return { percentage, label: this.getLabel(percentage), priorityIds };
  }

  private orderedEntries(scores: RatingMap, order: readonly string[]): [string, number][] {
    const ids = [...new Set([...order, ...Object.keys(scores)])];
    return ids.flatMap((id): [string, number][] => (Object.hasOwn(scores, id) ? [[id, scores[id]]] : []));
  }

  getLabel(percentage: number): HealthLabel {
    const match = healthLabelOrder.find((label) => percentage >= healthLabels[label].minPercentage);
    return match ?? 'Early Stage';
  }
}
