import { Injectable, Logger } from '@nestjs/common';
import { HealthScoreService } from '../common/scoring/health-score.service';
import { healthQuestions } from '../common/config/health-questions';
import { healthLabels } from '../common/config/health-labels';
import type { HealthLabelData } from '../common/config/health-labels';
import type { RatingMap } from '../common/types/questionnaire';
import type { HealthScoreResult } from '../common/types/scoring';

const NO_GAP_THRESHOLD = 4;

export interface PriorityArea {
  id: string;
  question: string;
  radarLabel: string;
  score: number;
  action: string;
}

export interface HealthReport extends HealthScoreResult {
  labelData: HealthLabelData;
  ratings: Record<string, number>;
  priorities: PriorityArea[];
  noCriticalGaps: boolean;
}

@Injectable()
export class HealthCheckService {
  private readonly logger = new Logger(HealthCheckService.name);

  constructor(private healthScore: HealthScoreService) {}

  getQuestions() {
    return healthQuestions;
  }

  /** Score a (possibly partial) set of ratings; unrated questions take their default. */
  assess(ratings: RatingMap): HealthReport {
    const complete: Record<string, number> = {};
    for (const q of healthQuestions) {
      complete[q.id] = ratings[q.id] ?? q.default;
    }

    const result = this.healthScore.scoreHealth(
      complete,
      healthQuestions.map((q) => q.id),
    );
    const priorities = result.priorityIds.map((id) => this.toPriority(id, complete[id]));
    const noCriticalGaps = Object.values(complete).every((score) => score >= NO_GAP_THRESHOLD);

    this.logger.log(`Health check scored ${result.percentage}% (${result.label})`);

    return {
      ...result,
      labelData: healthLabels[result.label],
      ratings: complete,
      priorities,
      noCriticalGaps,
    };
  }

  private toPriority(id: string, score: number): PriorityArea {
    const question = healthQuestions.find((q) => q.id === id);
    return {
      id,
      question: question?.text ?? '',
      radarLabel: question?.radarLabel ?? '',
      score,
      action: question?.action ?? '',
    };
  }
}
