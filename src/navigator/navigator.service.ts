import { Injectable, Logger } from '@nestjs/common';
import { ClassifierService } from '../classifier/classifier.service';
import type { ClassificationReport } from '../classifier/classifier.service';
import { ValueMapService } from '../value-map/value-map.service';
import type { PositionReport } from '../value-map/value-map.service';
import { PricingService } from '../pricing/pricing.service';
import type { PricingReport } from '../pricing/pricing.service';
import { HealthCheckService } from '../health-check/health-check.service';
import type { HealthReport } from '../health-check/health-check.service';
import type { AnswerSet, RatingMap } from '../common/types/questionnaire';
import type { CostVariance } from '../common/types/scoring';

export interface NavigatorInput {
  classifierAnswers: AnswerSet;
  valueAnswers: AnswerSet;
  pricing: {
    costPerUnit: number;
    customerSegment: string;
    dealSize: number;
    targetMargin: number;
    costVariance: CostVariance;
  };
  healthRatings: RatingMap;
}

/** Results of every step, threaded explicitly from one step into the next. */
export interface NavigatorAssessment {
  classification: ClassificationReport;
  position: PositionReport;
  pricing: PricingReport;
  health: HealthReport;
}

@Injectable()
export class NavigatorService {
  private readonly logger = new Logger(NavigatorService.name);

  constructor(
    private classifier: ClassifierService,
    private valueMap: ValueMapService,
    private pricingService: PricingService,
    private healthCheck: HealthCheckService,
  ) {}

  assess(input: NavigatorInput): NavigatorAssessment {
    const classification = this.classifier.classify(input.classifierAnswers);
    const position = this.valueMap.mapPosition(input.valueAnswers);
    const pricing = this.pricingService.generate({
      ...input.pricing,
      businessModel: classification.model,
      quadrant: position.quadrant,
    });
    const health = this.healthCheck.assess(input.healthRatings);

    this.logger.log(
      `Assessment complete: ${classification.model} / ${position.quadrant} -> ` +
        `${pricing.recommendation.modelName}, health ${health.percentage}%`,
    );

    return { classification, position, pricing, health };
  }
}
