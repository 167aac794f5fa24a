import { Injectable, Logger } from '@nestjs/common';
import { ClassificationService } from '../common/scoring/classification.service';
import { businessModels } from '../common/config/business-models';
import type { BusinessModelData } from '../common/config/business-models';
import { compsForModel } from '../common/config/comp-table';
import type { ComparableCompany } from '../common/config/comp-table';
import { classifierQuestions } from '../common/config/classifier-questions';
import type { AnswerSet } from '../common/types/questionnaire';
import type { ClassificationResult } from '../common/types/scoring';

export interface ClassificationReport extends ClassificationResult {
  modelData: BusinessModelData;
  comps: ComparableCompany[];
}

@Injectable()
export class ClassifierService {
  private readonly logger = new Logger(ClassifierService.name);

  constructor(private classification: ClassificationService) {}

  getQuestions() {
    return classifierQuestions;
  }

  classify(answers: AnswerSet): ClassificationReport {
    const result = this.classification.classify(answers);

    if (result.confidence === 0) {
      this.logger.warn('No scored answers; falling back to default model');
    } else {
      this.logger.log(`Classified as ${result.model} (${result.confidence}% confidence)`);
    }

    return {
      ...result,
      modelData: businessModels[result.model],
      comps: compsForModel(result.model),
    };
  }
}
