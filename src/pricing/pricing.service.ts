import { Injectable, Logger } from '@nestjs/common';
import { PricingFormulaService } from '../common/scoring/pricing-formula.service';
import { recommendationRules } from '../common/config/recommendation-rules';
import type { RecommendationRule } from '../common/config/recommendation-rules';
import { quadrants } from '../common/config/quadrants';
import { businessModels } from '../common/config/business-models';
import { compsForModel } from '../common/config/comp-table';
import type { ComparableCompany } from '../common/config/comp-table';
import { pricingQuestions } from '../common/config/pricing-tables';
import type {
  BusinessModel,
  CostVariance,
  FormulaResult,
  PricingRecommendation,
  Quadrant,
} from '../common/types/scoring';

const MAX_COMPS = 3;

export interface PricingRequest {
  businessModel: BusinessModel;
  quadrant: Quadrant;
  costPerUnit: number;
  customerSegment: string;
  dealSize: number;
  targetMargin: number;
  costVariance: CostVariance;
}

export interface PricingReport {
  recommendation: PricingRecommendation;
  formula: FormulaResult;
  comps: ComparableCompany[];
  principles: string[];
}

@Injectable()
export class PricingService {
  private readonly logger = new Logger(PricingService.name);

  constructor(private formulas: PricingFormulaService) {}

  getQuestions() {
    return pricingQuestions;
  }

  recommend(model: BusinessModel, quadrant: Quadrant, costVariance: CostVariance): PricingRecommendation {
    const hardRoi = quadrants[quadrant].hardRoi;
    const rule = recommendationRules.find((r) => this.matches(r, model, hardRoi, costVariance));
    if (!rule) {
      throw new Error(`No pricing rule covers ${model} / ${quadrant} / ${costVariance}`);
    }
    return rule.recommendation;
  }

  generate(request: PricingRequest): PricingReport {
    const recommendation = this.recommend(request.businessModel, request.quadrant, request.costVariance);
    const formula = this.formulas.generateFormula(
      request.costPerUnit,
      request.targetMargin,
      request.dealSize,
      recommendation.formulaType,
      request.customerSegment,
    );

    this.logger.log(
      `Recommended ${recommendation.modelName} for ${request.businessModel} in ${request.quadrant}`,
    );

    return {
      recommendation,
      formula,
      comps: compsForModel(request.businessModel).slice(0, MAX_COMPS),
      principles: businessModels[request.businessModel].principles,
    };
  }

  private matches(
    rule: RecommendationRule,
    model: BusinessModel,
    hardRoi: boolean,
    costVariance: CostVariance,
  ): boolean {
    if (rule.model !== model) return false;
    if (rule.hardRoi !== undefined && rule.hardRoi !== hardRoi) return false;
    if (rule.costVariance && !rule.costVariance.includes(costVariance)) return false;
    return true;
  }
}
