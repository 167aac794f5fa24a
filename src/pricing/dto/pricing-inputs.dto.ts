import { IsIn, IsNumber, IsOptional, IsString, Min } from 'class-validator';
import { PRICING_DEFAULTS } from '../../common/config/pricing-tables';
import type { CostVariance } from '../../common/types/scoring';

export const COST_VARIANCES: CostVariance[] = ['low', 'moderate', 'high'];

/** Module 3 answers. Missing fields fall back to the questionnaire defaults. */
export class PricingInputsDto {
  @IsOptional()
  @IsNumber()
  costPerUnit: number = PRICING_DEFAULTS.costPerUnit;

  @IsOptional()
  @IsString()
  customerSegment: string = PRICING_DEFAULTS.customerSegment;

  @IsOptional()
  @IsNumber()
  @Min(0)
  dealSize: number = PRICING_DEFAULTS.dealSize;

  @IsOptional()
  @IsNumber()
  targetMargin: number = PRICING_DEFAULTS.targetMargin;

  @IsOptional()
  @IsIn(COST_VARIANCES)
  costVariance: CostVariance = PRICING_DEFAULTS.costVariance;
}
