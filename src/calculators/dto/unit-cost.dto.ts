import { IsBoolean, IsIn, IsInt, IsNumber, IsOptional, IsString, Max, Min } from 'class-validator';
import type { InferenceMethod, UnitCostInputs } from '../unit-cost.service';

export class UnitCostDto implements UnitCostInputs {
  @IsIn(['tokens', 'monthly_bill'])
  inferenceMethod!: InferenceMethod;

  @IsOptional()
  @IsString()
  provider?: string;

  @IsOptional()
  @IsNumber()
  @Min(0.0001)
  costPer1kTokens?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  tokensPerInteraction = 2000;

  @IsOptional()
  @IsInt()
  @Min(1)
  llmCallsPerUnit = 1;

  @IsOptional()
  @IsNumber()
  @Min(0)
  monthlyApiSpend = 500;

  @IsOptional()
  @IsInt()
  @Min(1)
  unitsPerMonth = 5000;

  @IsOptional()
  @IsBoolean()
  humanReview = false;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(100)
  reviewPercent = 20;

  @IsOptional()
  @IsNumber()
  @Min(1)
  minutesPerReview = 5;

  @IsOptional()
  @IsNumber()
  @Min(1)
  reviewerHourlyCost = 50;

  @IsOptional()
  @IsNumber()
  @Min(0)
  monthlyInfraCost = 0;

  @IsOptional()
  @IsInt()
  @Min(1)
  monthlyUnits = 1000;

  @IsOptional()
  @IsNumber()
  @Max(99)
  targetMargin = 65;
}
