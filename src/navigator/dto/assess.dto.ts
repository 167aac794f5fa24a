import { IsOptional, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';
import { IsAnswerSet } from '../../common/validation/is-answer-set.decorator';
import { IsRatingMap } from '../../common/validation/is-rating-map.decorator';
import { PricingInputsDto } from '../../pricing/dto/pricing-inputs.dto';
import type { AnswerValue } from '../../common/types/questionnaire';

export class AssessDto {
  @IsAnswerSet()
  classifierAnswers!: Record<string, AnswerValue>;

  @IsAnswerSet()
  valueAnswers!: Record<string, AnswerValue>;

  @IsOptional()
  @ValidateNested()
  @Type(() => PricingInputsDto)
  pricing: PricingInputsDto = new PricingInputsDto();

  @IsOptional()
  @IsRatingMap()
  healthRatings: Record<string, number> = {};
}
