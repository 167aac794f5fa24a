import { IsIn } from 'class-validator';
import { PricingInputsDto } from './pricing-inputs.dto';
import { businessModelOrder } from '../../common/config/business-models';
import { quadrantOrder } from '../../common/config/quadrants';
import type { BusinessModel, Quadrant } from '../../common/types/scoring';

export class RecommendPricingDto extends PricingInputsDto {
  @IsIn(businessModelOrder)
  businessModel!: BusinessModel;

  @IsIn(quadrantOrder)
  quadrant!: Quadrant;
}
