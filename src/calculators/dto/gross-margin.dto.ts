import { IsInt, IsNumber, Min } from 'class-validator';
import type { GrossMarginInputs } from '../gross-margin.service';

export class GrossMarginDto implements GrossMarginInputs {
  @IsNumber()
  @Min(0.01)
  costPerUnit!: number;

  @IsNumber()
  @Min(0.01)
  pricePerUnit!: number;

  @IsInt()
  @Min(1)
  unitsPerCustomer!: number;

  @IsInt()
  @Min(1)
  customers!: number;
}
