import { IsIn, IsNumber, IsOptional, IsString, Min } from 'class-validator';
import type { FormulaType } from '../../common/types/scoring';

export const FORMULA_TYPES: FormulaType[] = ['hybrid', 'outcome', 'workflow', 'per_seat'];

export class GenerateFormulaDto {
  @IsNumber()
  costPerUnit!: number;

  @IsNumber()
  targetMargin!: number;

  @IsNumber()
  @Min(0)
  dealSize!: number;

  @IsIn(FORMULA_TYPES)
  formulaType!: FormulaType;

  @IsOptional()
  @IsString()
  customerSegment?: string;
}
