import { Controller, Get, Post, Body } from '@nestjs/common';
import { PricingService } from './pricing.service';
import { PricingFormulaService } from '../common/scoring/pricing-formula.service';
import { RecommendPricingDto } from './dto/recommend-pricing.dto';
import { GenerateFormulaDto } from './dto/generate-formula.dto';

@Controller('pricing')
export class PricingController {
  constructor(
    private pricingService: PricingService,
    private formulas: PricingFormulaService,
  ) {}

  @Get('questions')
  questions() {
    return this.pricingService.getQuestions();
  }

  @Post('recommend')
  recommend(@Body() dto: RecommendPricingDto) {
    return this.pricingService.generate(dto);
  }

  @Post('formula')
  formula(@Body() dto: GenerateFormulaDto) {
    return this.formulas.generateFormula(
      dto.costPerUnit,
      dto.targetMargin,
      dto.dealSize,
      dto.formulaType,
      dto.customerSegment,
    );
  }
}
