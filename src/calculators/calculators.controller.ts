import { Controller, Get, Post, Body } from '@nestjs/common';
import { UnitCostService } from './unit-cost.service';
import { GrossMarginService } from './gross-margin.service';
import { UnitCostDto } from './dto/unit-cost.dto';
import { GrossMarginDto } from './dto/gross-margin.dto';

@Controller('calculators')
export class CalculatorsController {
  constructor(
    private unitCost: UnitCostService,
    private grossMargin: GrossMarginService,
  ) {}

  @Get('llm-presets')
  presets() {
    return this.unitCost.getPresets();
  }

  @Post('unit-cost')
  calculateUnitCost(@Body() dto: UnitCostDto) {
    return this.unitCost.calculate(dto);
  }

  @Post('gross-margin')
  calculateGrossMargin(@Body() dto: GrossMarginDto) {
    return this.grossMargin.calculate(dto);
  }
}
