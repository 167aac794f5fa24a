import { Module } from '@nestjs/common';
import { CalculatorsController } from './calculators.controller';
import { UnitCostService } from './unit-cost.service';
import { GrossMarginService } from './gross-margin.service';

@Module({
  controllers: [CalculatorsController],
  providers: [UnitCostService, GrossMarginService],
})
export class CalculatorsModule {}
