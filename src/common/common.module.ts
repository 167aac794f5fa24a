import { Module, Global } from '@nestjs/common';
import { ClassificationService } from './scoring/classification.service';
import { ValuePositionService } from './scoring/value-position.service';
import { PricingFormulaService } from './scoring/pricing-formula.service';
import { HealthScoreService } from './scoring/health-score.service';

@Global()
@Module({
  providers: [ClassificationService, ValuePositionService, PricingFormulaService, HealthScoreService],
  exports: [ClassificationService, ValuePositionService, PricingFormulaService, HealthScoreService],
})
export class CommonModule {}
