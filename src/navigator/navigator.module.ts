import { Module } from '@nestjs/common';
import { NavigatorController } from './navigator.controller';
import { NavigatorService } from './navigator.service';
import { ClassifierModule } from '../classifier/classifier.module';
import { ValueMapModule } from '../value-map/value-map.module';
import { PricingModule } from '../pricing/pricing.module';
import { HealthCheckModule } from '../health-check/health-check.module';

@Module({
  imports: [ClassifierModule, ValueMapModule, PricingModule, HealthCheckModule],
  controllers: [NavigatorController],
  providers: [NavigatorService],
})
export class NavigatorModule {}
