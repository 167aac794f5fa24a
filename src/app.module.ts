import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import { CommonModule } from './common/common.module';
import { ClassifierModule } from './classifier/classifier.module';
import { ValueMapModule } from './value-map/value-map.module';
import { PricingModule } from './pricing/pricing.module';
import { HealthCheckModule } from './health-check/health-check.module';
import { CalculatorsModule } from './calculators/calculators.module';
import { NavigatorModule } from './navigator/navigator.module';

@Module({
  imports: [
    // Environment config
    ConfigModule.forRoot({ isGlobal: true }),

    // Rate limiting (60 requests per minute per IP)
    ThrottlerModule.forRoot([{ ttl: 60_000, limit: 60 }]),

    // Scoring engine
    CommonModule,

    // Feature modules
    ClassifierModule,
    ValueMapModule,
    PricingModule,
    HealthCheckModule,
    CalculatorsModule,
    NavigatorModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule {}
