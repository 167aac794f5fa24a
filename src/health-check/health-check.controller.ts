import { Controller, Get, Post, Body } from '@nestjs/common';
import { HealthCheckService } from './health-check.service';
import { ScoreHealthDto } from './dto/score-health.dto';

@Controller('health-check')
export class HealthCheckController {
  constructor(private healthCheckService: HealthCheckService) {}

  @Get('questions')
  questions() {
    return this.healthCheckService.getQuestions();
  }

  @Post('score')
  score(@Body() dto: ScoreHealthDto) {
    return this.healthCheckService.assess(dto.ratings);
  }
}
