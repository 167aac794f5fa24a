import { Controller, Post, Body } from '@nestjs/common';
import { Throttle } from '@nestjs/throttler';
import { NavigatorService } from './navigator.service';
import { AssessDto } from './dto/assess.dto';

@Controller('navigator')
export class NavigatorController {
  constructor(private navigatorService: NavigatorService) {}

  @Post('assess')
  @Throttle({ default: { ttl: 60_000, limit: 10 } })
  assess(@Body() dto: AssessDto) {
    return this.navigatorService.assess(dto);
  }
}
