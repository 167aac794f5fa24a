import { Controller, Get, Post, Body } from '@nestjs/common';
import { ValueMapService } from './value-map.service';
import { MapPositionDto } from './dto/map-position.dto';

@Controller('value-map')
export class ValueMapController {
  constructor(private valueMapService: ValueMapService) {}

  @Get('questions')
  questions() {
    return this.valueMapService.getQuestions();
  }

  @Post('position')
  position(@Body() dto: MapPositionDto) {
    return this.valueMapService.mapPosition(dto.answers);
  }
}
