import { Module } from '@nestjs/common';
import { ValueMapController } from './value-map.controller';
import { ValueMapService } from './value-map.service';

@Module({
  controllers: [ValueMapController],
  providers: [ValueMapService],
  exports: [ValueMapService],
})
export class ValueMapModule {}
