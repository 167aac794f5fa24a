import { Controller, Get, Post, Body } from '@nestjs/common';
import { ClassifierService } from './classifier.service';
import { ClassifyDto } from './dto/classify.dto';

@Controller('classifier')
export class ClassifierController {
  constructor(private classifierService: ClassifierService) {}

  @Get('questions')
  questions() {
    return this.classifierService.getQuestions();
  }

  @Post('classify')
  classify(@Body() dto: ClassifyDto) {
    return this.classifierService.classify(dto.answers);
  }
}
