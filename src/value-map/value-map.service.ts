import { Injectable, Logger } from '@nestjs/common';
import { ValuePositionService } from '../common/scoring/value-position.service';
import { quadrants, RENEWAL_RISK_WARNING } from '../common/config/quadrants';
import type { QuadrantData } from '../common/config/quadrants';
import { valueQuestions } from '../common/config/value-questions';
import type { AnswerSet } from '../common/types/questionnaire';
import type { ValuePosition } from '../common/types/scoring';

export interface PositionReport extends ValuePosition {
  quadrantData: QuadrantData;
  renewalWarning: string | null;
}

@Injectable()
export class ValueMapService {
  private readonly logger = new Logger(ValueMapService.name);

  constructor(private valuePosition: ValuePositionService) {}

  getQuestions() {
    return valueQuestions;
  }

  mapPosition(answers: AnswerSet): PositionReport {
    const position = this.valuePosition.mapPosition(answers);
    const quadrantData = quadrants[position.quadrant];

    this.logger.log(`Mapped to ${position.quadrant} (x=${position.xScore}, y=${position.yScore})`);

    return {
      ...position,
      quadrantData,
      renewalWarning: quadrantData.renewalRisk ? RENEWAL_RISK_WARNING : null,
    };
  }
}
