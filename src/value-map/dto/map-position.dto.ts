import { IsAnswerSet } from '../../common/validation/is-answer-set.decorator';
import type { AnswerValue } from '../../common/types/questionnaire';

export class MapPositionDto {
  @IsAnswerSet()
  answers!: Record<string, AnswerValue>;
}
