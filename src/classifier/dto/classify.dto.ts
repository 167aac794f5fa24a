import { IsAnswerSet } from '../../common/validation/is-answer-set.decorator';
import type { AnswerValue } from '../../common/types/questionnaire';

export class ClassifyDto {
  @IsAnswerSet()
  answers!: Record<string, AnswerValue>;
}
