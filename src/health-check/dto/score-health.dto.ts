import { IsRatingMap } from '../../common/validation/is-rating-map.decorator';

export class ScoreHealthDto {
  @IsRatingMap()
  ratings!: Record<string, number>;
}
