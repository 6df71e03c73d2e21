import { IsIn, IsOptional } from 'class-validator';

export const SERIES_RANGES = ['hour', 'day', 'month', 'all'] as const;
export type SeriesRange = (typeof SERIES_RANGES)[number];

export class SeriesQueryDto {
  @IsOptional()
  @IsIn([...SERIES_RANGES], { message: `range must be one of: ${SERIES_RANGES.join(', ')}` })
  range?: SeriesRange;
}
