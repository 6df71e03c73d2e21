import { Type } from 'class-transformer';
import { ArrayMinSize, IsArray, IsInt, IsNumber, IsOptional, ValidateNested } from 'class-validator';

export class PredictedBoxDto {
  @IsInt()
  cls!: number;

  @IsArray()
  @ArrayMinSize(4)
  @IsNumber({}, { each: true })
  xyxy!: number[];

  @IsOptional()
  @IsNumber()
  conf?: number;
}

export class PredictionDto {
  /** `[height, width]` of the original image. */
  @IsOptional()
  @IsArray()
  @ArrayMinSize(2)
  @IsInt({ each: true })
  orig_shape?: number[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => PredictedBoxDto)
  boxes!: PredictedBoxDto[];
}

export class PredictionResponseDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => PredictionDto)
  results!: PredictionDto[];
}
