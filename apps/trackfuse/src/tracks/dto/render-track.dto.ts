import { Type } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateIf,
  ValidateNested,
} from 'class-validator';
import { GpxSelectionDto } from './gpx-selection.dto';

export class RenderTrackDto {
  @IsIn(['gpx', 'fit'])
  format!: 'gpx' | 'fit';

  /** GPX text, or base64 FIT bytes. */
  @IsString()
  @IsNotEmpty()
  content!: string;

  @ValidateIf((o: RenderTrackDto) => o.format === 'gpx')
  @IsObject()
  @ValidateNested()
  @Type(() => GpxSelectionDto)
  selection?: GpxSelectionDto;

  @IsOptional()
  @IsString()
  name?: string;

  @IsOptional()
  @IsString()
  field?: string;

  @IsOptional()
  @IsString()
  extremumField?: string;

  @ValidateIf((o: RenderTrackDto) => o.rangeMax !== undefined)
  @IsNumber()
  rangeMin?: number;

  @ValidateIf((o: RenderTrackDto) => o.rangeMin !== undefined)
  @IsNumber()
  rangeMax?: number;

  @IsOptional()
  @IsInt()
  @Min(200)
  @Max(4096)
  width?: number;

  @IsOptional()
  @IsInt()
  @Min(200)
  @Max(4096)
  height?: number;
}
