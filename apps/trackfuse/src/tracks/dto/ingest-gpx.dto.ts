import { Type } from 'class-transformer';
import { IsBoolean, IsNotEmpty, IsObject, IsOptional, IsString, ValidateNested } from 'class-validator';
import { GpxSelectionDto } from './gpx-selection.dto';

export class IngestGpxDto {
  @IsString()
  @IsNotEmpty()
  gpxContent!: string;

  @IsObject()
  @ValidateNested()
  @Type(() => GpxSelectionDto)
  selection!: GpxSelectionDto;

  @IsOptional()
  @IsBoolean()
  includeRecords?: boolean;
}
