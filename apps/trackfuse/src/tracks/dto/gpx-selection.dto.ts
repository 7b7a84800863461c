import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsIn,
  IsInt,
  Min,
  ValidateIf,
  ValidateNested,
} from 'class-validator';
import type { GpxSelection } from '@trackfuse/track';

export class SegmentRefDto {
  @IsInt()
  @Min(0)
  track!: number;

  @IsInt()
  @Min(0)
  segment!: number;
}

export class GpxSelectionDto {
  @IsIn(['all', 'tracks', 'segments'])
  mode!: GpxSelection['mode'];

  @ValidateIf((o: GpxSelectionDto) => o.mode === 'tracks')
  @IsArray()
  @ArrayNotEmpty()
  @IsInt({ each: true })
  @Min(0, { each: true })
  tracks?: number[];

  @ValidateIf((o: GpxSelectionDto) => o.mode === 'segments')
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => SegmentRefDto)
  segments?: SegmentRefDto[];
}

export function toGpxSelection(dto: GpxSelectionDto): GpxSelection {
  switch (dto.mode) {
    case 'all':
      return { mode: 'all' };
    case 'tracks':
      return { mode: 'tracks', tracks: dto.tracks ?? [] };
    case 'segments':
      return {
        mode: 'segments',
        segments: (dto.segments ?? []).map(({ track, segment }) => ({ track, segment })),
      };
  }
}
