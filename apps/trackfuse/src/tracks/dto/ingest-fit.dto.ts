import { IsBase64, IsBoolean, IsNotEmpty, IsOptional } from 'class-validator';

export class IngestFitDto {
  @IsBase64()
  @IsNotEmpty()
  fitContent!: string;

  @IsOptional()
  @IsBoolean()
  includeRecords?: boolean;
}
