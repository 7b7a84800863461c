import { plainToInstance, Type } from 'class-transformer';
import { IsIn, IsNumber, IsOptional, IsString, Matches, Max, Min, validateSync } from 'class-validator';

export class EnvironmentVariables {
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsString()
  NODE_ENV?: string;

  @IsOptional()
  @IsString()
  API_SECRET_KEY?: string;

  @IsOptional()
  @Matches(/^\d+(kb|mb)$/i, { message: 'BODY_LIMIT must look like 10mb or 512kb' })
  BODY_LIMIT?: string;

  @IsOptional()
  @IsIn(['osm', 'stadia'])
  MAP_PROVIDER?: string;

  @IsOptional()
  @IsString()
  STADIA_API_KEY?: string;

  @IsOptional()
  @IsIn(['stamen_terrain', 'outdoors', 'osm_bright', 'alidade_smooth'])
  STADIA_STYLE?: string;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(200)
  @Max(4096)
  MAP_WIDTH?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(200)
  @Max(4096)
  MAP_HEIGHT?: number;

  @IsOptional()
  @IsIn(['default', 'subtle', 'vibrant'])
  MAP_PALETTE?: string;
}

export function validate(config: Record<string, unknown>) {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validatedConfig, { skipMissingProperties: false });

  if (errors.length > 0) {
    throw new Error(errors.toString());
  }
  return validatedConfig;
}
