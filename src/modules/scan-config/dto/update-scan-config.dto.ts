import { IsInt, IsNotEmpty, IsNumber, IsOptional, IsPositive, IsString, Max, Min } from 'class-validator';

const FINITE = { allowNaN: false, allowInfinity: false };

export class UpdateScanConfigDto {
  @IsOptional()
  @IsNumber(FINITE)
  @IsPositive()
  scan_duration?: number;

  @IsOptional()
  @IsNumber(FINITE)
  @IsPositive()
  scan_interval?: number;

  @IsOptional()
  @IsNumber(FINITE)
  @IsPositive()
  sleep_duration?: number;

  @IsOptional()
  @IsNumber(FINITE)
  @IsPositive()
  session_gap_multiplier?: number;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  db_path?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  host?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  port?: number;
}
