import { Transform, Type } from 'class-transformer';
import {
  IsBoolean,
  IsInt,
  IsISO8601,
  IsOptional,
  IsPositive,
  Max,
} from 'class-validator';

export class AnalysisRangeQueryDto {
  @IsOptional()
  @IsISO8601({ strict: true })
  from?: string; // ISO date string

  @IsOptional()
  @IsISO8601({ strict: true })
  to?: string; // ISO date string
}

export class ListAnalysesQueryDto extends AnalysisRangeQueryDto {
  @IsOptional()
  @Transform(({ value }) =>
    value === 'true' ? true : value === 'false' ? false : value,
  )
  @IsBoolean()
  isPhishing?: boolean;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @IsPositive()
  page?: number = 1;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @IsPositive()
  @Max(500)
  pageSize?: number = 50;
}

export class DailyCountsQueryDto {
  @IsISO8601({ strict: true })
  from!: string;

  @IsISO8601({ strict: true })
  to!: string;
}

export class HistoryQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @IsPositive()
  @Max(1000)
  limit?: number = 100;
}
