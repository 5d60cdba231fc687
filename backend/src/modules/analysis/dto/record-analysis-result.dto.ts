import {
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsISO8601,
  IsObject,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import {
  AnalyzerPayload,
  CONFIDENCE_LEVELS,
  ConfidenceLevel,
  MAX_RISK_SCORE,
  MIN_RISK_SCORE,
} from '../entities/analysis-result.entity';

/**
 * Verdict produced by one completed analysis run
 */
export class RecordAnalysisResultDto {
  @ApiProperty({ description: 'Phishing verdict' })
  @IsBoolean()
  isPhishing!: boolean;

  @ApiProperty({ minimum: MIN_RISK_SCORE, maximum: MAX_RISK_SCORE })
  @IsInt()
  @Min(MIN_RISK_SCORE)
  @Max(MAX_RISK_SCORE)
  riskScore!: number;

  @ApiProperty({ enum: [...CONFIDENCE_LEVELS] })
  @IsIn([...CONFIDENCE_LEVELS])
  confidenceLevel!: ConfidenceLevel;

  @ApiProperty({
    required: false,
    description: 'Raw reputation-service output',
  })
  @IsOptional()
  @IsObject()
  virustotalResult?: AnalyzerPayload;

  @ApiProperty({
    required: false,
    description: 'Raw heuristic-engine output',
  })
  @IsOptional()
  @IsObject()
  heuristicResult?: AnalyzerPayload;

  @ApiProperty({ required: false })
  @IsOptional()
  @IsInt()
  @Min(0)
  analysisDurationMs?: number;

  @ApiProperty({ required: false, type: [String] })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  sourcesChecked?: string[];

  @ApiProperty({ required: false })
  @IsOptional()
  @IsString()
  errorLog?: string;

  @ApiProperty({
    required: false,
    description: 'When the analysis ran (ISO 8601)',
  })
  @IsOptional()
  @IsISO8601({ strict: true })
  analysisDate?: string;
}
