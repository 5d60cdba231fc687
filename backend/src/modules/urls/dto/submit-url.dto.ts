import { Type } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsPositive,
  IsString,
  Max,
  MaxLength,
} from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class SubmitUrlDto {
  @ApiProperty({
    description: 'URL to register',
    example: 'http://evil.example/a',
  })
  @IsString()
  @IsNotEmpty()
  @MaxLength(2048)
  url!: string;

  @ApiProperty({ description: 'Domain of the URL', example: 'evil.example' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  domain!: string;

  @ApiProperty({
    description: 'How the URL entered the system',
    required: false,
    default: 'manual',
  })
  @IsString()
  @IsOptional()
  @MaxLength(100)
  source?: string;
}

export interface SubmitUrlResult {
  id: string;
  /** False when the URL was already registered */
  created: boolean;
}

export class LookupUrlQueryDto {
  @ApiProperty({ description: 'URL to look up' })
  @IsString()
  @IsNotEmpty()
  url!: string;
}

export class ListUrlsQueryDto {
  @ApiProperty({ description: 'Domain to list URLs for' })
  @IsString()
  @IsNotEmpty()
  domain!: string;

  @ApiProperty({ required: false })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @IsPositive()
  page?: number;

  @ApiProperty({
    required: false,
    description: 'Defaults to 50 when a page is given; without either, all matches are returned',
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @IsPositive()
  @Max(500)
  pageSize?: number;
}
