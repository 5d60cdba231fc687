import {
  Body,
  Controller,
  Get,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AnalysisRecorderService } from './analysis-recorder.service';
import { RecordAnalysisResultDto } from './dto/record-analysis-result.dto';
import { HistoryQueryDto } from './dto/analysis-query.dto';
import { AnalysisResult } from './entities/analysis-result.entity';

@ApiTags('Analysis results')
@Controller('urls/:urlId/analyses')
export class AnalysisResultController {
  constructor(
    private readonly analysisRecorderService: AnalysisRecorderService,
  ) {}

  @Post()
  @ApiOperation({ summary: 'Record the verdict of an analysis run' })
  @ApiResponse({ status: 201, description: 'Returns the new result ID' })
  @ApiResponse({ status: 400, description: 'Invalid verdict' })
  @ApiResponse({ status: 404, description: 'URL not found' })
  async record(
    @Param('urlId', ParseUUIDPipe) urlId: string,
    @Body() dto: RecordAnalysisResultDto,
  ): Promise<{ id: string }> {
    const id = await this.analysisRecorderService.recordResult(urlId, dto);
    return { id };
  }

  @Get('latest')
  @ApiOperation({ summary: 'Get the most recent result for a URL' })
  @ApiResponse({ status: 200, description: 'Returns the latest result' })
  @ApiResponse({ status: 404, description: 'No results for this URL' })
  latest(
    @Param('urlId', ParseUUIDPipe) urlId: string,
  ): Promise<AnalysisResult> {
    return this.analysisRecorderService.latestResult(urlId);
  }

  @Get()
  @ApiOperation({ summary: 'Get the result history of a URL, newest first' })
  @ApiResponse({ status: 200, description: 'Returns up to `limit` results' })
  @ApiResponse({ status: 404, description: 'URL not found' })
  async history(
    @Param('urlId', ParseUUIDPipe) urlId: string,
    @Query() query: HistoryQueryDto,
  ): Promise<AnalysisResult[]> {
    const limit = query.limit ?? 100;
    const results: AnalysisResult[] = [];
    for await (const result of this.analysisRecorderService.history(urlId, {
      batchSize: Math.min(limit, 100),
    })) {
      results.push(result);
      if (results.length >= limit) {
        break;
      }
    }
    return results;
  }
}
