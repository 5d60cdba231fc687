import { Controller, Get, Query } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import {
  AnalysisPage,
  AnalysisRange,
  AnalysisStatisticsService,
  AnalysisSummary,
  ConfidenceDistribution,
} from './services/analysis-statistics.service';
import {
  AnalysisRangeQueryDto,
  DailyCountsQueryDto,
  ListAnalysesQueryDto,
} from './dto/analysis-query.dto';

@ApiTags('Analysis statistics')
@Controller('analyses')
export class StatisticsController {
  constructor(
    private readonly analysisStatisticsService: AnalysisStatisticsService,
  ) {}

  /**
   * Makes 'to' inclusive by moving it to the end of that UTC day
   */
  private makeToDateInclusive(dateStr?: string): Date | undefined {
    if (!dateStr) {
      return undefined;
    }
    const date = new Date(dateStr);
    date.setUTCHours(23, 59, 59, 999);
    return date;
  }

  private toRange(q: AnalysisRangeQueryDto): AnalysisRange {
    return {
      from: q.from ? new Date(q.from) : undefined,
      to: this.makeToDateInclusive(q.to),
    };
  }

  @Get()
  @ApiOperation({ summary: 'List analysis results across all URLs' })
  @ApiResponse({ status: 200, description: 'Returns one page of results' })
  list(@Query() q: ListAnalysesQueryDto): Promise<AnalysisPage> {
    return this.analysisStatisticsService.listAnalyses({
      ...this.toRange(q),
      isPhishing: q.isPhishing,
      page: q.page,
      pageSize: q.pageSize,
    });
  }

  @Get('statistics')
  @ApiOperation({ summary: 'Aggregate verdict statistics for a date range' })
  @ApiResponse({ status: 200, description: 'Returns the statistics' })
  async statistics(@Query() q: AnalysisRangeQueryDto): Promise<
    AnalysisSummary & {
      confidenceDistribution: ConfidenceDistribution;
      sourcesUsage: Record<string, number>;
    }
  > {
    const range = this.toRange(q);
    const [summary, confidenceDistribution, sourcesUsage] = await Promise.all([
      this.analysisStatisticsService.summary(range),
      this.analysisStatisticsService.confidenceDistribution(range),
      this.analysisStatisticsService.sourcesUsage(range),
    ]);
    return { ...summary, confidenceDistribution, sourcesUsage };
  }

  @Get('daily-counts')
  @ApiOperation({ summary: 'Number of analyses per day' })
  @ApiResponse({ status: 200, description: 'Returns counts, oldest day first' })
  dailyCounts(
    @Query() q: DailyCountsQueryDto,
  ): Promise<Array<{ date: string; count: number }>> {
    return this.analysisStatisticsService.dailyCounts(this.toRange(q));
  }
}
