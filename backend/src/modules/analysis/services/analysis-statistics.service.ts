import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import {
  Between,
  FindOperator,
  FindOptionsWhere,
  LessThanOrEqual,
  MoreThanOrEqual,
  Repository,
  SelectQueryBuilder,
} from 'typeorm';
import {
  AnalysisResult,
  CONFIDENCE_LEVELS,
  ConfidenceLevel,
} from '../entities/analysis-result.entity';
import { withStorageErrors } from '../../../common/utils/storage-error.util';

export interface AnalysisRange {
  from?: Date;
  to?: Date;
}

export interface AnalysisPage {
  total: number;
  page: number;
  pageSize: number;
  data: AnalysisResult[];
}

export interface AnalysisSummary {
  totalAnalyses: number;
  phishingDetected: number;
  safeUrls: number;
  avgRiskScore: number;
  phishingPercentage: number;
  riskDistribution: { low: number; medium: number; high: number };
}

export type ConfidenceDistribution = Record<ConfidenceLevel, number>;

// Risk bands: low < 40, medium 40-69, high >= 70
const MEDIUM_RISK_FLOOR = 40;
const HIGH_RISK_FLOOR = 70;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

@Injectable()
export class AnalysisStatisticsService {
  private readonly logger = new Logger(AnalysisStatisticsService.name);

  constructor(
    @InjectRepository(AnalysisResult)
    private readonly resultRepository: Repository<AnalysisResult>,
  ) {}

  async listAnalyses(
    params: AnalysisRange & {
      isPhishing?: boolean;
      page?: number;
      pageSize?: number;
    },
  ): Promise<AnalysisPage> {
    const page = params.page ?? 1;
    const pageSize = params.pageSize ?? 50;

    const where: FindOptionsWhere<AnalysisResult> = {};
    const dateFilter = this.dateFilter(params);
    if (dateFilter) {
      where.analysisDate = dateFilter;
    }
    if (params.isPhishing !== undefined) {
      where.isPhishing = params.isPhishing;
    }

    const [data, total] = await withStorageErrors(
      this.logger,
      'list analyses',
      () =>
        this.resultRepository.findAndCount({
          where,
          order: {
            analysisDate: { direction: 'DESC', nulls: 'LAST' },
            id: 'DESC',
          },
          skip: (page - 1) * pageSize,
          take: pageSize,
        }),
    );

    return { total, page, pageSize, data };
  }

  async summary(range: AnalysisRange): Promise<AnalysisSummary> {
    const qb = this.rangeQuery(range);

    const row = await withStorageErrors(this.logger, 'analysis summary', () =>
      qb
        .select('COUNT(*)', 'total')
        .addSelect(
          'COALESCE(SUM(CASE WHEN r.isPhishing THEN 1 ELSE 0 END),0)',
          'phishing',
        )
        .addSelect('COALESCE(AVG(r.riskScore),0)', 'avgRisk')
        .addSelect(
          `COALESCE(SUM(CASE WHEN r.riskScore < ${MEDIUM_RISK_FLOOR} THEN 1 ELSE 0 END),0)`,
          'low',
        )
        .addSelect(
          `COALESCE(SUM(CASE WHEN r.riskScore >= ${MEDIUM_RISK_FLOOR} AND r.riskScore < ${HIGH_RISK_FLOOR} THEN 1 ELSE 0 END),0)`,
          'medium',
        )
        .addSelect(
          `COALESCE(SUM(CASE WHEN r.riskScore >= ${HIGH_RISK_FLOOR} THEN 1 ELSE 0 END),0)`,
          'high',
        )
        .getRawOne<{
          total: string;
          phishing: string;
          avgRisk: string;
          low: string;
          medium: string;
          high: string;
        }>(),
    );

    const totalAnalyses = Number(row?.total ?? 0);
    const phishingDetected = Number(row?.phishing ?? 0);

    return {
      totalAnalyses,
      phishingDetected,
      safeUrls: totalAnalyses - phishingDetected,
      avgRiskScore: round2(Number(row?.avgRisk ?? 0)),
      phishingPercentage:
        totalAnalyses > 0
          ? round2((phishingDetected / totalAnalyses) * 100)
          : 0,
      riskDistribution: {
        low: Number(row?.low ?? 0),
        medium: Number(row?.medium ?? 0),
        high: Number(row?.high ?? 0),
      },
    };
  }

  async confidenceDistribution(
    range: AnalysisRange,
  ): Promise<ConfidenceDistribution> {
    const rows = await withStorageErrors(
      this.logger,
      'confidence distribution',
      () =>
        this.rangeQuery(range)
          .select('r.confidenceLevel', 'level')
          .addSelect('COUNT(*)', 'count')
          .groupBy('r.confidenceLevel')
          .getRawMany<{ level: string; count: string }>(),
    );

    const distribution: ConfidenceDistribution = { high: 0, medium: 0, low: 0 };
    for (const row of rows) {
      const level = CONFIDENCE_LEVELS.find((known) => known === row.level);
      if (level) {
        distribution[level] = Number(row.count);
      }
    }
    return distribution;
  }

  /**
   * How many results list each analysis source
   */
  async sourcesUsage(range: AnalysisRange): Promise<Record<string, number>> {
    const rows = await withStorageErrors(this.logger, 'sources usage', () =>
      this.rangeQuery(range)
        .select('r.sourcesChecked', 'sources')
        .andWhere('r.sourcesChecked IS NOT NULL')
        .getRawMany<{ sources: string[] | null }>(),
    );

    const usage: Record<string, number> = {};
    for (const row of rows) {
      for (const raw of row.sources ?? []) {
        const source = raw.trim();
        if (source) {
          usage[source] = (usage[source] ?? 0) + 1;
        }
      }
    }
    return usage;
  }

  /**
   * Results per UTC calendar day, oldest day first. Days without results are
   * omitted.
   */
  async dailyCounts(
    range: AnalysisRange,
  ): Promise<Array<{ date: string; count: number }>> {
    const rows = await withStorageErrors(this.logger, 'daily counts', () =>
      this.rangeQuery(range)
        .select(
          `to_char(r.analysisDate AT TIME ZONE 'UTC', 'YYYY-MM-DD')`,
          'date',
        )
        .addSelect('COUNT(*)', 'count')
        .groupBy('date')
        .orderBy('date', 'ASC')
        .getRawMany<{ date: string; count: string }>(),
    );

    return rows.map((r) => ({ date: r.date, count: Number(r.count) }));
  }

  private rangeQuery(range: AnalysisRange): SelectQueryBuilder<AnalysisResult> {
    const qb = this.resultRepository.createQueryBuilder('r');
    if (range.from) {
      qb.andWhere('r.analysisDate >= :from', { from: range.from });
    }
    if (range.to) {
      qb.andWhere('r.analysisDate <= :to', { to: range.to });
    }
    return qb;
  }

  private dateFilter(range: AnalysisRange): FindOperator<Date> | undefined {
    if (range.from && range.to) {
      return Between(range.from, range.to);
    }
    if (range.from) {
      return MoreThanOrEqual(range.from);
    }
    if (range.to) {
      return LessThanOrEqual(range.to);
    }
    return undefined;
  }
}
