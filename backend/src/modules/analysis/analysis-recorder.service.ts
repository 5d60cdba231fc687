import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { IsNull, Not, Repository } from 'typeorm';
import { plainToInstance } from 'class-transformer';
import { validateSync, ValidationError } from 'class-validator';
import { AnalysisResult } from './entities/analysis-result.entity';
import { RecordAnalysisResultDto } from './dto/record-analysis-result.dto';
import { UrlRegistryService } from '../urls/url-registry.service';
import {
  RecordNotFoundException,
  ValidationFailedException,
} from '../../common/exceptions/persistence.exceptions';
import { withStorageErrors } from '../../common/utils/storage-error.util';

export interface HistoryOptions {
  /** Rows fetched per round trip; defaults to `registry.historyBatchSize` */
  batchSize?: number;
}

function flattenValidationErrors(errors: ValidationError[]): string[] {
  return errors.flatMap((error) => [
    ...Object.values(error.constraints ?? {}),
    ...flattenValidationErrors(error.children ?? []),
  ]);
}

/**
 * Appends analysis verdicts for registered URLs and reads them back.
 * Results are immutable once written.
 */
@Injectable()
export class AnalysisRecorderService {
  private readonly logger = new Logger(AnalysisRecorderService.name);
  private readonly historyBatchSize: number;

  constructor(
    @InjectRepository(AnalysisResult)
    private readonly resultRepository: Repository<AnalysisResult>,
    private readonly urlRegistryService: UrlRegistryService,
    private readonly configService: ConfigService,
  ) {
    this.historyBatchSize = this.configService.get<number>(
      'registry.historyBatchSize',
      50,
    );
  }

  /**
   * Store one verdict for a URL and return the new result ID
   */
  async recordResult(
    urlId: string,
    verdict: RecordAnalysisResultDto,
  ): Promise<string> {
    const dto = plainToInstance(RecordAnalysisResultDto, verdict);
    const messages = flattenValidationErrors(validateSync(dto));
    if (messages.length > 0) {
      throw new ValidationFailedException('Invalid analysis result', messages);
    }

    const urlExists = await this.urlRegistryService.exists(urlId);
    if (!urlExists) {
      throw new RecordNotFoundException(`URL with ID ${urlId} not found`);
    }

    const entity = this.resultRepository.create({
      urlId,
      isPhishing: dto.isPhishing,
      riskScore: dto.riskScore,
      confidenceLevel: dto.confidenceLevel,
      virustotalResult: dto.virustotalResult ?? null,
      heuristicResult: dto.heuristicResult ?? null,
      analysisDurationMs: dto.analysisDurationMs ?? null,
      sourcesChecked: dto.sourcesChecked ?? null,
      errorLog: dto.errorLog ?? null,
      analysisDate: dto.analysisDate ? new Date(dto.analysisDate) : new Date(),
    });

    const saved = await withStorageErrors(
      this.logger,
      'record analysis result',
      () => this.resultRepository.save(entity),
    );
    this.logger.log(
      `Recorded result ${saved.id} for URL ${urlId} (phishing=${saved.isPhishing}, risk=${saved.riskScore})`,
    );
    return saved.id;
  }

  /**
   * Get the most recent result for a URL
   */
  async latestResult(urlId: string): Promise<AnalysisResult> {
    const latest = await withStorageErrors(
      this.logger,
      'latest analysis result',
      () =>
        this.resultRepository.findOne({
          where: { urlId, analysisDate: Not(IsNull()) },
          order: { analysisDate: 'DESC', id: 'DESC' },
        }),
    );
    if (!latest) {
      throw new RecordNotFoundException(`No analysis results for URL ${urlId}`);
    }
    return latest;
  }

  /**
   * All results for a URL, newest first. Nothing is read until the
   * consumer starts iterating; each iteration starts over from the newest.
   */
  history(
    urlId: string,
    options: HistoryOptions = {},
  ): AsyncIterable<AnalysisResult> {
    const batchSize = options.batchSize ?? this.historyBatchSize;
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new ValidationFailedException(
        `batchSize must be a positive integer, got ${batchSize}`,
      );
    }

    return {
      [Symbol.asyncIterator]: () => this.iterateHistory(urlId, batchSize),
    };
  }

  private async *iterateHistory(
    urlId: string,
    batchSize: number,
  ): AsyncGenerator<AnalysisResult> {
    await this.urlRegistryService.findById(urlId);

    let cursor: AnalysisResult | undefined;
    for (;;) {
      const batch = await this.fetchHistoryBatch(urlId, batchSize, cursor);
      yield* batch;
      if (batch.length < batchSize) {
        return;
      }
      cursor = batch[batch.length - 1];
    }
  }

  private fetchHistoryBatch(
    urlId: string,
    batchSize: number,
    after?: AnalysisResult,
  ): Promise<AnalysisResult[]> {
    const qb = this.resultRepository
      .createQueryBuilder('result')
      .where('result.urlId = :urlId', { urlId });

    // Keyset: strictly after the last row of the previous batch, undated rows last
    if (after?.analysisDate) {
      qb.andWhere(
        '(result.analysisDate < :afterDate OR (result.analysisDate = :afterDate AND result.id < :afterId) OR result.analysisDate IS NULL)',
        { afterDate: after.analysisDate, afterId: after.id },
      );
    } else if (after) {
      qb.andWhere('(result.analysisDate IS NULL AND result.id < :afterId)', {
        afterId: after.id,
      });
    }

    return withStorageErrors(this.logger, 'analysis history', () =>
      qb
        .orderBy('result.analysisDate', 'DESC', 'NULLS LAST')
        .addOrderBy('result.id', 'DESC')
        .limit(batchSize)
        .getMany(),
    );
  }
}
