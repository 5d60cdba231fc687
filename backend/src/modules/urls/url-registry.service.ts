import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { SubmittedUrl } from './entities/submitted-url.entity';
import { SubmitUrlDto, SubmitUrlResult } from './dto/submit-url.dto';
import {
  hashUrl,
  normalizeDomain,
  normalizeUrl,
} from './utils/url-normalizer.util';
import {
  RecordConflictException,
  RecordNotFoundException,
  ValidationFailedException,
} from '../../common/exceptions/persistence.exceptions';
import { withStorageErrors } from '../../common/utils/storage-error.util';

/** Page size used when a page is requested without one */
export const DEFAULT_DOMAIN_PAGE_SIZE = 50;

/**
 * Owns the `urls` table: deduplicates submissions by normalized URL and
 * hands out stable identities.
 */
@Injectable()
export class UrlRegistryService {
  private readonly logger = new Logger(UrlRegistryService.name);
  private readonly defaultSource: string;

  constructor(
    @InjectRepository(SubmittedUrl)
    private readonly urlRepository: Repository<SubmittedUrl>,
    private readonly configService: ConfigService,
  ) {
    this.defaultSource = this.configService.get<string>(
      'registry.defaultSource',
      'manual',
    );
  }

  /**
   * Register a URL, or return the identity it already has.
   * Re-submitting a known URL writes nothing.
   */
  async submit(dto: SubmitUrlDto): Promise<SubmitUrlResult> {
    const url = this.requireUrl(dto.url);
    const domain = normalizeDomain(dto.domain ?? '');
    if (!domain) {
      throw new ValidationFailedException('domain must not be empty');
    }

    const existing = await this.findByNormalizedUrl(url);
    if (existing) {
      this.logger.debug(`URL ${url} already registered as ${existing.id}`);
      return { id: existing.id, created: false };
    }

    const entity = this.urlRepository.create({
      url,
      domain,
      source: dto.source?.trim() || this.defaultSource,
      urlHash: hashUrl(url),
      submittedAt: new Date(),
    });

    try {
      const saved = await withStorageErrors(this.logger, 'submit url', () =>
        this.urlRepository.save(entity),
      );
      this.logger.log(`Registered ${url} as ${saved.id}`);
      return { id: saved.id, created: true };
    } catch (error) {
      if (!(error instanceof RecordConflictException)) {
        throw error;
      }
      // Lost an insert race: the winner's row is the identity
      const winner = await this.findByNormalizedUrl(url);
      if (!winner) {
        throw new RecordConflictException(
          `URL ${url} conflicted on insert but could not be found again`,
        );
      }
      this.logger.warn(
        `Concurrent submission of ${url} resolved to ${winner.id}`,
      );
      return { id: winner.id, created: false };
    }
  }

  /**
   * Get the record for a URL, in any spelling that normalizes to it
   */
  async lookupByUrl(rawUrl: string): Promise<SubmittedUrl> {
    const url = this.requireUrl(rawUrl);
    const record = await this.findByNormalizedUrl(url);
    if (!record) {
      throw new RecordNotFoundException(`URL ${url} not found`);
    }
    return record;
  }

  /**
   * Get a URL record by ID
   */
  async findById(id: string): Promise<SubmittedUrl> {
    const record = await withStorageErrors(this.logger, 'find url', () =>
      this.urlRepository.findOne({ where: { id } }),
    );
    if (!record) {
      throw new RecordNotFoundException(`URL with ID ${id} not found`);
    }
    return record;
  }

  /**
   * Check whether a URL record exists
   */
  async exists(id: string): Promise<boolean> {
    return withStorageErrors(this.logger, 'check url', () =>
      this.urlRepository.exists({ where: { id } }),
    );
  }

  /**
   * List the URLs of a domain, most recently submitted first.
   * With neither page nor page size, every match is returned.
   */
  async listByDomain(
    rawDomain: string,
    options: { page?: number; pageSize?: number } = {},
  ): Promise<SubmittedUrl[]> {
    const domain = normalizeDomain(rawDomain ?? '');
    if (!domain) {
      throw new ValidationFailedException('domain must not be empty');
    }

    const page = options.page ?? 1;
    const pageSize =
      options.pageSize ??
      (options.page !== undefined ? DEFAULT_DOMAIN_PAGE_SIZE : undefined);

    return withStorageErrors(this.logger, 'list urls by domain', () =>
      this.urlRepository.find({
        where: { domain },
        order: { submittedAt: 'DESC', id: 'DESC' },
        ...(pageSize !== undefined
          ? { skip: (page - 1) * pageSize, take: pageSize }
          : {}),
      }),
    );
  }

  private requireUrl(rawUrl: string | undefined): string {
    if (!rawUrl?.trim()) {
      throw new ValidationFailedException('url must not be empty');
    }
    const url = normalizeUrl(rawUrl);
    if (!url) {
      throw new ValidationFailedException(
        `url must be an absolute http(s) URL: ${rawUrl.trim()}`,
      );
    }
    return url;
  }

  private findByNormalizedUrl(url: string): Promise<SubmittedUrl | null> {
    return withStorageErrors(this.logger, 'lookup url', () =>
      this.urlRepository.findOne({ where: { url } }),
    );
  }
}
