import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication, ValidationPipe } from '@nestjs/common';
import request from 'supertest';
import { AppController } from '../src/app.controller';
import { AppService } from '../src/app.service';
import { UrlController } from '../src/modules/urls/url.controller';
import { UrlRegistryService } from '../src/modules/urls/url-registry.service';
import { AnalysisResultController } from '../src/modules/analysis/analysis-result.controller';
import { StatisticsController } from '../src/modules/analysis/statistics.controller';
import { AnalysisRecorderService } from '../src/modules/analysis/analysis-recorder.service';
import { AnalysisStatisticsService } from '../src/modules/analysis/services/analysis-statistics.service';
import { AnalysisResult } from '../src/modules/analysis/entities/analysis-result.entity';
import {
  RecordNotFoundException,
  StorageUnavailableException,
} from '../src/common/exceptions/persistence.exceptions';

/**
 * HTTP surface with validation and error mapping; services are mocked so no
 * database is needed.
 */
describe('URL analysis API (e2e)', () => {
  let app: INestApplication;

  const urlId = '123e4567-e89b-12d3-a456-426614174000';

  const mockAppService = {
    getInfo: jest.fn(),
    checkHealth: jest.fn(),
  };

  const mockUrlRegistryService = {
    submit: jest.fn(),
    listByDomain: jest.fn(),
    lookupByUrl: jest.fn(),
    findById: jest.fn(),
  };

  const mockAnalysisRecorderService = {
    recordResult: jest.fn(),
    latestResult: jest.fn(),
    history: jest.fn(),
  };

  const mockAnalysisStatisticsService = {
    listAnalyses: jest.fn(),
    summary: jest.fn(),
    confidenceDistribution: jest.fn(),
    sourcesUsage: jest.fn(),
    dailyCounts: jest.fn(),
  };

  const createResult = (id: string, analysisDate: string): AnalysisResult => ({
    id,
    urlId,
    analysisDate: new Date(analysisDate),
    isPhishing: true,
    riskScore: 92,
    confidenceLevel: 'high',
    virustotalResult: null,
    heuristicResult: null,
    analysisDurationMs: null,
    sourcesChecked: null,
    errorLog: null,
    createdAt: new Date(analysisDate),
  });

  async function* yieldAll(
    results: AnalysisResult[],
  ): AsyncGenerator<AnalysisResult> {
    for (const result of results) {
      yield result;
    }
  }

  beforeAll(async () => {
    const moduleFixture: TestingModule = await Test.createTestingModule({
      controllers: [
        AppController,
        UrlController,
        AnalysisResultController,
        StatisticsController,
      ],
      providers: [
        { provide: AppService, useValue: mockAppService },
        { provide: UrlRegistryService, useValue: mockUrlRegistryService },
        {
          provide: AnalysisRecorderService,
          useValue: mockAnalysisRecorderService,
        },
        {
          provide: AnalysisStatisticsService,
          useValue: mockAnalysisStatisticsService,
        },
      ],
    }).compile();

    app = moduleFixture.createNestApplication();
    app.useGlobalPipes(
      new ValidationPipe({
        whitelist: true,
        transform: true,
        forbidNonWhitelisted: true,
      }),
    );
    app.setGlobalPrefix('api');
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('Service', () => {
    it('should report health', async () => {
      mockAppService.checkHealth.mockResolvedValue({
        status: 'degraded',
        database: 'down',
      });

      const response = await request(app.getHttpServer())
        .get('/api/health')
        .expect(200);

      expect(response.body).toEqual({ status: 'degraded', database: 'down' });
    });
  });

  describe('URLs', () => {
    it('should submit a URL', async () => {
      mockUrlRegistryService.submit.mockResolvedValue({
        id: urlId,
        created: true,
      });

      const response = await request(app.getHttpServer())
        .post('/api/urls')
        .send({
          url: 'http://evil.example/a',
          domain: 'evil.example',
          source: 'manual',
        })
        .expect(201);

      expect(response.body).toEqual({ id: urlId, created: true });
    });

    it('should reject a submission without a domain', async () => {
      await request(app.getHttpServer())
        .post('/api/urls')
        .send({ url: 'http://evil.example/a' })
        .expect(400);

      expect(mockUrlRegistryService.submit).not.toHaveBeenCalled();
    });

    it('should reject unknown fields', async () => {
      await request(app.getHttpServer())
        .post('/api/urls')
        .send({
          url: 'http://evil.example/a',
          domain: 'evil.example',
          priority: 'high',
        })
        .expect(400);
    });

    it('should list by domain with numeric paging', async () => {
      mockUrlRegistryService.listByDomain.mockResolvedValue([]);

      await request(app.getHttpServer())
        .get('/api/urls')
        .query({ domain: 'evil.example', page: '2', pageSize: '25' })
        .expect(200);

      expect(mockUrlRegistryService.listByDomain).toHaveBeenCalledWith(
        'evil.example',
        { page: 2, pageSize: 25 },
      );
    });

    it('should reject a malformed ID', async () => {
      await request(app.getHttpServer()).get('/api/urls/not-a-uuid').expect(400);

      expect(mockUrlRegistryService.findById).not.toHaveBeenCalled();
    });

    it('should map a missing URL to 404', async () => {
      mockUrlRegistryService.findById.mockRejectedValue(
        new RecordNotFoundException(`URL with ID ${urlId} not found`),
      );

      const response = await request(app.getHttpServer())
        .get(`/api/urls/${urlId}`)
        .expect(404);

      expect(response.body).toEqual({
        statusCode: 404,
        message: `URL with ID ${urlId} not found`,
        error: 'Not Found',
        errorCode: 'NOT_FOUND',
        retryable: false,
      });
    });

    it('should look up by URL', async () => {
      mockUrlRegistryService.lookupByUrl.mockRejectedValue(
        new RecordNotFoundException('URL http://unknown.example/ not found'),
      );

      await request(app.getHttpServer())
        .get('/api/urls/lookup')
        .query({ url: 'http://unknown.example/' })
        .expect(404);

      expect(mockUrlRegistryService.lookupByUrl).toHaveBeenCalledWith(
        'http://unknown.example/',
      );
      expect(mockUrlRegistryService.findById).not.toHaveBeenCalled();
    });
  });

  describe('Analysis results', () => {
    it('should record a verdict', async () => {
      mockAnalysisRecorderService.recordResult.mockResolvedValue('result-1');

      const response = await request(app.getHttpServer())
        .post(`/api/urls/${urlId}/analyses`)
        .send({
          isPhishing: true,
          riskScore: 92,
          confidenceLevel: 'high',
          sourcesChecked: ['virustotal', 'heuristics'],
          virustotalResult: { positives: 12 },
        })
        .expect(201);

      expect(response.body).toEqual({ id: 'result-1' });
      expect(mockAnalysisRecorderService.recordResult).toHaveBeenCalledWith(
        urlId,
        expect.objectContaining({
          isPhishing: true,
          riskScore: 92,
          confidenceLevel: 'high',
          sourcesChecked: ['virustotal', 'heuristics'],
          virustotalResult: { positives: 12 },
        }),
      );
    });

    it.each([-1, 101])('should reject risk score %d', async (riskScore) => {
      await request(app.getHttpServer())
        .post(`/api/urls/${urlId}/analyses`)
        .send({ isPhishing: true, riskScore, confidenceLevel: 'high' })
        .expect(400);

      expect(mockAnalysisRecorderService.recordResult).not.toHaveBeenCalled();
    });

    it('should reject confidence level "critical"', async () => {
      await request(app.getHttpServer())
        .post(`/api/urls/${urlId}/analyses`)
        .send({ isPhishing: true, riskScore: 50, confidenceLevel: 'critical' })
        .expect(400);

      expect(mockAnalysisRecorderService.recordResult).not.toHaveBeenCalled();
    });

    it('should reject an analysis date that does not exist', async () => {
      await request(app.getHttpServer())
        .post(`/api/urls/${urlId}/analyses`)
        .send({
          isPhishing: true,
          riskScore: 50,
          confidenceLevel: 'medium',
          analysisDate: '2024-02-30T00:00:00Z',
        })
        .expect(400);

      expect(mockAnalysisRecorderService.recordResult).not.toHaveBeenCalled();
    });

    it('should report storage outages as retryable 503s', async () => {
      mockAnalysisRecorderService.latestResult.mockRejectedValue(
        new StorageUnavailableException(
          'latest analysis result failed: storage unavailable',
        ),
      );

      const response = await request(app.getHttpServer())
        .get(`/api/urls/${urlId}/analyses/latest`)
        .expect(503);

      expect(response.body.errorCode).toBe('STORAGE_UNAVAILABLE');
      expect(response.body.retryable).toBe(true);
    });

    it('should return the latest result', async () => {
      mockAnalysisRecorderService.latestResult.mockResolvedValue(
        createResult('result-2', '2024-03-02T00:00:00.000Z'),
      );

      const response = await request(app.getHttpServer())
        .get(`/api/urls/${urlId}/analyses/latest`)
        .expect(200);

      expect(response.body.id).toBe('result-2');
      expect(response.body.analysisDate).toBe('2024-03-02T00:00:00.000Z');
    });

    it('should return the history up to the limit', async () => {
      mockAnalysisRecorderService.history.mockReturnValue(
        yieldAll([
          createResult('result-3', '2024-03-03T00:00:00.000Z'),
          createResult('result-2', '2024-03-02T00:00:00.000Z'),
          createResult('result-1', '2024-03-01T00:00:00.000Z'),
        ]),
      );

      const response = await request(app.getHttpServer())
        .get(`/api/urls/${urlId}/analyses`)
        .query({ limit: '2' })
        .expect(200);

      expect(response.body.map((r: { id: string }) => r.id)).toEqual([
        'result-3',
        'result-2',
      ]);
    });

    it('should reject a history limit above 1000', async () => {
      await request(app.getHttpServer())
        .get(`/api/urls/${urlId}/analyses`)
        .query({ limit: '1001' })
        .expect(400);
    });
  });

  describe('Statistics', () => {
    it('should parse list filters', async () => {
      mockAnalysisStatisticsService.listAnalyses.mockResolvedValue({
        total: 0,
        page: 2,
        pageSize: 50,
        data: [],
      });

      await request(app.getHttpServer())
        .get('/api/analyses')
        .query({ isPhishing: 'true', page: '2' })
        .expect(200);

      expect(mockAnalysisStatisticsService.listAnalyses).toHaveBeenCalledWith({
        from: undefined,
        to: undefined,
        isPhishing: true,
        page: 2,
        pageSize: 50,
      });
    });

    it('should require both dates for daily counts', async () => {
      await request(app.getHttpServer())
        .get('/api/analyses/daily-counts')
        .query({ from: '2024-03-01' })
        .expect(400);

      expect(mockAnalysisStatisticsService.dailyCounts).not.toHaveBeenCalled();
    });

    it('should reject a calendar date that does not exist', async () => {
      await request(app.getHttpServer())
        .get('/api/analyses/daily-counts')
        .query({ from: '2024-02-30', to: '2024-03-01' })
        .expect(400);

      expect(mockAnalysisStatisticsService.dailyCounts).not.toHaveBeenCalled();
    });
  });
});
