import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { UrlsModule } from '../urls/urls.module';
import { AnalysisResultController } from './analysis-result.controller';
import { StatisticsController } from './statistics.controller';
import { AnalysisRecorderService } from './analysis-recorder.service';
import { AnalysisStatisticsService } from './services/analysis-statistics.service';
import { AnalysisResult } from './entities/analysis-result.entity';

@Module({
  imports: [TypeOrmModule.forFeature([AnalysisResult]), UrlsModule],
  controllers: [AnalysisResultController, StatisticsController],
  providers: [AnalysisRecorderService, AnalysisStatisticsService],
  exports: [AnalysisRecorderService],
})
export class AnalysisModule {}
