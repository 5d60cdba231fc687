import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { UrlController } from './url.controller';
import { UrlRegistryService } from './url-registry.service';
import { SubmittedUrl } from './entities/submitted-url.entity';

@Module({
  imports: [TypeOrmModule.forFeature([SubmittedUrl])],
  controllers: [UrlController],
  providers: [UrlRegistryService],
  exports: [UrlRegistryService],
})
export class UrlsModule {}
