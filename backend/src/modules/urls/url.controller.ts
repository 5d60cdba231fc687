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
import { UrlRegistryService } from './url-registry.service';
import {
  ListUrlsQueryDto,
  LookupUrlQueryDto,
  SubmitUrlDto,
  SubmitUrlResult,
} from './dto/submit-url.dto';
import { SubmittedUrl } from './entities/submitted-url.entity';

@ApiTags('URLs')
@Controller('urls')
export class UrlController {
  constructor(private readonly urlRegistryService: UrlRegistryService) {}

  @Post()
  @ApiOperation({ summary: 'Submit a URL for analysis tracking' })
  @ApiResponse({
    status: 201,
    description: 'Returns the URL identity and whether it was newly created',
  })
  @ApiResponse({ status: 400, description: 'Invalid URL or domain' })
  submit(@Body() submitUrlDto: SubmitUrlDto): Promise<SubmitUrlResult> {
    return this.urlRegistryService.submit(submitUrlDto);
  }

  @Get()
  @ApiOperation({ summary: 'List submitted URLs of a domain' })
  @ApiResponse({
    status: 200,
    description: 'Returns the URLs, most recently submitted first',
  })
  listByDomain(@Query() query: ListUrlsQueryDto): Promise<SubmittedUrl[]> {
    return this.urlRegistryService.listByDomain(query.domain, {
      page: query.page,
      pageSize: query.pageSize,
    });
  }

  @Get('lookup')
  @ApiOperation({ summary: 'Look up a submitted URL by its address' })
  @ApiResponse({ status: 200, description: 'Returns the URL record' })
  @ApiResponse({ status: 404, description: 'URL not found' })
  lookup(@Query() query: LookupUrlQueryDto): Promise<SubmittedUrl> {
    return this.urlRegistryService.lookupByUrl(query.url);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a submitted URL by ID' })
  @ApiResponse({ status: 200, description: 'Returns the URL record' })
  @ApiResponse({ status: 404, description: 'URL not found' })
  findOne(@Param('id', ParseUUIDPipe) id: string): Promise<SubmittedUrl> {
    return this.urlRegistryService.findById(id);
  }
}
