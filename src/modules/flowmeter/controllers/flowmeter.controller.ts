import {
  Body,
  Controller,
  Get,
  Headers,
  HttpCode,
  HttpStatus,
  Ip,
  Logger,
  Post,
  Query,
} from '@nestjs/common';
import {
  ApiBody,
  ApiOperation,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { MalformedRequestException } from '../../../common/exceptions';
import {
  FlowReadingQueryDto,
  ReadingPageResponseDto,
  ReadingStatsResponseDto,
  UploadReadingResponseDto,
} from '../../../dto';
import { buildUploadBodySchema } from '../../../dto/upload-body.schema';
import {
  FlowmeterService,
  LatestReading,
  ReadingPage,
  ReadingStats,
  UploadResult,
} from '../services/flowmeter.service';
import {
  resolveReadingCriteria,
  resolveReadingFilters,
} from '../services/reading-filters';

/**
 * `application/json`, or any `application/*+json` media type
 */
export function isJsonContentType(contentType: string | undefined): boolean {
  if (!contentType) {
    return false;
  }
  const mediaType = contentType.split(';')[0].trim().toLowerCase();
  return (
    mediaType === 'application/json' ||
    (mediaType.startsWith('application/') && mediaType.endsWith('+json'))
  );
}

/**
 * First hop of X-Forwarded-For when behind a proxy, else the socket address
 */
export function resolveClientAddress(
  forwardedFor: string | undefined,
  socketAddress: string | undefined,
): string {
  const firstHop = forwardedFor?.split(',')[0]?.trim();
  return firstHop || socketAddress || 'unknown';
}

@ApiTags('flowmeter')
@Controller('api/flowmeter')
export class FlowmeterController {
  private readonly logger = new Logger(FlowmeterController.name);

  constructor(private readonly flowmeterService: FlowmeterService) {}

  /**
   * SCADA HTTP uploader endpoint
   */
  @Post('upload')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Ingest one flow meter reading',
    description:
      'Accepts a flat JSON object with `deviceid` and up to 54 FT<n><measurement> fields. ' +
      'Values are strings and may contain the $$ placeholder; empty or non-numeric values are stored as null.',
  })
  @ApiBody({ schema: buildUploadBodySchema() })
  @ApiResponse({ status: 200, type: UploadReadingResponseDto })
  @ApiResponse({
    status: 400,
    description: 'Body is not JSON, is empty, or has no device ID',
  })
  @ApiResponse({ status: 500, description: 'Storage failure' })
  async upload(
    @Headers('content-type') contentType: string | undefined,
    @Headers('x-forwarded-for') forwardedFor: string | undefined,
    @Ip() ip: string | undefined,
    @Body() body: unknown,
  ): Promise<UploadResult> {
    this.logger.log(
      `Upload request from ${resolveClientAddress(forwardedFor, ip)}`,
    );

    if (!isJsonContentType(contentType)) {
      throw new MalformedRequestException(
        'Content-Type must be application/json',
      );
    }

    this.logger.debug(`Upload payload: ${JSON.stringify(body)}`);
    return this.flowmeterService.ingest(body);
  }

  @Get('data')
  @ApiOperation({
    summary: 'Query stored readings',
    description:
      'Filters by device and inclusive createdAt range; results are newest first and paged.',
  })
  @ApiResponse({ status: 200, type: ReadingPageResponseDto })
  @ApiResponse({ status: 400, description: 'Invalid start_date or end_date' })
  @ApiResponse({ status: 500, description: 'Storage failure' })
  async getData(@Query() query: FlowReadingQueryDto): Promise<ReadingPage> {
    return this.flowmeterService.query(resolveReadingFilters(query));
  }

  @Get('latest')
  @ApiOperation({
    summary: 'Most recent reading',
    description: 'Newest reading overall, or for one device when device_id is given.',
  })
  @ApiResponse({ status: 200, description: 'Latest reading' })
  @ApiResponse({ status: 404, description: 'No readings stored yet' })
  async getLatest(@Query() query: FlowReadingQueryDto): Promise<LatestReading> {
    const { deviceId } = resolveReadingCriteria({ device_id: query.device_id });
    return this.flowmeterService.latest(deviceId);
  }

  @Get('stats')
  @ApiOperation({
    summary: 'Reading statistics per device',
    description:
      'Reading count and first/last createdAt per device, honouring device_id, start_date and end_date.',
  })
  @ApiResponse({ status: 200, type: ReadingStatsResponseDto })
  @ApiResponse({ status: 400, description: 'Invalid start_date or end_date' })
  async getStats(@Query() query: FlowReadingQueryDto): Promise<ReadingStats> {
    return this.flowmeterService.stats(resolveReadingCriteria(query));
  }
}
