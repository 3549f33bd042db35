import { ApiProperty } from '@nestjs/swagger';

/**
 * Response DTO for a stored upload
 */
export class UploadReadingResponseDto {
  @ApiProperty({ example: true })
  success!: true;

  @ApiProperty({ example: 'Data received and stored successfully' })
  message!: string;

  @ApiProperty({
    description: 'Generated record identifier',
    example: '3f0c7a52-4a3e-4b1d-9a57-0c1e5d2b8f11',
  })
  id!: string;

  @ApiProperty({ example: 'FM-7' })
  device_id!: string;

  @ApiProperty({
    description: 'Server-assigned creation time (ISO 8601)',
    example: '2026-10-19T08:15:00.000Z',
  })
  timestamp!: string;
}

/**
 * One page of readings, newest first
 */
export class ReadingPageResponseDto {
  @ApiProperty({ example: true })
  success!: true;

  @ApiProperty({
    description: 'Rows matching the filters, ignoring paging',
    example: 2450,
  })
  totalCount!: number;

  @ApiProperty({ example: 1 })
  page!: number;

  @ApiProperty({ example: 100 })
  pageSize!: number;

  @ApiProperty({ example: 25 })
  totalPages!: number;

  @ApiProperty({
    description:
      'Readings with id, deviceId, createdAt and one FT<n><measurement> field per column',
    type: 'array',
    items: { type: 'object' },
  })
  data!: Record<string, unknown>[];
}

export class DeviceSummaryDto {
  @ApiProperty({ example: 'FM-7' })
  deviceId!: string;

  @ApiProperty({ example: 1440 })
  readingCount!: number;

  @ApiProperty({ example: '2026-10-18T00:00:04.000Z' })
  firstReadingAt!: string;

  @ApiProperty({ example: '2026-10-18T23:59:01.000Z' })
  lastReadingAt!: string;
}

export class ReadingStatsResponseDto {
  @ApiProperty({ example: true })
  success!: true;

  @ApiProperty({ example: 2880 })
  totalReadings!: number;

  @ApiProperty({ example: 2 })
  deviceCount!: number;

  @ApiProperty({ type: [DeviceSummaryDto] })
  devices!: DeviceSummaryDto[];
}
