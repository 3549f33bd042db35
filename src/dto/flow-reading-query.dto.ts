import { ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, TransformFnParams } from 'class-transformer';
import { IsOptional, IsString } from 'class-validator';

// A repeated parameter (?page=1&page=2) arrives as an array; the first wins.
function firstValue({ value }: TransformFnParams): unknown {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Query string for the read endpoints.
 *
 * Values stay as text here; paging defaults, clamping and date parsing
 * happen in reading-filters so a bad page number falls back to the default
 * instead of failing the request.
 */
export class FlowReadingQueryDto {
  @ApiPropertyOptional({
    description: 'Exact device identifier',
    example: 'FM-7',
  })
  @Transform(firstValue)
  @IsOptional()
  @IsString()
  device_id?: string;

  @ApiPropertyOptional({
    description: 'Inclusive lower bound on createdAt (ISO 8601, UTC if no offset)',
    example: '2026-10-01T00:00:00Z',
  })
  @Transform(firstValue)
  @IsOptional()
  @IsString()
  start_date?: string;

  @ApiPropertyOptional({
    description: 'Inclusive upper bound on createdAt (ISO 8601, UTC if no offset)',
    example: '2026-10-02T00:00:00Z',
  })
  @Transform(firstValue)
  @IsOptional()
  @IsString()
  end_date?: string;

  @ApiPropertyOptional({
    description: 'Page number, starting at 1 (default: 1)',
    example: '1',
  })
  @Transform(firstValue)
  @IsOptional()
  @IsString()
  page?: string;

  @ApiPropertyOptional({
    description: 'Rows per page (default: 100, max: 1000)',
    example: '100',
  })
  @Transform(firstValue)
  @IsOptional()
  @IsString()
  page_size?: string;
}
