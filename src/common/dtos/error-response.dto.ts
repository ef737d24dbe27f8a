import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class ErrorResponseDto {
  @ApiProperty({ example: false })
  success!: boolean;

  @ApiProperty({ example: 429 })
  statusCode!: number;

  @ApiProperty({ example: 'Too Many Requests' })
  error!: string;

  @ApiProperty()
  message!: string;

  @ApiProperty({ example: '2024-05-01T12:00:00.000Z' })
  timestamp!: string;

  @ApiPropertyOptional({ type: [String] })
  details?: string[];

  @ApiPropertyOptional({ example: 'rate_limited' })
  outcome?: string;

  @ApiPropertyOptional({ nullable: true })
  retryAfterMs?: number | null;

  @ApiPropertyOptional({ nullable: true })
  matchedRuleId?: string | null;
}
