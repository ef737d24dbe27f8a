import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString, MaxLength } from 'class-validator';

export class ForceOpenDto {
  @ApiPropertyOptional({ example: 'planned maintenance' })
  @IsOptional()
  @IsString()
  @MaxLength(200)
  reason?: string;
}
