import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  ArrayUnique,
  IsArray,
  IsBoolean,
  IsEnum,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Matches,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import {
  PathMatchMode,
  RateLimitAlgorithm,
  SlidingWindowType,
  WafAction,
  WafSeverity,
} from '../rule.types';

const RULE_ID = /^[A-Za-z0-9_.-]+$/;

export class RuleSelectorDto {
  @ApiPropertyOptional({
    type: [String],
    description: 'Route patterns; a trailing * matches by prefix',
  })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  routes?: string[];

  @ApiPropertyOptional({ type: [String], example: ['GET', 'POST'] })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  methods?: string[];

  @ApiPropertyOptional({ type: [String] })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  backends?: string[];
}

export class RateLimitRuleDto {
  @ApiProperty({ example: 'per-client' })
  @IsString()
  @Matches(RULE_ID)
  id!: string;

  @ApiProperty({ example: '{client_id}' })
  @IsString()
  @IsNotEmpty()
  key!: string;

  @ApiProperty({ enum: RateLimitAlgorithm })
  @IsEnum(RateLimitAlgorithm)
  algorithm!: RateLimitAlgorithm;

  @ApiProperty({ minimum: 0 })
  @IsInt()
  @Min(0)
  limit!: number;

  @ApiProperty({ example: 60 })
  @IsNumber()
  @IsPositive()
  windowSeconds!: number;

  @ApiPropertyOptional({ description: 'Bucket capacity; defaults to limit' })
  @IsOptional()
  @IsInt()
  @Min(0)
  burst?: number;

  @ApiPropertyOptional({ example: 'route:{route}' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  fallbackScope?: string;

  @ApiPropertyOptional({ type: RuleSelectorDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => RuleSelectorDto)
  match?: RuleSelectorDto;
}

export class CircuitBreakerConfigDto {
  @ApiProperty({ example: 'payments' })
  @IsString()
  @IsNotEmpty()
  backendId!: string;

  @ApiProperty({ example: 0.5 })
  @IsNumber()
  @Min(0)
  @Max(1)
  failureRateThreshold!: number;

  @ApiPropertyOptional({ enum: SlidingWindowType })
  @IsOptional()
  @IsEnum(SlidingWindowType)
  slidingWindowType?: SlidingWindowType;

  @ApiProperty({ example: 10 })
  @IsInt()
  @Min(1)
  slidingWindowSize!: number;

  @ApiPropertyOptional()
  @IsOptional()
  @IsInt()
  @Min(1)
  minimumNumberOfCalls?: number;

  @ApiProperty({ example: 30 })
  @IsNumber()
  @IsPositive()
  waitDurationOpenSeconds!: number;

  @ApiPropertyOptional({ example: 3 })
  @IsOptional()
  @IsInt()
  @Min(1)
  halfOpenPermittedCalls?: number;

  @ApiPropertyOptional()
  @IsOptional()
  @IsInt()
  @Min(1)
  halfOpenSuccessThreshold?: number;

  @ApiPropertyOptional({ description: '0 waits for probes indefinitely' })
  @IsOptional()
  @IsNumber()
  @Min(0)
  maxWaitInHalfOpenSeconds?: number;
}

export const WAF_MATCHER_TYPES = [
  'path',
  'header',
  'body',
  'ip',
  'rate',
  'all',
  'any',
] as const;

export type WafMatcherType = (typeof WAF_MATCHER_TYPES)[number];

/**
 * One node of a WAF predicate. Which fields are required depends on `type`;
 * that is checked when the document is compiled.
 */
export class WafMatcherDto {
  @ApiProperty({ enum: WAF_MATCHER_TYPES })
  @IsIn(WAF_MATCHER_TYPES)
  type!: WafMatcherType;

  @ApiPropertyOptional({ enum: ['exact', 'prefix', 'regex'] })
  @IsOptional()
  @IsIn(['exact', 'prefix', 'regex'])
  mode?: PathMatchMode;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  pattern?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  name?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  equals?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  contains?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsBoolean()
  ignoreCase?: boolean;

  @ApiPropertyOptional({
    description: 'Client addresses or CIDR ranges, e.g. 10.0.0.0/8',
    type: [String],
  })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  addresses?: string[];

  @ApiPropertyOptional({ description: 'Match clients not in addresses' })
  @IsOptional()
  @IsBoolean()
  invert?: boolean;

  @ApiPropertyOptional({ description: 'Rate-limit rule id; omitted means any' })
  @IsOptional()
  @IsString()
  ruleId?: string;

  @ApiPropertyOptional({ type: () => [WafMatcherDto] })
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => WafMatcherDto)
  matchers?: WafMatcherDto[];
}

export class WafRuleDto {
  @ApiProperty({ example: 'block-scanners' })
  @IsString()
  @Matches(RULE_ID)
  id!: string;

  @ApiProperty({ example: 10 })
  @IsInt()
  priority!: number;

  @ApiProperty({ enum: WafAction })
  @IsEnum(WafAction)
  action!: WafAction;

  @ApiPropertyOptional({ enum: WafSeverity })
  @IsOptional()
  @IsEnum(WafSeverity)
  severity?: WafSeverity;

  @ApiPropertyOptional({ default: true, description: 'Disabled rules are validated but not applied' })
  @IsOptional()
  @IsBoolean()
  enabled?: boolean;

  @ApiProperty({ type: WafMatcherDto })
  @ValidateNested()
  @Type(() => WafMatcherDto)
  match!: WafMatcherDto;
}

export class RulesDocumentDto {
  @ApiProperty({ example: '2024-05-01.1' })
  @IsString()
  @IsNotEmpty()
  version!: string;

  @ApiPropertyOptional({ type: [RateLimitRuleDto] })
  @IsOptional()
  @IsArray()
  @ArrayUnique((rule: RateLimitRuleDto) => rule.id)
  @ValidateNested({ each: true })
  @Type(() => RateLimitRuleDto)
  rateLimits?: RateLimitRuleDto[];

  @ApiPropertyOptional({ type: [CircuitBreakerConfigDto] })
  @IsOptional()
  @IsArray()
  @ArrayUnique((config: CircuitBreakerConfigDto) => config.backendId)
  @ValidateNested({ each: true })
  @Type(() => CircuitBreakerConfigDto)
  circuitBreakers?: CircuitBreakerConfigDto[];

  @ApiPropertyOptional({ type: [WafRuleDto] })
  @IsOptional()
  @IsArray()
  @ArrayUnique((rule: WafRuleDto) => rule.id)
  @ValidateNested({ each: true })
  @Type(() => WafRuleDto)
  wafRules?: WafRuleDto[];
}
