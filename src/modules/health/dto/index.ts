import { IsInt, IsOptional, IsPositive, Max, Min } from 'class-validator';

export class ReportOutcomeDto {
  @IsInt()
  @IsPositive()
  proxyId!: number;

  /** HTTP status the client saw, or 0 for a transport failure */
  @IsInt()
  @Min(0)
  @Max(999)
  statusCode!: number;
}

export class FailureRatioDto {
  @IsInt()
  @IsPositive()
  proxyId!: number;

  /** Defaults to HEALTH_WINDOW_SEC */
  @IsOptional()
  @IsInt()
  @IsPositive()
  windowSec?: number;
}

export class ProxyStatisticsDto {
  @IsInt()
  @IsPositive()
  proxyId!: number;
}
