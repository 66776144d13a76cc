import { IsInt, IsPositive } from 'class-validator';

export class AcquireProxyDto {
  @IsInt()
  @IsPositive()
  sourceId!: number;
}
