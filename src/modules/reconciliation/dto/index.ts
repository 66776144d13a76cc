import { IsInt, IsPositive } from 'class-validator';

export class ReconcileSourceDto {
  @IsInt()
  @IsPositive()
  sourceId!: number;
}
