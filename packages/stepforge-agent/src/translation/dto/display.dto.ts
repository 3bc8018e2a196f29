import { Type } from 'class-transformer';
import { IsInt, IsOptional, IsPositive, IsString } from 'class-validator';

export class DisplayDto {
  @Type(() => Number)
  @IsInt()
  @IsPositive()
  width!: number;

  @Type(() => Number)
  @IsInt()
  @IsPositive()
  height!: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  x?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  y?: number;

  @IsOptional()
  @IsString()
  name?: string;
}
