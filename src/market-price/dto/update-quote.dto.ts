import { IsNumber, IsOptional, IsPositive } from 'class-validator';

export class UpdateQuoteDto {
  @IsNumber()
  @IsPositive()
  ltp!: number;

  @IsOptional()
  @IsNumber()
  @IsPositive()
  bid?: number;

  @IsOptional()
  @IsNumber()
  @IsPositive()
  ask?: number;
}
