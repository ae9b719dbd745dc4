import { Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsPositive,
  IsString,
  ValidateNested,
} from 'class-validator';

export class InstrumentConfigDto {
  @IsString()
  @IsNotEmpty()
  symbol!: string;

  @IsString()
  @IsNotEmpty()
  exchange!: string;

  @IsInt()
  @IsPositive()
  lotSize!: number;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  product?: string;
}

// Shape of config/instruments.json
export class InstrumentsFileDto {
  @IsArray()
  @ArrayMinSize(1, { message: 'At least one instrument is required' })
  @ValidateNested({ each: true })
  @Type(() => InstrumentConfigDto)
  instruments!: InstrumentConfigDto[];
}
