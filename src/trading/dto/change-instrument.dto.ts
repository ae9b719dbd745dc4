import { IsNotEmpty, IsString } from 'class-validator';

export class ChangeInstrumentDto {
  @IsString()
  @IsNotEmpty()
  symbol!: string;
}
