import { IsEnum, IsInt, IsNotEmpty, IsNumber, IsOptional, IsPositive, IsString } from 'class-validator';
import { OrderSide } from '../../position/entities/order.entity';

// Paper mode fills from the quote; live mode books a broker-confirmed
// fill and needs price (and usually orderId).
export class PlaceOrderDto {
  @IsEnum(OrderSide)
  side!: OrderSide;

  @IsInt()
  @IsPositive()
  lots!: number;

  @IsOptional()
  @IsNumber()
  @IsPositive()
  price?: number;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  orderId?: string;

  @IsOptional()
  @IsString()
  status?: string;
}
