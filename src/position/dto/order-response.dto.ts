export interface OrderResponseDto {
  timestamp: string;             // ISO timestamp
  side: string;
  lots: number;
  price: number;
  orderId: string;
  status: string;
}
