import { InstrumentConfig } from '../../instruments/entities/instrument.entity';
import { PositionResponseDto } from '../../position/dto/position-response.dto';
import { OrderResponseDto } from '../../position/dto/order-response.dto';
import { SessionStatsDto } from '../../position/dto/session-stats.dto';
import { QuoteResponseDto } from '../../market-price/dto/quote-response.dto';

// Everything the dashboard polls in one payload
export interface TradingStateDto {
  mode: string;
  instrument: InstrumentConfig;
  position: PositionResponseDto;
  orders: OrderResponseDto[];
  stats: SessionStatsDto | null;   // simulation only
  quote: QuoteResponseDto;
}
