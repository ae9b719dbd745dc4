import { Body, Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { TradingSessionService } from './trading-session.service';
import { PlaceOrderDto } from './dto/place-order.dto';
import { ChangeInstrumentDto } from './dto/change-instrument.dto';
import { TradingStateDto } from './dto/trading-state.dto';
import { OrderResponseDto } from '../position/dto/order-response.dto';
import { PositionManagerService } from '../position/position-manager.service';
import { toOrderResponse } from '../position/ledger.mapper';
import { MarketPriceService } from '../market-price/market-price.service';
import { toQuoteResponse } from '../market-price/market-price.controller';
import { InstrumentConfig } from '../instruments/entities/instrument.entity';

@Controller('trading')
export class TradingController {
  constructor(
    private readonly session: TradingSessionService,
    private readonly positionManager: PositionManagerService,
    private readonly marketPriceService: MarketPriceService,
  ) {}

  /**
   * Dashboard state: mode, instrument, position, orders, stats, quote.
   *
   * GET /trading/state
   */
  @Get('state')
  async getState(): Promise<TradingStateDto> {
    const position = await this.positionManager.snapshotPosition();
    const orders = await this.positionManager.snapshotOrders();
    const stats = this.positionManager.simulationMode
      ? await this.positionManager.sessionStats()
      : null;

    return {
      mode: this.session.mode,
      instrument: this.session.getInstrument(),
      position,
      orders,
      stats,
      quote: toQuoteResponse(this.marketPriceService.getQuote()),
    };
  }

  @Get('instruments')
  getInstruments(): InstrumentConfig[] {
    return this.session.listInstruments();
  }

  /**
   * Places an order through the configured executor.
   *
   * POST /trading/orders
   * @returns 201 with the booked fill
   */
  @Post('orders')
  @HttpCode(HttpStatus.CREATED)
  async placeOrder(@Body() placeOrderDto: PlaceOrderDto): Promise<OrderResponseDto> {
    const order = await this.session.placeOrder(placeOrderDto);
    return toOrderResponse(order);
  }

  /**
   * Sells all open lots.
   *
   * POST /trading/close-all
   */
  @Post('close-all')
  @HttpCode(HttpStatus.OK)
  async closeAll(): Promise<{ message: string; order: OrderResponseDto | null }> {
    const order = await this.session.closeAll();
    return order
      ? { message: `Closed ${order.lots} lots`, order: toOrderResponse(order) }
      : { message: 'No open positions to close', order: null };
  }

  /**
   * Switches instrument; 409 while a position is open.
   *
   * POST /trading/instrument
   */
  @Post('instrument')
  @HttpCode(HttpStatus.OK)
  changeInstrument(@Body() changeInstrumentDto: ChangeInstrumentDto): Promise<InstrumentConfig> {
    return this.session.changeInstrument(changeInstrumentDto.symbol);
  }
}
