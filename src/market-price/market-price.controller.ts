import { Body, Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { MarketPriceService, Quote } from './market-price.service';
import { UpdateQuoteDto } from './dto/update-quote.dto';
import { QuoteResponseDto } from './dto/quote-response.dto';

export function toQuoteResponse(quote: Quote | null): QuoteResponseDto {
  return {
    ltp: quote?.ltp ?? null,
    bid: quote?.bid ?? null,
    ask: quote?.ask ?? null,
    lastUpdated: quote ? quote.updatedAt.toISOString() : null,
    source: 'manual',
  };
}

@Controller('market')
export class MarketPriceController {
  constructor(private readonly marketPriceService: MarketPriceService) {}

  /**
   * Current quote for the active instrument.
   *
   * GET /market/quote
   */
  @Get('quote')
  getQuote(): QuoteResponseDto {
    return toQuoteResponse(this.marketPriceService.getQuote());
  }

  /**
   * Replaces the quote; picked up by the next price tick.
   *
   * POST /market/quote
   */
  @Post('quote')
  @HttpCode(HttpStatus.OK)
  updateQuote(@Body() updateQuoteDto: UpdateQuoteDto): QuoteResponseDto {
    return toQuoteResponse(this.marketPriceService.updateQuote(updateQuoteDto));
  }
}
