import { Body, Controller, Post } from '@nestjs/common';
import { ResponseMessage } from '../common/decorators/response-message.decorator';
import { CreateQuoteDto } from './dto/create-quote.dto';
import type { QuoteResponseDto } from './dto/quote-response.dto';
import { QuotesService } from './quotes.service';

@Controller('quote')
export class QuotesController {
  constructor(private readonly quotes: QuotesService) {}

  @ResponseMessage('Quotation generated successfully.')
  @Post()
  async create(@Body() dto: CreateQuoteDto): Promise<QuoteResponseDto> {
    return await this.quotes.createQuote(dto);
  }
}
