import { Injectable, Logger } from '@nestjs/common';
import { DraftComposerService } from './drafts/draft-composer.service';
import { CreateQuoteDto } from './dto/create-quote.dto';
import type { QuoteResponseDto } from './dto/quote-response.dto';
import { PricingCalculatorService } from './pricing/pricing-calculator.service';
import { generateQuoteId } from './quote-id';

@Injectable()
export class QuotesService {
  private readonly logger = new Logger(QuotesService.name);

  constructor(
    private readonly pricing: PricingCalculatorService,
    private readonly composer: DraftComposerService,
  ) {}

  async createQuote(
    dto: CreateQuoteDto,
    now: Date = new Date(),
  ): Promise<QuoteResponseDto> {
    // Reject a disabled language before doing any pricing work.
    this.composer.resolveLang(dto.client.lang);

    const quotation = this.pricing.buildQuotation({
      client: {
        name: dto.client.name,
        contact: dto.client.contact,
        lang: dto.client.lang,
      },
      currency: dto.currency,
      items: dto.items.map((item) => ({
        sku: item.sku,
        qty: item.qty,
        unit_cost: item.unit_cost,
        margin_pct: item.margin_pct,
      })),
      delivery_terms: dto.delivery_terms,
      notes: dto.notes,
    });

    const emailDraft = await this.composer.compose(quotation);
    const quoteId = generateQuoteId(now);

    this.logger.log(
      `Quote generated successfully: ${quoteId} (${quotation.items.length} items, draft=${emailDraft.source})`,
    );

    return {
      quote_id: quoteId,
      ...quotation,
      email_draft: emailDraft,
      generated_at: now.toISOString(),
    };
  }
}
