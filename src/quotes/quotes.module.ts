import { Logger, Module } from '@nestjs/common';
import { APP_CONFIG, type AppConfig } from '../config/app-config';
import { DraftComposerService } from './drafts/draft-composer.service';
import { GeminiGenerationAdapter } from './generation/gemini-generation.adapter';
import {
  GENERATION_ADAPTER,
  type GenerationAdapter,
} from './generation/generation-adapter';
import { MockGenerationAdapter } from './generation/mock-generation.adapter';
import { PricingCalculatorService } from './pricing/pricing-calculator.service';
import { QuotesController } from './quotes.controller';
import { QuotesService } from './quotes.service';

export function createGenerationAdapter(config: AppConfig): GenerationAdapter {
  const logger = new Logger('GenerationAdapter');

  if (config.generation.mode === 'live') {
    logger.log('Draft generation: live (Gemini)');
    return new GeminiGenerationAdapter(config.generation);
  }

  logger.log(
    'Draft generation: mock (GOOGLE_API_KEY missing or QUOTE_MOCK_MODE set)',
  );
  return new MockGenerationAdapter();
}

@Module({
  providers: [
    PricingCalculatorService,
    DraftComposerService,
    QuotesService,
    {
      provide: GENERATION_ADAPTER,
      inject: [APP_CONFIG],
      useFactory: createGenerationAdapter,
    },
  ],
  controllers: [QuotesController],
  exports: [PricingCalculatorService, DraftComposerService],
})
export class QuotesModule {}
