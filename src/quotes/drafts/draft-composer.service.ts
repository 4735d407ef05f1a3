import { Inject, Injectable, Logger } from '@nestjs/common';
import { ValidationError } from '../../common/errors/domain-errors';
import { APP_CONFIG, type AppConfig } from '../../config/app-config';
import {
  GENERATION_ADAPTER,
  type GenerationAdapter,
} from '../generation/generation-adapter';
import {
  isSupportedLang,
  type EmailDraft,
  type Quotation,
  type SupportedLang,
} from '../quote.types';
import { buildDraftPrompt } from './draft-prompt';
import { renderTemplateDraft } from './draft-template';
import { parseGeneratedDraft } from './generated-draft.parser';

@Injectable()
export class DraftComposerService {
  private readonly logger = new Logger(DraftComposerService.name);

  constructor(
    @Inject(GENERATION_ADAPTER) private readonly adapter: GenerationAdapter,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  /**
   * Produces the email draft for a quotation in the client's language.
   *
   * The adapter gets one attempt. Whatever goes wrong there, the caller gets
   * the template draft instead; only an unsupported language is an error.
   */
  async compose(quotation: Quotation): Promise<EmailDraft> {
    const lang = this.resolveLang(quotation.client.lang);
    const prompt = buildDraftPrompt(quotation, lang);

    try {
      const text = await this.adapter.generate(prompt, lang);
      const parsed = parseGeneratedDraft(text);

      return Object.freeze({
        subject: parsed.subject ?? renderTemplateDraft(quotation, lang).subject,
        body: parsed.body,
        lang,
        source: this.adapter.kind,
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `Draft generation via ${this.adapter.kind} adapter failed, using template: ${reason}`,
      );
      return renderTemplateDraft(quotation, lang);
    }
  }

  resolveLang(lang: string): SupportedLang {
    if (isSupportedLang(lang) && this.config.languages.includes(lang)) {
      return lang;
    }

    throw new ValidationError(`Unsupported language "${lang}"`, [
      `client.lang must be one of the following values: ${this.config.languages.join(', ')}`,
    ]);
  }
}
