import type { EmailDraft, Quotation } from '../quote.types';

export type QuoteResponseDto = Quotation & {
  quote_id: string;
  email_draft: EmailDraft;
  /** ISO-8601, UTC. */
  generated_at: string;
};
