export const SUPPORTED_LANGS = ['en', 'ar'] as const;

export type SupportedLang = (typeof SUPPORTED_LANGS)[number];

export function isSupportedLang(value: string): value is SupportedLang {
  return SUPPORTED_LANGS.some((lang) => lang === value);
}

export type ClientInfo = {
  readonly name: string;
  readonly contact: string;
  readonly lang: string;
};

export type LineItem = {
  readonly sku: string;
  readonly qty: number;
  readonly unit_cost: number;
  readonly margin_pct: number;
};

export type PricedLineItem = LineItem & {
  readonly unit_price: number;
  readonly line_total: number;
};

export type QuotationInput = {
  client: ClientInfo;
  currency: string;
  items: readonly LineItem[];
  delivery_terms?: string;
  notes?: string;
};

export type Quotation = {
  readonly client: ClientInfo;
  readonly currency: string;
  readonly items: readonly PricedLineItem[];
  readonly grand_total: number;
  readonly delivery_terms: string | null;
  readonly notes: string | null;
};

/** Which path produced the draft text. */
export type DraftSource = 'model' | 'mock' | 'template';

export type EmailDraft = {
  readonly subject: string;
  readonly body: string;
  readonly lang: SupportedLang;
  readonly source: DraftSource;
};
