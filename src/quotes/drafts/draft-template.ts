import { formatAmount, formatMoney } from '../../common/money/money';
import type { EmailDraft, Quotation, SupportedLang } from '../quote.types';
import { DRAFT_COPY } from './draft-copy';

/**
 * Deterministic draft used whenever no generated text is available. Carries
 * every quotation figure the generated version would.
 */
export function renderTemplateDraft(
  quotation: Quotation,
  lang: SupportedLang,
): EmailDraft {
  const copy = DRAFT_COPY[lang].template;
  const { client, currency } = quotation;

  const itemLines = quotation.items.map(
    (item, index) =>
      `${index + 1}. ${item.sku}: ${item.qty} x ${formatAmount(item.unit_price)} = ${formatMoney(item.line_total, currency)}`,
  );

  const body = [
    copy.salutation(client.name),
    '',
    copy.intro,
    '',
    copy.itemsHeading,
    ...itemLines,
    '',
    `${copy.totalLabel}: ${formatMoney(quotation.grand_total, currency)}`,
    ...(quotation.delivery_terms
      ? [`${copy.deliveryTermsLabel}: ${quotation.delivery_terms}`]
      : []),
    ...(quotation.notes ? [`${copy.notesLabel}: ${quotation.notes}`] : []),
    '',
    ...copy.closing,
  ].join('\n');

  return Object.freeze({
    subject: copy.subject(client.name),
    body,
    lang,
    source: 'template' as const,
  });
}
