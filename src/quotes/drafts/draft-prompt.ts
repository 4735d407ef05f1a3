import { formatAmount, formatMoney } from '../../common/money/money';
import type { Quotation, SupportedLang } from '../quote.types';
import { DRAFT_COPY } from './draft-copy';

/**
 * One `- label: value` line per quotation fact. The mock adapter echoes
 * exactly these lines, so every fact must fit on a single line.
 */
export function buildDetailLines(
  quotation: Quotation,
  lang: SupportedLang,
): string[] {
  const labels = DRAFT_COPY[lang].detailLabels;
  const { client, currency } = quotation;

  const lines = [
    `- ${labels.client}: ${client.name} <${client.contact}>`,
    `- ${labels.currency}: ${currency}`,
    ...quotation.items.map(
      (item) =>
        `- ${labels.item} ${item.sku}: ${labels.qty} ${item.qty} x ${formatAmount(item.unit_price)} = ${formatMoney(item.line_total, currency)}`,
    ),
    `- ${labels.grandTotal}: ${formatMoney(quotation.grand_total, currency)}`,
  ];

  if (quotation.delivery_terms) {
    lines.push(
      `- ${labels.deliveryTerms}: ${singleLine(quotation.delivery_terms)}`,
    );
  }
  if (quotation.notes) {
    lines.push(`- ${labels.notes}: ${singleLine(quotation.notes)}`);
  }

  return lines;
}

export function buildDraftPrompt(
  quotation: Quotation,
  lang: SupportedLang,
): string {
  return [
    ...DRAFT_COPY[lang].promptInstructions(quotation.client.name),
    '',
    ...buildDetailLines(quotation, lang),
  ].join('\n');
}

function singleLine(text: string): string {
  return text.replace(/\s*\n\s*/g, ' ');
}
