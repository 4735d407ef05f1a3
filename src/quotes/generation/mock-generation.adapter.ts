import { DRAFT_COPY } from '../drafts/draft-copy';
import type { SupportedLang } from '../quote.types';
import type { GenerationAdapter } from './generation-adapter';

const MOCK_COPY: Record<
  SupportedLang,
  {
    subjectPrefix: string;
    genericSubject: string;
    greeting: string;
    closing: string[];
  }
> = {
  en: {
    subjectPrefix: 'Subject:',
    genericSubject: 'Your quotation',
    greeting: 'Hello, please find the details of our quotation below.',
    closing: ['Kind regards,', 'Sales Team'],
  },
  ar: {
    subjectPrefix: 'الموضوع:',
    genericSubject: 'عرض السعر الخاص بكم',
    greeting: 'مرحباً، تجدون أدناه تفاصيل عرض السعر.',
    closing: ['مع أطيب التحيات،', 'فريق المبيعات'],
  },
};

/** Reads the client name back out of the `- Client: name <contact>` line. */
function clientNameFrom(details: string[], lang: SupportedLang): string | null {
  const prefix = `- ${DRAFT_COPY[lang].detailLabels.client}: `;
  const line = details.find((detail) => detail.startsWith(prefix));
  if (!line) return null;
  return (
    line
      .slice(prefix.length)
      .replace(/\s*<[^>]*>$/, '')
      .trim() || null
  );
}

/**
 * Offline stand-in for the model. The reply is a fixed frame around the
 * prompt's `- ` detail lines, so the same prompt always gives the same draft.
 * The subject matches the fallback template's.
 */
export class MockGenerationAdapter implements GenerationAdapter {
  readonly kind = 'mock' as const;

  async generate(prompt: string, lang: SupportedLang): Promise<string> {
    const copy = MOCK_COPY[lang];
    const details = prompt
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.startsWith('- '));

    const clientName = clientNameFrom(details, lang);
    const subject = clientName
      ? DRAFT_COPY[lang].template.subject(clientName)
      : copy.genericSubject;

    return [
      `${copy.subjectPrefix} ${subject}`,
      '',
      copy.greeting,
      '',
      ...details,
      '',
      ...copy.closing,
    ].join('\n');
  }
}
