import { GenerationError } from '../../common/errors/domain-errors';

export type ParsedDraft = {
  subject: string | null;
  body: string;
};

const SUBJECT_LINE = /^(?:subject|الموضوع)\s*[:：]\s*(.*)$/i;

function stripMarkdown(line: string): string {
  return line
    .trim()
    .replace(/^[#*_\s]+/, '')
    .replace(/[*_\s]+$/, '');
}

/**
 * Splits model output into subject and body. Only the first non-empty line
 * may carry the subject; without one the whole text is the body.
 */
export function parseGeneratedDraft(text: string): ParsedDraft {
  const lines = text.replace(/\r\n?/g, '\n').trim().split('\n');
  const first = stripMarkdown(lines[0] ?? '');
  const match = SUBJECT_LINE.exec(first);

  if (!match) {
    const body = lines.join('\n').trim();
    if (!body) throw new GenerationError('Generated draft is empty');
    return { subject: null, body };
  }

  const subject = stripMarkdown(match[1] ?? '') || null;
  const body = lines.slice(1).join('\n').trim();
  if (!body) throw new GenerationError('Generated draft has no body');

  return { subject, body };
}
