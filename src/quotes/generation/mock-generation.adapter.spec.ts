import { MockGenerationAdapter } from './mock-generation.adapter';

describe('MockGenerationAdapter', () => {
  const adapter = new MockGenerationAdapter();

  it('frames the prompt detail lines with the client subject and a fixed closing', async () => {
    const prompt = [
      'Write an email.',
      '',
      '- Client: Acme Trading <buyer@acme.test>',
      '  - Grand total: 220.00 SAR',
    ].join('\n');

    await expect(adapter.generate(prompt, 'en')).resolves.toBe(
      [
        'Subject: Quotation - Acme Trading',
        '',
        'Hello, please find the details of our quotation below.',
        '',
        '- Client: Acme Trading <buyer@acme.test>',
        '- Grand total: 220.00 SAR',
        '',
        'Kind regards,',
        'Sales Team',
      ].join('\n'),
    );
  });

  it('answers in Arabic for ar', async () => {
    const text = await adapter.generate(
      '- العميل: شركة الأفق <buyer@ofuq.test>\n- العملة: SAR',
      'ar',
    );

    expect(text.split('\n')[0]).toBe('الموضوع: عرض سعر - شركة الأفق');
    expect(text).toContain('- العملة: SAR');
  });

  it('falls back to a generic subject when the prompt names no client', async () => {
    const text = await adapter.generate('- Currency: SAR', 'en');

    expect(text.split('\n')[0]).toBe('Subject: Your quotation');
  });

  it('is tagged as the mock adapter', () => {
    expect(adapter.kind).toBe('mock');
  });
});
