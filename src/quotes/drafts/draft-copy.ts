import type { SupportedLang } from '../quote.types';

export type DraftCopy = {
  detailLabels: {
    client: string;
    currency: string;
    item: string;
    qty: string;
    grandTotal: string;
    deliveryTerms: string;
    notes: string;
  };
  promptInstructions: (clientName: string) => string[];
  template: {
    subject: (clientName: string) => string;
    salutation: (clientName: string) => string;
    intro: string;
    itemsHeading: string;
    totalLabel: string;
    deliveryTermsLabel: string;
    notesLabel: string;
    closing: string[];
  };
};

export const DRAFT_COPY: Record<SupportedLang, DraftCopy> = {
  en: {
    detailLabels: {
      client: 'Client',
      currency: 'Currency',
      item: 'Item',
      qty: 'qty',
      grandTotal: 'Grand total',
      deliveryTerms: 'Delivery terms',
      notes: 'Notes',
    },
    promptInstructions: (clientName) => [
      `Write a professional quotation email in English for the client ${clientName}.`,
      'Start with a line of the form "Subject: <subject>", then a blank line, then the email body.',
      'Mention every line item and the grand total exactly as given below. Do not invent prices, discounts or taxes.',
      'The email should be polite and concise.',
    ],
    template: {
      subject: (clientName) => `Quotation - ${clientName}`,
      salutation: (clientName) => `Dear ${clientName},`,
      intro: 'We are pleased to provide you with the following quotation:',
      itemsHeading: 'Items:',
      totalLabel: 'Total Amount',
      deliveryTermsLabel: 'Delivery Terms',
      notesLabel: 'Additional Notes',
      closing: [
        'We hope our proposal meets your requirements and look forward to working with you.',
        '',
        'Best regards,',
        'Sales Team',
      ],
    },
  },
  ar: {
    detailLabels: {
      client: 'العميل',
      currency: 'العملة',
      item: 'الصنف',
      qty: 'الكمية',
      grandTotal: 'الإجمالي الكلي',
      deliveryTerms: 'شروط التسليم',
      notes: 'ملاحظات',
    },
    promptInstructions: (clientName) => [
      `اكتب مسودة بريد إلكتروني باللغة العربية لعرض سعر احترافي للعميل ${clientName}.`,
      'ابدأ بسطر بالشكل "الموضوع: <الموضوع>" ثم سطر فارغ ثم نص الرسالة.',
      'اذكر جميع الأصناف والإجمالي الكلي كما هي تماماً دون اختراع أسعار أو خصومات أو ضرائب.',
      'يجب أن يكون البريد مهذباً ومهنياً وموجزاً.',
    ],
    template: {
      subject: (clientName) => `عرض سعر - ${clientName}`,
      salutation: (clientName) => `عزيزي/عزيزتي ${clientName}،`,
      intro: 'نتشرف بتقديم عرض السعر التالي:',
      itemsHeading: 'الأصناف:',
      totalLabel: 'إجمالي المبلغ',
      deliveryTermsLabel: 'شروط التسليم',
      notesLabel: 'ملاحظات إضافية',
      closing: [
        'نأمل أن يحوز عرضنا على رضاكم، ونتطلع للعمل معكم.',
        '',
        'مع أطيب التحيات،',
        'فريق المبيعات',
      ],
    },
  },
};
