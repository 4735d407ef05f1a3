import type { SupportedLang } from '../quote.types';

export const GENERATION_ADAPTER = Symbol('GENERATION_ADAPTER');

export type GenerationAdapterKind = 'model' | 'mock';

/**
 * Text-completion capability the draft composer depends on. Implementations
 * reject with `GenerationError` on any failure.
 */
export interface GenerationAdapter {
  readonly kind: GenerationAdapterKind;
  generate(prompt: string, lang: SupportedLang): Promise<string>;
}
