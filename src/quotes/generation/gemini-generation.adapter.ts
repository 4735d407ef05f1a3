import { ChatGoogleGenerativeAI } from '@langchain/google-genai';
import {
  HumanMessage,
  SystemMessage,
  type BaseMessage,
  type MessageContent,
} from '@langchain/core/messages';
import { Logger } from '@nestjs/common';
import { GenerationError } from '../../common/errors/domain-errors';
import type { GenerationConfig } from '../../config/app-config';
import type { SupportedLang } from '../quote.types';
import type { GenerationAdapter } from './generation-adapter';

/** The slice of a LangChain chat model this adapter calls. */
export interface ChatModel {
  invoke(
    messages: BaseMessage[],
    options?: { signal?: AbortSignal },
  ): Promise<{ content: MessageContent }>;
}

const SYSTEM_PROMPTS: Record<SupportedLang, string> = {
  en: 'You write concise, professional sales emails. Reply with the email only: no markdown, no code fences, no commentary.',
  ar: 'أنت تكتب رسائل بريد إلكتروني مهنية وموجزة للمبيعات. أجب بنص الرسالة فقط: بدون تنسيق Markdown وبدون أي تعليق.',
};

export function extractText(content: MessageContent): string {
  if (typeof content === 'string') return content;
  return content
    .map((part) =>
      'text' in part && typeof part.text === 'string' ? part.text : '',
    )
    .join('');
}

function describe(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export class GeminiGenerationAdapter implements GenerationAdapter {
  readonly kind = 'model' as const;
  private readonly logger = new Logger(GeminiGenerationAdapter.name);
  private readonly chatModel: ChatModel;

  constructor(
    private readonly config: GenerationConfig,
    chatModel?: ChatModel,
  ) {
    if (chatModel) {
      this.chatModel = chatModel;
      return;
    }

    if (!config.apiKey) {
      throw new Error('GOOGLE_API_KEY is required for live draft generation');
    }

    this.logger.log(
      `Initializing Gemini adapter with model=${config.model}, temperature=${config.temperature}, timeout=${config.timeoutMs}ms`,
    );
    this.chatModel = new ChatGoogleGenerativeAI({
      apiKey: config.apiKey,
      model: config.model,
      temperature: config.temperature,
      maxOutputTokens: config.maxOutputTokens,
      maxRetries: 0,
    });
  }

  async generate(prompt: string, lang: SupportedLang): Promise<string> {
    const messages = [
      new SystemMessage(SYSTEM_PROMPTS[lang]),
      new HumanMessage(prompt),
    ];

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        // Reject before aborting so the race settles with the timeout error.
        reject(
          new GenerationError(
            `Gemini did not answer within ${this.config.timeoutMs}ms`,
          ),
        );
        controller.abort();
      }, this.config.timeoutMs);
    });

    try {
      this.logger.debug('Requesting draft', {
        lang,
        preview: prompt.slice(0, 240),
      });

      const response = await Promise.race([
        this.chatModel.invoke(messages, { signal: controller.signal }),
        timeout,
      ]);
      const text = extractText(response.content).trim();

      if (!text) {
        throw new GenerationError('Gemini returned an empty draft');
      }
      return text;
    } catch (error) {
      if (error instanceof GenerationError) throw error;

      const msg = describe(error);
      const lowered = msg.toLowerCase();
      if (lowered.includes('quota')) {
        throw new GenerationError('Gemini quota exhausted', error);
      }
      if (lowered.includes('rate limit') || lowered.includes('rate_limit')) {
        throw new GenerationError('Gemini rate limit reached', error);
      }
      throw new GenerationError(`Gemini request failed: ${msg}`, error);
    } finally {
      clearTimeout(timer);
    }
  }
}
