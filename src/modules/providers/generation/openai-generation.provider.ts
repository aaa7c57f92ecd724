import { Injectable } from '@nestjs/common';
import OpenAI from 'openai';
import { AppConfigService } from '../../app/app-config.service';
import { errorMessage } from '../../../common/errors/error-message';
import { ProviderError, classifyHttpStatus } from '../provider-errors';
import type { GenerationProvider, GenerationRequest } from './generation-provider';

const JSON_ONLY_SUFFIX =
  '\n\nReturn ONLY a minified JSON object. Do not include any extra commentary, markdown, or code fences.';

function toProviderError(err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;
  // Connection and timeout errors carry no status and are retryable.
  if (err instanceof OpenAI.APIError && typeof err.status === 'number') {
    return new ProviderError(`OpenAI HTTP ${err.status}: ${err.message}`, classifyHttpStatus(err.status), err.status);
  }
  return new ProviderError(`OpenAI request failed: ${errorMessage(err)}`, 'retryable');
}

@Injectable()
export class OpenAiGenerationProvider implements GenerationProvider {
  readonly name = 'openai';
  private client: OpenAI | null = null;

  constructor(private readonly appConfig: AppConfigService) {}

  configured(): boolean {
    return Boolean(this.appConfig.openAiApiKey());
  }

  private getClient(): OpenAI {
    if (this.client) return this.client;
    const apiKey = this.appConfig.openAiApiKey();
    if (!apiKey) throw new ProviderError('OPENAI_API_KEY not set', 'terminal');
    // Retries belong to the provider gateway; the SDK's own would multiply them.
    this.client = new OpenAI({ apiKey, maxRetries: 0, timeout: this.appConfig.providerTimeoutMs() });
    return this.client;
  }

  async generate(req: GenerationRequest): Promise<string> {
    const client = this.getClient();
    try {
      const res = await client.chat.completions.create({
        model: this.appConfig.openAiModel(),
        temperature: req.temperature,
        messages: [{ role: 'user', content: req.json ? `${req.prompt.trim()}${JSON_ONLY_SUFFIX}` : req.prompt.trim() }],
        ...(req.json ? { response_format: { type: 'json_object' as const } } : {}),
      });
      return res.choices[0]?.message?.content ?? '';
    } catch (err) {
      throw toProviderError(err);
    }
  }
}
