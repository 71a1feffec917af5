import { Inject, Injectable } from '@nestjs/common';
import {
  BedrockRuntimeClient,
  InvokeModelCommand,
} from '@aws-sdk/client-bedrock-runtime';
import type { MessageContent } from '@langchain/core/messages';
import { z } from 'zod';
import { LangchainService } from '../ai/langchain.service';
import { APP_CONFIG, type AppConfig } from '../config/app.config';
import type { LanguageModelBackend } from './llm-backend';

const TitanEmbeddingResponse = z.object({
  embedding: z.array(z.number()),
});

@Injectable()
export class BedrockService implements LanguageModelBackend {
  private readonly client: BedrockRuntimeClient;
  readonly embeddingModel: string;

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly lc: LangchainService,
  ) {
    this.client = new BedrockRuntimeClient({ region: config.bedrock.region });
    this.embeddingModel = config.bedrock.embedModel;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const cmd = new InvokeModelCommand({
      modelId: this.embeddingModel,
      contentType: 'application/json',
      accept: 'application/json',
      body: JSON.stringify({
        inputText: text,
        dimensions: this.config.embedding.dimension,
        normalize: true,
      }),
    });

    const res = await this.client.send(cmd, { abortSignal: signal });
    const raw: unknown = JSON.parse(new TextDecoder().decode(res.body));
    const parsed = TitanEmbeddingResponse.safeParse(raw);

    if (!parsed.success) {
      throw new Error(
        `Unexpected embedding response: ${JSON.stringify(raw).slice(0, 500)}`,
      );
    }
    return parsed.data.embedding;
  }

  async complete(prompt: string, signal?: AbortSignal): Promise<string> {
    const res = await this.lc.model.invoke(prompt, { signal });
    const text = contentText(res.content);

    if (!text) {
      throw new Error('Unexpected completion response: empty content');
    }
    return text;
  }
}

// Converse returns either a string or an array of content blocks
function contentText(content: MessageContent): string {
  if (typeof content === 'string') return content;
  return content
    .map((block) => ('text' in block && typeof block.text === 'string' ? block.text : ''))
    .join('');
}
