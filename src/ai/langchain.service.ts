import { Inject, Injectable } from '@nestjs/common';
import { ChatBedrockConverse } from '@langchain/aws';
import { APP_CONFIG, type AppConfig } from '../config/app.config';

@Injectable()
export class LangchainService {
  private readonly llm: ChatBedrockConverse;

  constructor(@Inject(APP_CONFIG) config: AppConfig) {
    this.llm = new ChatBedrockConverse({
      model: config.bedrock.llmModel,
      region: config.bedrock.region,
      temperature: 0,
      // retries are owned by the synthesizer so they are not compounded here
      maxRetries: 0,
    });
  }

  get model() {
    return this.llm;
  }
}
