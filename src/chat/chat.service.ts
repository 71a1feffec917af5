import { Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import type { AskInput } from '../ai/schemas';
import { APP_CONFIG, type AppConfig } from '../config/app.config';
import { ConversationContextService } from '../conversation/conversation-context.service';
import { createTurn, type Citation } from '../conversation/conversation.types';
import { SynthesizerService } from '../rag/synthesizer.service';
import { RetrieverService } from '../search/retriever.service';

export type ChatAnswer = {
  conversationId: string;
  answerId: string;
  question: string;
  resolvedQuestion: string;
  answer: string;
  grounded: boolean;
  citations: Citation[];
};

@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name);

  constructor(
    private readonly context: ConversationContextService,
    private readonly retriever: RetrieverService,
    private readonly synthesizer: SynthesizerService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  /**
   * One question/answer round. The whole sequence runs under the conversation's
   * lock so a second message for the same conversation waits for this one.
   */
  async ask(input: AskInput, signal?: AbortSignal): Promise<ChatAnswer> {
    const conversationId = input.conversationId ?? uuidv4();

    return this.context.runExclusive(conversationId, async () => {
      const conversation = await this.context.load(conversationId);
      const resolvedQuestion = this.context.resolveFollowup(input.message, conversation);
      if (resolvedQuestion !== input.message) {
        this.logger.log(`Resolved follow-up in ${conversationId}`);
      }

      const chunks = await this.retriever.search(resolvedQuestion, input.k, input.filters, signal);
      const history = this.context.history(conversation, this.config.synthesis.historyTurns);
      const result = await this.synthesizer.answer(resolvedQuestion, chunks, history, { signal });

      const turn = createTurn({
        id: uuidv4(),
        question: input.message,
        resolvedQuestion,
        retrievedChunkIds: chunks.map((c) => c.chunkId),
        answerText: result.answerText,
        citations: result.citations,
        createdAt: new Date().toISOString(),
      });
      await this.context.save(this.context.appendTurn(conversation, turn));

      return {
        conversationId,
        answerId: turn.id,
        question: input.message,
        resolvedQuestion,
        answer: result.answerText,
        grounded: result.grounded,
        citations: [...result.citations],
      };
    });
  }
}
