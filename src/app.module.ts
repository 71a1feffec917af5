import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { LangchainService } from './ai/langchain.service';
import { BedrockService } from './bedrock/bedrock.service';
import { LLM_BACKEND } from './bedrock/llm-backend';
import { ChatController } from './chat/chat.controller';
import { ChatService } from './chat/chat.service';
import { RagExceptionFilter } from './common/rag-exception.filter';
import { APP_CONFIG, loadConfig, type AppConfig } from './config/app.config';
import { ConversationContextService } from './conversation/conversation-context.service';
import { CONVERSATION_STORE, InMemoryConversationStore } from './conversation/conversation-store';
import { PgConversationStore } from './conversation/pg-conversation.store';
import { DatabaseService } from './database/database.service';
import { DocumentParser } from './documents/document-parser.service';
import { DOCUMENT_STORE, InMemoryDocumentStore } from './documents/document-store';
import { FeedbackAggregatorService } from './feedback/feedback-aggregator.service';
import { FeedbackController } from './feedback/feedback.controller';
import { FEEDBACK_REPOSITORY, InMemoryFeedbackRepository } from './feedback/feedback.repository';
import { PgFeedbackRepository } from './feedback/pg-feedback.repository';
import { EmbedderService } from './ingest/embedder.service';
import { IndexWriterService } from './ingest/index-writer.service';
import { IngestController } from './ingest/ingest.controller';
import { IngestService } from './ingest/ingest.service';
import { SynthesizerService } from './rag/synthesizer.service';
import { RetrieverService } from './search/retriever.service';
import { InMemorySearchBackend } from './search/in-memory-search.backend';
import { PgSearchBackend } from './search/pg-search.backend';
import { SEARCH_BACKEND } from './search/search-backend';

const usesPostgres = (config: AppConfig) => config.storage.driver === 'postgres';

@Module({
  controllers: [ChatController, IngestController, FeedbackController],
  providers: [
    { provide: APP_CONFIG, useFactory: () => loadConfig() },
    { provide: APP_FILTER, useClass: RagExceptionFilter },
    DatabaseService,
    LangchainService,
    BedrockService,
    { provide: LLM_BACKEND, useExisting: BedrockService },
    { provide: DOCUMENT_STORE, useClass: InMemoryDocumentStore },
    {
      provide: SEARCH_BACKEND,
      inject: [APP_CONFIG, DatabaseService],
      useFactory: (config: AppConfig, db: DatabaseService) =>
        usesPostgres(config) ? new PgSearchBackend(db) : new InMemorySearchBackend(),
    },
    {
      provide: CONVERSATION_STORE,
      inject: [APP_CONFIG, DatabaseService],
      useFactory: (config: AppConfig, db: DatabaseService) =>
        usesPostgres(config) ? new PgConversationStore(db) : new InMemoryConversationStore(),
    },
    {
      provide: FEEDBACK_REPOSITORY,
      inject: [APP_CONFIG, DatabaseService],
      useFactory: (config: AppConfig, db: DatabaseService) =>
        usesPostgres(config) ? new PgFeedbackRepository(db) : new InMemoryFeedbackRepository(),
    },
    DocumentParser,
    EmbedderService,
    IndexWriterService,
    IngestService,
    RetrieverService,
    ConversationContextService,
    SynthesizerService,
    FeedbackAggregatorService,
    ChatService,
  ],
})
export class AppModule {}
