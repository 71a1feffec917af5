import { Injectable } from '@nestjs/common';
import type { Conversation } from './conversation.types';

export const CONVERSATION_STORE = Symbol('CONVERSATION_STORE');

export interface ConversationStore {
  load(conversationId: string): Promise<Conversation | null>;
  save(conversation: Conversation): Promise<void>;
}

@Injectable()
export class InMemoryConversationStore implements ConversationStore {
  private readonly conversations = new Map<string, Conversation>();

  async load(conversationId: string) {
    return this.conversations.get(conversationId) ?? null;
  }

  // conversations are frozen, so storing the reference is safe
  async save(conversation: Conversation) {
    this.conversations.set(conversation.id, conversation);
  }
}
