import { Inject, Injectable, Logger } from '@nestjs/common';
import { KeyedMutex } from '../common/keyed-mutex';
import { APP_CONFIG, type AppConfig } from '../config/app.config';
import { CONVERSATION_STORE, type ConversationStore } from './conversation-store';
import {
  emptyConversation,
  type Conversation,
  type ConversationState,
  type Turn,
} from './conversation.types';
import { resolveFollowup } from './followup-resolver';

/**
 * Conversation lifecycle: empty -> active -> expired.
 *
 * Conversations are immutable values; every change returns a new one which the
 * caller saves. `runExclusive` keeps the load/resolve/append/save sequence of one
 * conversation from interleaving with another request for the same id.
 */
@Injectable()
export class ConversationContextService {
  private readonly logger = new Logger(ConversationContextService.name);
  private readonly locks = new KeyedMutex();

  constructor(
    @Inject(CONVERSATION_STORE) private readonly store: ConversationStore,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  state(conversation: Conversation | null, now = new Date()): ConversationState {
    if (!conversation || !conversation.turns.length) return 'empty';
    const idleMs = now.getTime() - Date.parse(conversation.lastActivityAt);
    return idleMs > this.config.conversation.ttlMs ? 'expired' : 'active';
  }

  isLive(conversation: Conversation | null, now = new Date()) {
    return this.state(conversation, now) === 'active';
  }

  /** Turns of the current session; none once the conversation has expired. */
  liveTurns(conversation: Conversation | null, now = new Date()): readonly Turn[] {
    if (!conversation || !this.isLive(conversation, now)) return [];
    return conversation.turns.slice(conversation.historyStartIndex);
  }

  async load(conversationId: string, now = new Date()): Promise<Conversation> {
    return (await this.store.load(conversationId)) ?? emptyConversation(conversationId, now);
  }

  async save(conversation: Conversation) {
    await this.store.save(conversation);
  }

  /** Extends a live conversation's inactivity window. Expired or unknown ids are left alone. */
  async touch(conversationId: string, now = new Date()): Promise<Conversation | null> {
    const conversation = await this.store.load(conversationId);
    if (!conversation || !this.isLive(conversation, now)) return conversation;

    const touched = Object.freeze({ ...conversation, lastActivityAt: now.toISOString() });
    await this.store.save(touched);
    return touched;
  }

  resolveFollowup(rawQuestion: string, conversation: Conversation | null, now = new Date()) {
    return resolveFollowup(rawQuestion, this.liveTurns(conversation, now));
  }

  /**
   * Returns a new conversation with `turn` appended. Appending to an expired
   * conversation starts a new session at that turn.
   */
  appendTurn(conversation: Conversation, turn: Turn, now = new Date()): Conversation {
    const expired = this.state(conversation, now) === 'expired';
    if (expired) {
      this.logger.log(`Conversation ${conversation.id} expired; starting a new session`);
    }

    return Object.freeze({
      ...conversation,
      turns: Object.freeze([...conversation.turns, turn]),
      lastActivityAt: now.toISOString(),
      historyStartIndex: expired ? conversation.turns.length : conversation.historyStartIndex,
    });
  }

  /** The last `maxTurns` live turns, oldest first. */
  history(conversation: Conversation | null, maxTurns: number, now = new Date()): readonly Turn[] {
    if (maxTurns <= 0) return [];
    return this.liveTurns(conversation, now).slice(-maxTurns);
  }

  runExclusive<T>(conversationId: string, work: () => Promise<T>): Promise<T> {
    return this.locks.runExclusive(conversationId, work);
  }
}
