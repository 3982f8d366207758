import { v4 as uuidv4 } from 'uuid';
import { ConversationRecord, createConversationRecord } from '../types/conversation';
import { TurnResult } from '../types/agent';
import { ConversationRepository } from './conversation.repository';
import { ConversationStateMachine } from './state-machine.service';
import { ResponseRenderer } from './response.service';
import { InProcessTurnLock, TurnLock } from './lock.service';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface EligibilityChatbotDeps {
  repository: ConversationRepository;
  machine: ConversationStateMachine;
  renderer: ResponseRenderer;
  lock?: TurnLock;
  now?: () => Date;
}

export class EligibilityChatbot {
  private repository: ConversationRepository;
  private machine: ConversationStateMachine;
  private renderer: ResponseRenderer;
  private lock: TurnLock;
  private now: () => Date;

  constructor(deps: EligibilityChatbotDeps) {
    this.repository = deps.repository;
    this.machine = deps.machine;
    this.renderer = deps.renderer;
    this.lock = deps.lock ?? new InProcessTurnLock();
    this.now = deps.now ?? (() => new Date());
  }

  async processMessage(userText: string, conversationId?: string): Promise<TurnResult> {
    const id = conversationId || uuidv4();

    try {
      return await this.lock.withLock(id, () => this.runTurn(id, userText));
    } catch (error: unknown) {
      logger.error('Failed to process message', { conversationId: id, error: errorMessage(error) });
      throw error;
    }
  }

  async getConversation(conversationId: string): Promise<ConversationRecord | null> {
    return this.repository.load(conversationId);
  }

  async deleteConversation(conversationId: string): Promise<boolean> {
    return this.lock.withLock(conversationId, () => this.repository.delete(conversationId));
  }

  private async runTurn(id: string, userText: string): Promise<TurnResult> {
    const loaded = await this.repository.load(id);
    const record = loaded ?? createConversationRecord(id, this.now());
    if (!loaded) {
      logger.info('New conversation created', { conversationId: id });
    }

    const withInput: ConversationRecord = {
      ...record,
      messages: [...record.messages, { role: 'user', content: userText }],
    };

    const { record: processed, event } = await this.machine.process(withInput, userText);
    const response = await this.renderer.render(event);

    const updated: ConversationRecord = {
      ...processed,
      messages: response ? [...processed.messages, { role: 'assistant', content: response }] : processed.messages,
      updatedAt: this.now().toISOString(),
    };
    await this.repository.save(updated);

    logger.info('Message handled', {
      conversationId: id,
      from: record.step,
      to: updated.step,
      event: event?.type ?? null,
    });

    return { response, conversationId: id, step: updated.step };
  }
}
