import { ConversationRecord } from '../types/conversation';

export interface ConversationRepository {
  load(id: string): Promise<ConversationRecord | null>;
  save(record: ConversationRecord): Promise<void>;
  delete(id: string): Promise<boolean>;
}

function cloneRecord(record: ConversationRecord): ConversationRecord {
  return {
    ...record,
    personalData: { ...record.personalData },
    carData: { ...record.carData },
    eligibilityResult: record.eligibilityResult
      ? { ...record.eligibilityResult, reasons: [...record.eligibilityResult.reasons] }
      : null,
    messages: record.messages.map((message) => ({ ...message })),
  };
}

/** Process-local storage for development, the CLI and tests. */
export class InMemoryConversationRepository implements ConversationRepository {
  private records = new Map<string, ConversationRecord>();

  async load(id: string): Promise<ConversationRecord | null> {
    const record = this.records.get(id);
    return record ? cloneRecord(record) : null;
  }

  async save(record: ConversationRecord): Promise<void> {
    this.records.set(record.id, cloneRecord(record));
  }

  async delete(id: string): Promise<boolean> {
    return this.records.delete(id);
  }

  get size(): number {
    return this.records.size;
  }
}
