import { PoolClient } from 'pg';
import { query, withTransaction } from '../config/database';
import { ChatMessage, ConversationRecord, isConversationStep } from '../types/conversation';
import { carDataSchema, chatMessageSchema, eligibilityResultSchema, personalDataSchema } from '../types/schemas';
import { ConversationRepository } from './conversation.repository';
import { FieldCipher } from '../utils/crypto';
import { ServiceError, toError } from '../utils/errors';
import { logger } from '../utils/logger';

interface ConversationRow {
  id: string;
  current_step: string;
  encrypted_personal_data: string | null;
  encrypted_car_data: string | null;
  personal_data_confirmed: boolean;
  car_data_confirmed: boolean;
  eligibility_result: unknown;
  created_at: Date | string;
  updated_at: Date | string;
}

interface MessageRow {
  role: string;
  content: string;
}

function toIso(value: Date | string): string {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}

function isEmpty(value: object): boolean {
  return Object.values(value).every((field) => field === undefined);
}

/**
 * Conversations and their messages in Postgres. Personal and car data are
 * stored encrypted; messages are append-only rows ordered by serial id.
 */
export class PostgresConversationRepository implements ConversationRepository {
  constructor(private cipher: FieldCipher) {}

  async load(id: string): Promise<ConversationRecord | null> {
    const conversation = await this.run('load', () =>
      query<ConversationRow>(
        `SELECT id, current_step, encrypted_personal_data, encrypted_car_data,
                personal_data_confirmed, car_data_confirmed, eligibility_result,
                created_at, updated_at
         FROM conversations WHERE id = $1`,
        [id]
      )
    );

    const row = conversation.rows[0];
    if (!row) return null;

    const messages = await this.run('load', () =>
      query<MessageRow>(
        `SELECT role, content FROM messages WHERE conversation_id = $1 ORDER BY id ASC`,
        [id]
      )
    );

    return this.run('load', async () => this.toRecord(row, messages.rows));
  }

  async save(record: ConversationRecord): Promise<void> {
    await this.run('save', () =>
      withTransaction(async (client) => {
        await this.upsertConversation(record, client);
        await this.appendNewMessages(record.id, record.messages, client);
      })
    );

    logger.debug('Conversation saved', { conversationId: record.id, step: record.step });
  }

  async delete(id: string): Promise<boolean> {
    const deleted = await this.run('delete', () =>
      withTransaction(async (client) => {
        await query('DELETE FROM messages WHERE conversation_id = $1', [id], client);
        const result = await query('DELETE FROM conversations WHERE id = $1', [id], client);
        return (result.rowCount ?? 0) > 0;
      })
    );

    logger.info('Conversation deleted', { conversationId: id, deleted });
    return deleted;
  }

  private async upsertConversation(record: ConversationRecord, client: PoolClient): Promise<void> {
    const personal = isEmpty(record.personalData) ? null : this.cipher.encryptJson(record.personalData);
    const car = isEmpty(record.carData) ? null : this.cipher.encryptJson(record.carData);

    await query(
      `INSERT INTO conversations
         (id, current_step, encrypted_personal_data, encrypted_car_data,
          personal_data_confirmed, car_data_confirmed, eligibility_result, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       ON CONFLICT (id) DO UPDATE SET
         current_step = EXCLUDED.current_step,
         encrypted_personal_data = EXCLUDED.encrypted_personal_data,
         encrypted_car_data = EXCLUDED.encrypted_car_data,
         personal_data_confirmed = EXCLUDED.personal_data_confirmed,
         car_data_confirmed = EXCLUDED.car_data_confirmed,
         eligibility_result = EXCLUDED.eligibility_result,
         updated_at = EXCLUDED.updated_at`,
      [
        record.id,
        record.step,
        personal,
        car,
        record.personalConfirmed,
        record.carConfirmed,
        record.eligibilityResult ? JSON.stringify(record.eligibilityResult) : null,
        record.createdAt,
        record.updatedAt,
      ],
      client
    );
  }

  private async appendNewMessages(conversationId: string, messages: ChatMessage[], client: PoolClient): Promise<void> {
    const existing = await query<{ count: number }>(
      'SELECT COUNT(*)::int AS count FROM messages WHERE conversation_id = $1',
      [conversationId],
      client
    );
    const stored = existing.rows[0]?.count ?? 0;

    for (const message of messages.slice(stored)) {
      await query(
        'INSERT INTO messages (conversation_id, role, content) VALUES ($1, $2, $3)',
        [conversationId, message.role, message.content],
        client
      );
    }
  }

  private toRecord(row: ConversationRow, messageRows: MessageRow[]): ConversationRecord {
    if (!isConversationStep(row.current_step)) {
      throw new ServiceError('Postgres', 'load', new Error(`Unknown conversation step: ${row.current_step}`), false);
    }

    return {
      id: row.id,
      step: row.current_step,
      personalData: row.encrypted_personal_data
        ? personalDataSchema.parse(this.cipher.decryptJson(row.encrypted_personal_data))
        : {},
      personalConfirmed: row.personal_data_confirmed,
      carData: row.encrypted_car_data ? carDataSchema.parse(this.cipher.decryptJson(row.encrypted_car_data)) : {},
      carConfirmed: row.car_data_confirmed,
      eligibilityResult:
        row.eligibility_result === null || row.eligibility_result === undefined
          ? null
          : eligibilityResultSchema.parse(
              typeof row.eligibility_result === 'string' ? JSON.parse(row.eligibility_result) : row.eligibility_result
            ),
      messages: messageRows.map((message) => chatMessageSchema.parse(message)),
      createdAt: toIso(row.created_at),
      updatedAt: toIso(row.updated_at),
    };
  }

  private async run<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error: unknown) {
      if (error instanceof ServiceError) throw error;
      logger.error('Conversation storage failed', { operation, error: toError(error).message });
      throw new ServiceError('Postgres', operation, toError(error));
    }
  }
}
