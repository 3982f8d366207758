import { Client, QueryResult, QueryResultRow } from 'pg';
import { query, withTransaction } from '../../src/config/database';
import { PostgresConversationRepository } from '../../src/services/postgres.repository';
import { evaluateEligibility } from '../../src/services/eligibility.service';
import { ConversationRecord, createConversationRecord } from '../../src/types/conversation';
import { FieldCipher } from '../../src/utils/crypto';
import { ServiceError } from '../../src/utils/errors';

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

jest.mock('../../src/config/database', () => ({
  query: jest.fn(),
  withTransaction: jest.fn(),
}));

const mockQuery = jest.mocked(query);
const mockWithTransaction = jest.mocked(withTransaction);
const client = Object.assign(new Client(), { release: jest.fn() });

function result(rows: QueryResultRow[], rowCount: number = rows.length): QueryResult<QueryResultRow> {
  return { rows, rowCount, command: '', oid: 0, fields: [] };
}

const cipher = FieldCipher.fromString('0123456789abcdef'.repeat(4));

describe('PostgresConversationRepository', () => {
  const repository = new PostgresConversationRepository(cipher);

  beforeEach(() => {
    mockQuery.mockReset();
    mockWithTransaction.mockReset();
    mockWithTransaction.mockImplementation((work) => work(client));
  });

  describe('load', () => {
    it('should return null when the conversation does not exist', async () => {
      mockQuery.mockResolvedValueOnce(result([]));

      expect(await repository.load('missing')).toBeNull();
      expect(mockQuery).toHaveBeenCalledTimes(1);
    });

    it('should decrypt stored data and restore messages in order', async () => {
      const eligibility = evaluateEligibility(1990, 2020, 45000, 2025);
      mockQuery
        .mockResolvedValueOnce(
          result([
            {
              id: 'conv-1',
              current_step: 'completed',
              encrypted_personal_data: cipher.encryptJson({
                fullName: 'Juan Pérez',
                birthYear: 1990,
                email: 'juan@example.com',
              }),
              encrypted_car_data: cipher.encryptJson({ brand: 'Toyota', model: 'Corolla', year: 2020, mileage: 45000 }),
              personal_data_confirmed: true,
              car_data_confirmed: true,
              eligibility_result: eligibility,
              created_at: new Date('2025-01-01T10:00:00.000Z'),
              updated_at: '2025-01-01T10:05:00.000Z',
            },
          ])
        )
        .mockResolvedValueOnce(
          result([
            { role: 'user', content: 'Hola' },
            { role: 'assistant', content: '¡Hola!' },
          ])
        );

      const record = await repository.load('conv-1');

      expect(record).toEqual({
        id: 'conv-1',
        step: 'completed',
        personalData: { fullName: 'Juan Pérez', birthYear: 1990, email: 'juan@example.com' },
        personalConfirmed: true,
        carData: { brand: 'Toyota', model: 'Corolla', year: 2020, mileage: 45000 },
        carConfirmed: true,
        eligibilityResult: eligibility,
        messages: [
          { role: 'user', content: 'Hola' },
          { role: 'assistant', content: '¡Hola!' },
        ],
        createdAt: '2025-01-01T10:00:00.000Z',
        updatedAt: '2025-01-01T10:05:00.000Z',
      });
      expect(mockQuery.mock.calls[1]?.[1]).toEqual(['conv-1']);
    });

    it('should parse an eligibility result stored as text', async () => {
      const eligibility = evaluateEligibility(2010, 2020, 45000, 2025);
      mockQuery
        .mockResolvedValueOnce(
          result([
            {
              id: 'conv-1',
              current_step: 'completed',
              encrypted_personal_data: null,
              encrypted_car_data: null,
              personal_data_confirmed: false,
              car_data_confirmed: false,
              eligibility_result: JSON.stringify(eligibility),
              created_at: '2025-01-01T10:00:00.000Z',
              updated_at: '2025-01-01T10:00:00.000Z',
            },
          ])
        )
        .mockResolvedValueOnce(result([]));

      const record = await repository.load('conv-1');

      expect(record?.eligibilityResult).toEqual(eligibility);
      expect(record?.personalData).toEqual({});
      expect(record?.carData).toEqual({});
    });

    it('should refuse a row with an unknown step', async () => {
      mockQuery
        .mockResolvedValueOnce(
          result([
            {
              id: 'conv-1',
              current_step: 'negotiating',
              encrypted_personal_data: null,
              encrypted_car_data: null,
              personal_data_confirmed: false,
              car_data_confirmed: false,
              eligibility_result: null,
              created_at: '2025-01-01T10:00:00.000Z',
              updated_at: '2025-01-01T10:00:00.000Z',
            },
          ])
        )
        .mockResolvedValueOnce(result([]));

      await expect(repository.load('conv-1')).rejects.toThrow(
        'Postgres.load failed: Unknown conversation step: negotiating'
      );
    });

    it('should wrap driver errors', async () => {
      mockQuery.mockRejectedValueOnce(new Error('connection refused'));

      const error = await repository.load('conv-1').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ServiceError);
      expect(error).toHaveProperty('message', 'Postgres.load failed: connection refused');
    });
  });

  describe('save', () => {
    const record: ConversationRecord = {
      ...createConversationRecord('conv-1', new Date('2025-01-01T10:00:00.000Z')),
      step: 'collecting_personal_data',
      personalData: { fullName: 'Juan Pérez' },
      messages: [
        { role: 'user', content: 'Hola' },
        { role: 'assistant', content: '¡Hola!' },
        { role: 'user', content: 'Juan Pérez' },
        { role: 'assistant', content: 'Gracias, Juan.' },
      ],
    };

    it('should upsert inside a transaction and append only new messages', async () => {
      mockQuery
        .mockResolvedValueOnce(result([], 1))
        .mockResolvedValueOnce(result([{ count: 2 }]))
        .mockResolvedValue(result([], 1));

      await repository.save(record);

      expect(mockWithTransaction).toHaveBeenCalledTimes(1);
      expect(mockQuery).toHaveBeenCalledTimes(4);

      const upsertParams = mockQuery.mock.calls[0]?.[1] ?? [];
      expect(upsertParams[0]).toBe('conv-1');
      expect(upsertParams[1]).toBe('collecting_personal_data');
      expect(typeof upsertParams[2]).toBe('string');
      expect(upsertParams[2]).not.toContain('Juan');
      expect(upsertParams[3]).toBeNull();
      expect(upsertParams[6]).toBeNull();
      expect(mockQuery.mock.calls[0]?.[2]).toBe(client);

      const stored = upsertParams[2];
      expect(typeof stored === 'string' ? cipher.decryptJson(stored) : null).toEqual({ fullName: 'Juan Pérez' });

      expect(mockQuery.mock.calls[2]?.[1]).toEqual(['conv-1', 'user', 'Juan Pérez']);
      expect(mockQuery.mock.calls[3]?.[1]).toEqual(['conv-1', 'assistant', 'Gracias, Juan.']);
    });

    it('should store the eligibility result as JSON', async () => {
      const eligibility = evaluateEligibility(1990, 2020, 45000, 2025);
      mockQuery.mockResolvedValueOnce(result([], 1)).mockResolvedValueOnce(result([{ count: 4 }]));

      await repository.save({ ...record, step: 'completed', eligibilityResult: eligibility });

      expect(mockQuery).toHaveBeenCalledTimes(2);
      expect(mockQuery.mock.calls[0]?.[1]?.[6]).toBe(JSON.stringify(eligibility));
    });

    it('should surface a failed transaction as a service error', async () => {
      mockQuery.mockRejectedValueOnce(new Error('deadlock detected'));

      await expect(repository.save(record)).rejects.toThrow('Postgres.save failed: deadlock detected');
    });
  });

  describe('delete', () => {
    it('should delete messages before the conversation', async () => {
      mockQuery.mockResolvedValueOnce(result([], 2)).mockResolvedValueOnce(result([], 1));

      expect(await repository.delete('conv-1')).toBe(true);
      expect(mockQuery.mock.calls[0]?.[0]).toBe('DELETE FROM messages WHERE conversation_id = $1');
      expect(mockQuery.mock.calls[1]?.[0]).toBe('DELETE FROM conversations WHERE id = $1');
    });

    it('should report when nothing was deleted', async () => {
      mockQuery.mockResolvedValueOnce(result([], 0)).mockResolvedValueOnce(result([], 0));

      expect(await repository.delete('missing')).toBe(false);
    });
  });
});
