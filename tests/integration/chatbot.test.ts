jest.mock('../../src/config/env', () => ({
  env: {
    PORT: '3000',
    NODE_ENV: 'test',
    STORAGE_DRIVER: 'memory',
    LLM_PROVIDER: 'anthropic',
    ANTHROPIC_API_KEY: 'test-key',
    ANTHROPIC_MODEL: 'claude-3-5-haiku-latest',
    OPENAI_MODEL: 'gpt-4o-mini',
    LLM_TEMPERATURE: 0.3,
    USE_LLM_RESPONSES: false,
  },
}));

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { ChatbotFactory } from '../../src/services/chatbot.factory';
import { EligibilityChatbot } from '../../src/services/chatbot.service';
import { ConversationRepository, InMemoryConversationRepository } from '../../src/services/conversation.repository';
import { ScriptedCompletion, happyPathCompletion } from '../helpers/scripted-completion';

const NOW = new Date('2025-06-01T12:00:00.000Z');

const HAPPY_PATH = [
  'Hola',
  'Me llamo Juan Pérez',
  'Nací en 1990',
  'juan@example.com',
  'Sí',
  'Tengo un Toyota',
  'Corolla',
  '2020',
  '45.000 km',
  'correcto',
];

function chatbotWith(
  completion: ScriptedCompletion,
  repository: ConversationRepository = new InMemoryConversationRepository()
): EligibilityChatbot {
  return ChatbotFactory.create({ repository, completion, now: () => NOW });
}

describe('EligibilityChatbot', () => {
  it('should take a new user from greeting to an eligible verdict', async () => {
    const repository = new InMemoryConversationRepository();
    const chatbot = chatbotWith(happyPathCompletion(), repository);

    const responses: string[] = [];
    let step = '';
    for (const message of HAPPY_PATH) {
      const turn = await chatbot.processMessage(message, 'conv-1');
      responses.push(turn.response);
      step = turn.step;
    }

    expect(responses).toEqual([
      '¡Hola! Soy tu asistente virtual. Voy a ayudarte a validar si tu auto es elegible para nuestro producto. Para comenzar, ¿me dices tu nombre completo?',
      'Gracias, Juan. ¿Cuál es tu año de nacimiento?',
      'Entendido. Por último, ¿a qué correo electrónico te enviamos el resumen?',
      '¡Perfecto! Tengo: nombre Juan Pérez, año de nacimiento 1990 y email juan@example.com. ¿Está todo correcto?',
      'Perfecto, Juan. Ahora necesito los datos de tu vehículo. ¿Cuál es la marca de tu auto? (Ejemplo: Toyota, Ford, Nissan)',
      '¿Y cuál es el modelo exacto de tu Toyota? (Ejemplo: Corolla, Camry, RAV4)',
      'Excelente. ¿De qué año es tu Toyota Corolla?',
      'Por último, ¿cuál es el kilometraje aproximado de tu vehículo?',
      '¡Perfecto! Toyota Corolla del 2020 con 45.000km, ¿correcto?',
      '¡Buenas noticias, Juan! Según los criterios iniciales, eres elegible para nuestro producto.',
    ]);
    expect(step).toBe('completed');

    const stored = await repository.load('conv-1');
    expect(stored?.eligibilityResult?.age).toBe(35);
    expect(stored?.messages).toHaveLength(HAPPY_PATH.length * 2);
    expect(stored?.messages[0]).toEqual({ role: 'user', content: 'Hola' });
    expect(stored?.messages[1]?.role).toBe('assistant');
    expect(stored?.updatedAt).toBe(NOW.toISOString());
  });

  it('should explain why a high-mileage car is not eligible', async () => {
    const chatbot = chatbotWith(happyPathCompletion());
    const inputs = [...HAPPY_PATH.slice(0, 8), '150000', 'sí'];

    let last = '';
    for (const message of inputs) {
      last = (await chatbot.processMessage(message, 'conv-2')).response;
    }

    expect(last).toBe(
      [
        'Lamentablemente, Juan, no cumples con los criterios de elegibilidad:',
        '- El kilometraje es 150000 km, debe ser menor a 100,000 km',
      ].join('\n')
    );
  });

  it('should assign an id to a new conversation', async () => {
    const repository = new InMemoryConversationRepository();
    const chatbot = chatbotWith(happyPathCompletion(), repository);

    const turn = await chatbot.processMessage('Hola');

    expect(turn.conversationId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(turn.step).toBe('collecting_personal_data');
    expect(await chatbot.getConversation(turn.conversationId)).not.toBeNull();
  });

  it('should reject abusive input and keep asking for the same field', async () => {
    const completion = happyPathCompletion().enqueue('safety', 'SEGURO', 'INSEGURO|insulto');
    const chatbot = chatbotWith(completion);

    await chatbot.processMessage('Hola', 'conv-3');
    await chatbot.processMessage('Me llamo Juan Pérez', 'conv-3');
    await chatbot.processMessage('1990', 'conv-3');
    await chatbot.processMessage('juan@example.com', 'conv-3');
    await chatbot.processMessage('sí', 'conv-3');
    const turn = await chatbot.processMessage('eres un idiota', 'conv-3');

    expect(turn.response).toBe(
      'Tu mensaje contiene contenido inapropiado (INSULTO). Por favor, proporciona solo la marca de tu auto.'
    );
    expect(turn.step).toBe('collecting_car_data');
  });

  it('should handle concurrent messages for one conversation in arrival order', async () => {
    const chatbot = chatbotWith(happyPathCompletion());

    const [first, second] = await Promise.all([
      chatbot.processMessage('Hola', 'conv-4'),
      chatbot.processMessage('Me llamo Juan Pérez', 'conv-4'),
    ]);

    expect(first.step).toBe('collecting_personal_data');
    expect(second.response).toBe('Gracias, Juan. ¿Cuál es tu año de nacimiento?');

    const stored = await chatbot.getConversation('conv-4');
    expect(stored?.messages.map((message) => message.content)).toEqual([
      'Hola',
      first.response,
      'Me llamo Juan Pérez',
      second.response,
    ]);
  });

  it('should delete a conversation', async () => {
    const chatbot = chatbotWith(happyPathCompletion());
    await chatbot.processMessage('Hola', 'conv-5');

    expect(await chatbot.deleteConversation('conv-5')).toBe(true);
    expect(await chatbot.getConversation('conv-5')).toBeNull();
    expect(await chatbot.deleteConversation('conv-5')).toBe(false);
  });

  it('should surface storage failures to the caller', async () => {
    const failing: ConversationRepository = {
      load: async () => null,
      save: async () => {
        throw new Error('disk full');
      },
      delete: async () => false,
    };
    const chatbot = chatbotWith(happyPathCompletion(), failing);

    await expect(chatbot.processMessage('Hola', 'conv-6')).rejects.toThrow('disk full');
  });
});
