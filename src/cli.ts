#!/usr/bin/env node
import * as readline from 'readline/promises';
import { v4 as uuidv4 } from 'uuid';
import { connectRedis, getRedis } from './config/redis';
import { closeDatabase } from './config/database';
import { ChatbotFactory } from './services/chatbot.factory';
import { ConversationStep } from './types/conversation';
import { errorMessage } from './utils/errors';

const EXIT_WORDS = ['salir', 'exit', 'quit'];

async function main() {
  console.log('='.repeat(60));
  console.log('Asistente de elegibilidad de autos');
  console.log('='.repeat(60));
  console.log("\nEscribe 'salir' o 'exit' para terminar.\n");

  await connectRedis();
  const chatbot = ChatbotFactory.createFromEnv();
  const conversationId = process.argv[2] || uuidv4();
  console.log(`Conversación ${conversationId}. Escribe 'Hola' para comenzar.\n`);

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  try {
    for (;;) {
      const userInput = (await rl.question('Usuario: ')).trim();
      if (!userInput) continue;

      if (EXIT_WORDS.includes(userInput.toLowerCase())) {
        console.log('\n¡Hasta luego!');
        break;
      }

      try {
        const { response, step } = await chatbot.processMessage(userInput, conversationId);
        console.log(`Asistente: ${response}\n`);

        if (step === ConversationStep.COMPLETED) {
          console.log('='.repeat(60));
          console.log('Conversación finalizada. Gracias por usar nuestro servicio.');
          console.log('='.repeat(60));
          break;
        }
      } catch (error: unknown) {
        console.error(`\nError: ${errorMessage(error)}`);
        console.error('Por favor, intenta de nuevo.\n');
      }
    }
  } finally {
    rl.close();
    await closeDatabase();
    const redis = getRedis();
    if (redis?.isOpen) {
      await redis.quit();
    }
  }
}

main().catch((error: unknown) => {
  console.error('Error al iniciar el asistente:', errorMessage(error));
  process.exit(1);
});
