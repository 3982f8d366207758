import { ConversationStep } from './conversation';

export interface ChatResponse {
  success: boolean;
  conversation_id: string;
  response: string;
  step: ConversationStep;
}

export interface TurnResult {
  response: string;
  conversationId: string;
  step: ConversationStep;
}
