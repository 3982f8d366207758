import { NextFunction, Request, Response, Router } from 'express';
import { z } from 'zod';
import { EligibilityChatbot } from '../services/chatbot.service';
import { ChatResponse } from '../types/agent';
import { NotFoundError, ValidationError } from '../utils/errors';

const chatMessageSchema = z.object({
  conversation_id: z.string().min(1).max(100).optional(),
  message: z.string().trim().min(1).max(5000),
});

const conversationIdSchema = z.string().min(1).max(100);

export function createChatRouter(chatbot: EligibilityChatbot): Router {
  const router = Router();

  router.post('/message', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = chatMessageSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new ValidationError(parsed.error.issues.map((i) => i.message).join(', '));
      }

      const result = await chatbot.processMessage(parsed.data.message, parsed.data.conversation_id);
      const body: ChatResponse = {
        success: true,
        conversation_id: result.conversationId,
        response: result.response,
        step: result.step,
      };
      res.json(body);
    } catch (error: unknown) {
      next(error);
    }
  });

  router.get('/conversation/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = conversationIdSchema.parse(req.params.id);
      const conversation = await chatbot.getConversation(id);
      if (!conversation) {
        throw new NotFoundError('Conversation not found');
      }
      res.json({ success: true, conversation });
    } catch (error: unknown) {
      next(error);
    }
  });

  router.delete('/conversation/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = conversationIdSchema.parse(req.params.id);
      const deleted = await chatbot.deleteConversation(id);
      res.json({ success: true, deleted });
    } catch (error: unknown) {
      next(error);
    }
  });

  return router;
}
