import { Router } from 'express';

import type { StreamPublisher } from '../../core/realtime/streamPublisher';
import { createChatController } from './chat.controller';
import type { ChatService } from './chat.service';

export const createChatRoutes = (chatService: ChatService, publisher: StreamPublisher): Router => {
  const { postChat, streamChat } = createChatController(chatService, publisher);
  const router = Router();

  router.post('/', postChat);
  router.post('/stream', streamChat);

  return router;
};
