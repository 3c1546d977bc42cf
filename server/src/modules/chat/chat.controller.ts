import type { RequestHandler } from 'express';

import { openSseStream, type StreamPublisher, type StreamSubscription } from '../../core/realtime/streamPublisher';
import { errorMessageOf, logger } from '../../core/shared/logger';
import type { ChatRequestBody } from './chat.schema';
import { chatRequestSchema } from './chat.schema';
import type { ChatService } from './chat.service';

export const createChatController = (chatService: ChatService, publisher: StreamPublisher) => {
  const postChat: RequestHandler<never, unknown, ChatRequestBody> = async (req, res, next) => {
    try {
      const payload = chatRequestSchema.parse(req.body);
      const response = await chatService.chat(payload);
      res.status(200).json(response);
    } catch (error: unknown) {
      next(error);
    }
  };

  const streamChat: RequestHandler<never, unknown, ChatRequestBody> = async (req, res, next) => {
    let subscription: StreamSubscription | null = null;

    try {
      const payload = chatRequestSchema.parse(req.body);
      const prepared = await chatService.prepareRun(payload);

      subscription = openSseStream(publisher, prepared.traceId, res);
      await chatService.execute(prepared);
    } catch (error: unknown) {
      if (!subscription) {
        next(error);
        return;
      }

      logger.error('chat_stream_failed', {
        requestId: req.requestId,
        traceId: subscription.traceId,
        error: errorMessageOf(error),
      });
      subscription.fail(errorMessageOf(error));
    }
  };

  return { postChat, streamChat };
};
