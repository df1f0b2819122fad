import express, { type Response, type Router } from 'express';
import type { ApiController, ApiResponse } from './ApiController.js';

function send(res: Response, response: ApiResponse): void {
  res.status(response.status).json(response.body);
}

export function createApiRouter(controller: ApiController): Router {
  const router = express.Router();

  router.get('/health', (_req, res) => send(res, controller.health()));
  router.get('/api/dashboard', async (_req, res) => send(res, await controller.dashboard()));
  router.get('/api/stats', async (_req, res) => send(res, await controller.stats()));
  router.get('/api/chats', async (_req, res) => send(res, await controller.chats()));
  router.get('/api/chats/:chatId', async (req, res) =>
    send(res, await controller.chat(req.params.chatId)),
  );
  router.get('/api/chats/:chatId/messages', async (req, res) =>
    send(res, await controller.messages(req.params.chatId, req.query)),
  );
  router.get('/api/chats/:chatId/messages/daily', async (req, res) =>
    send(res, await controller.messagesByDate(req.params.chatId, req.query)),
  );
  router.get('/api/chats/:chatId/analytics', async (req, res) =>
    send(res, await controller.analytics(req.params.chatId)),
  );
  router.post('/api/chats/:chatId/digest', async (req, res) =>
    send(res, await controller.digest(req.params.chatId)),
  );
  router.post('/api/chats/:chatId/strategy', async (req, res) =>
    send(res, await controller.strategy(req.params.chatId, req.query)),
  );
  router.get('/api/users', async (req, res) => send(res, await controller.users(req.query)));

  return router;
}
