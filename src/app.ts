// src/app.ts

import express from 'express';
import cors from 'cors';
import { CORS_ORIGIN } from './config/env.config';
import { errorMiddleware } from './middleware/error.middleware';
import { createRoomRouter } from './routes/room.routes';
import { RoomService } from './services/room.service';

export type AppDeps = {
  roomService: RoomService;
};

/**
 * Crea y configura la aplicación Express
 */
export function createApp({ roomService }: AppDeps) {
  const app = express();

  // Middleware global
  app.use(cors({ origin: CORS_ORIGIN }));
  app.use(express.json());

  app.get('/health', (_, res) => {
    res.json({ ok: true });
  });

  app.use('/rooms', createRoomRouter(roomService));

  // Middleware global de errores
  app.use(errorMiddleware);

  return app;
}
