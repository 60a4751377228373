// src/server.ts

import dotenv from 'dotenv';
dotenv.config();

import http from 'http';
import { createApp } from './app';
import { initSocket } from './sockets';
import { CLEANUP_INTERVAL_MINUTES, NODE_ENV, PORT, REDIS_URL } from './config/env.config';
import { createServices } from './services';
import { startCleanupJob } from './services/cleanup.job';

const services = createServices(REDIS_URL);

// Crear Express
const app = createApp({ roomService: services.rooms });

// Crear servidor HTTP para Socket.IO
const server = http.createServer(app);

// Inicializar Socket.IO
const { io } = initSocket(server, { store: services.store, rooms: services.rooms });

const cleanup = startCleanupJob(services.store, CLEANUP_INTERVAL_MINUTES);

// Arrancar servidor
server.listen(PORT, () => {
    console.log(`🚀 Servidor escuchando en http://localhost:${PORT} (${NODE_ENV})`);
});

function shutdown(signal: string) {
    console.log(`👋 ${signal} recibido, cerrando servidor...`);
    cleanup.stop();

    io.close(() => {
        services.close()
            .then(() => process.exit(0))
            .catch(error => {
                console.error('❌ Error al cerrar los servicios:', error);
                process.exit(1);
            });
    });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
