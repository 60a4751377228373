// src/core/constants/index.ts

export * from './socket.events';
