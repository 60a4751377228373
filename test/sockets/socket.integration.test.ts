import http from 'http';
import { io as connect, Socket as ClientSocket } from 'socket.io-client';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createApp } from '../../src/app';
import { ActionResult } from '../../src/core/domain';
import { CLIENT_EVENTS, SERVER_EVENTS } from '../../src/core/constants';
import { createServices } from '../../src/services';
import { initSocket } from '../../src/sockets';
import { listen } from '../helpers/server';

type Auth = { userId?: string; displayName?: string };

describe('Socket.IO', () => {
    let server: http.Server;
    let closeIo: () => Promise<void>;
    let url: string;
    let roomId: string;
    const clients: ClientSocket[] = [];

    beforeEach(async () => {
        const services = createServices('');
        const room = await services.rooms.createRoom({ name: 'Cine', adminId: 'user-ana' });
        roomId = room.id;

        server = http.createServer(createApp({ roomService: services.rooms }));
        const { io } = initSocket(server, { store: services.store, rooms: services.rooms });
        closeIo = () => new Promise(resolve => io.close(() => resolve()));

        const port = await listen(server);
        url = `http://127.0.0.1:${port}`;
    });

    afterEach(async () => {
        for (const client of clients.splice(0)) {
            client.disconnect();
        }
        await closeIo();
    });

    function client(auth: Auth): ClientSocket {
        const socket = connect(url, { auth, transports: ['websocket'], forceNew: true, reconnection: false });
        clients.push(socket);
        return socket;
    }

    function connected(socket: ClientSocket): Promise<void> {
        return new Promise((resolve, reject) => {
            socket.once('connect', () => resolve());
            socket.once('connect_error', reject);
        });
    }

    function next<T>(socket: ClientSocket, event: string): Promise<T> {
        return new Promise(resolve => socket.once(event, (payload: T) => resolve(payload)));
    }

    it('rechaza conexiones sin identidad', async () => {
        const anonymous = client({});
        const error = await new Promise<Error>(resolve => anonymous.once('connect_error', resolve));
        expect(error.message).toBe('Identidad inválida');
    });

    it('une, difunde el chat y responde por el callback', async () => {
        const beto = client({ userId: 'user-beto', displayName: 'Beto' });
        const carlos = client({ userId: 'user-carlos', displayName: 'Carlos' });
        await Promise.all([connected(beto), connected(carlos)]);

        const joined: ActionResult = await beto.emitWithAck(CLIENT_EVENTS.JOIN_ROOM, { roomId });
        expect(joined).toEqual({ success: true });
        expect(await carlos.emitWithAck(CLIENT_EVENTS.JOIN_ROOM, { roomId })).toEqual({ success: true });

        const message = next<{ senderName: string; content: string }>(beto, SERVER_EVENTS.CHAT_MESSAGE);
        expect(await carlos.emitWithAck(CLIENT_EVENTS.SEND_MESSAGE, { roomId, text: 'hola' })).toEqual({ success: true });
        expect(await message).toMatchObject({ senderName: 'Carlos', content: 'hola' });
    });

    it('responde con error a un payload inválido', async () => {
        const beto = client({ userId: 'user-beto', displayName: 'Beto' });
        await connected(beto);

        const notified = next<{ message: string }>(beto, SERVER_EVENTS.ERROR);
        const result: ActionResult = await beto.emitWithAck(CLIENT_EVENTS.SEEK, { roomId, position: 'diez' });

        const error = 'Datos inválidos para playback:seek: Expected number, received string';
        expect(result).toEqual({ success: false, error });
        expect(await notified).toEqual({ message: error });
    });

    it('al desconectarse el controlador el control pasa al siguiente', async () => {
        const beto = client({ userId: 'user-beto', displayName: 'Beto' });
        const carlos = client({ userId: 'user-carlos', displayName: 'Carlos' });
        await Promise.all([connected(beto), connected(carlos)]);

        await beto.emitWithAck(CLIENT_EVENTS.JOIN_ROOM, { roomId });
        await carlos.emitWithAck(CLIENT_EVENTS.JOIN_ROOM, { roomId });

        const transferred = next(carlos, SERVER_EVENTS.CONTROL_TRANSFERRED);
        beto.disconnect();

        expect(await transferred).toEqual({ newControllerId: 'user-carlos', newControllerName: 'Carlos' });
    });
});
