import { Inject, Injectable, OnApplicationShutdown } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';
import { IncomingMessage, Server } from 'node:http';
import { Duplex } from 'node:stream';
import { RawData, WebSocket, WebSocketServer } from 'ws';
import { BotResponse, ChatUseCase } from '../../application/use-cases/chat.use-case';
import { getErrorInfo } from '../../domain/errors';
import { toChatInput, UserMessageDto } from '../controllers/dto/chat.dto';
import { ILoggerPort, LOGGER } from '../logging/shared/logger.port';

export const CHAT_SOCKET_PATH = '/ws/chat';

export interface SocketErrorMessage {
  type: 'error';
  message: string;
}

export type SocketReply = BotResponse | SocketErrorMessage;

const CONTEXT = 'ChatSocketServer';

function flattenErrors(errors: ValidationError[]): string {
  return errors
    .flatMap((error) => Object.values(error.constraints ?? {}))
    .join('; ');
}

/**
 * Chat over WebSocket on the API's HTTP server. Each text frame carries one
 * user message; the socket stays open after a failed message.
 */
@Injectable()
export class ChatSocketServer implements OnApplicationShutdown {
  private wss?: WebSocketServer;

  constructor(
    private readonly chat: ChatUseCase,
    @Inject(LOGGER) private readonly logger: ILoggerPort,
  ) {}

  attach(server: Server): void {
    const wss = new WebSocketServer({ noServer: true });
    this.wss = wss;

    server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      const path = (req.url ?? '').split('?')[0];
      if (path !== CHAT_SOCKET_PATH) {
        socket.destroy();
        return;
      }
      wss.handleUpgrade(req, socket, head, (ws) => wss.emit('connection', ws, req));
    });

    wss.on('error', (error: Error) =>
      this.logger.error('Chat WebSocket server error', error, CONTEXT),
    );

    wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
      this.logger.info(`WebSocket client connected from ${req.socket.remoteAddress ?? 'unknown'}`, CONTEXT);
      // protocol violations from the client; ws closes the socket afterwards
      ws.on('error', (error: Error) =>
        this.logger.warn(`WebSocket client error: ${error.message}`, CONTEXT),
      );
      ws.on('message', (data: RawData, isBinary: boolean) => {
        if (isBinary) {
          this.send(ws, { type: 'error', message: 'Binary frames are not supported' });
          return;
        }
        this.handleMessage(data.toString())
          .then((reply) => this.send(ws, reply))
          .catch((error: unknown) =>
            this.logger.error('Failed to answer WebSocket message', error, CONTEXT),
          );
      });
      ws.on('close', () => this.logger.debug('WebSocket client disconnected', CONTEXT));
    });

    this.logger.info(`Chat WebSocket listening on ${CHAT_SOCKET_PATH}`, CONTEXT);
  }

  async handleMessage(raw: string): Promise<SocketReply> {
    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch {
      return { type: 'error', message: 'Message must be valid JSON' };
    }
    if (!payload || typeof payload !== 'object' || Array.isArray(payload)) {
      return { type: 'error', message: 'Message must be a JSON object' };
    }

    const message = plainToInstance(UserMessageDto, payload);
    const errors = await validate(message);
    if (errors.length > 0) {
      return { type: 'error', message: flattenErrors(errors) };
    }

    try {
      return await this.chat.execute(toChatInput(message), 'websocket');
    } catch (error) {
      const { message: reason } = getErrorInfo(error);
      this.logger.error(`Chat over WebSocket failed: ${reason}`, error, CONTEXT);
      return { type: 'error', message: reason };
    }
  }

  onApplicationShutdown(): void {
    if (!this.wss) return;
    for (const client of this.wss.clients) client.terminate();
    this.wss.close();
  }

  private send(ws: WebSocket, reply: SocketReply): void {
    if (ws.readyState === WebSocket.OPEN) ws.send(JSON.stringify(reply));
  }
}
