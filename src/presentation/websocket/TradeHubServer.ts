import { randomUUID } from 'node:crypto';
import WebSocket, { WebSocketServer } from 'ws';
import type { Logger } from '@/application/interfaces/Logger';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import type { HubClient, TradeHub } from './TradeHub';

/**
 * プレゼンテーション層: TradeHub を ws の WebSocketServer に結びつける
 *
 * 責務: 接続ごとに HubClient を作り、受信したテキストフレームを TradeHub に渡す。
 */
export class TradeHubServer {
  private server: WebSocketServer | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly hub: TradeHub,
    private readonly port: number,
    logger?: Logger
  ) {
    this.logger = logger ?? LoggerFactory.forComponent('TradeHubServer');
  }

  /**
   * サーバーを起動する。listen が完了したら解決される。
   */
  start(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const server = new WebSocketServer({ port: this.port });
      server.once('listening', () => {
        this.logger.info('Trade hub listening', { port: this.port });
        resolve();
      });
      server.once('error', reject);
      server.on('connection', (socket) => this.handleConnection(socket));
      this.server = server;
      this.hub.open();
    });
  }

  /**
   * すべてのクライアントを切断し、サーバーを停止する。
   */
  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) {
      return;
    }

    for (const socket of server.clients) {
      socket.close(1001, 'Server shutting down');
    }
    await this.hub.close();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    this.logger.info('Trade hub stopped');
  }

  private handleConnection(socket: WebSocket): void {
    const client: HubClient = {
      id: randomUUID(),
      send: (message) => {
        if (socket.readyState !== WebSocket.OPEN) {
          throw new Error('Client socket is not open');
        }
        socket.send(message);
      },
    };
    this.hub.connect(client);

    socket.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
      if (isBinary) {
        this.logger.debug('Binary frame ignored', { clientId: client.id });
        return;
      }
      this.hub.handleMessage(client, data.toString()).catch((error: unknown) => {
        this.logger.error('Failed to handle client message', { clientId: client.id, err: error });
      });
    });

    socket.on('close', () => {
      this.hub.disconnect(client).catch((error: unknown) => {
        this.logger.error('Failed to release client subscriptions', {
          clientId: client.id,
          err: error,
        });
      });
    });

    socket.on('error', (error: Error) => {
      this.logger.warn('Client socket error', { clientId: client.id, err: error });
    });
  }
}
