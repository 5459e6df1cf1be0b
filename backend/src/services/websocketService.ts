import { Server as HTTPServer } from 'http';
import { Server as SocketIOServer, Socket } from 'socket.io';
import { AuthService } from './authService';
import { MessageStatusUpdateEvent, NewMessageEvent } from '../types';

/**
 * WebSocket event types
 */
export enum WebSocketEvent {
  // Client -> Server
  AUTHENTICATE = 'authenticate',
  JOIN_ROOM = 'join_room',
  LEAVE_ROOM = 'leave_room',

  // Server -> Client
  AUTHENTICATED = 'authenticated',
  AUTH_ERROR = 'auth_error',
  NEW_MESSAGE = 'new_message',
  MESSAGE_STATUS_UPDATE = 'message_status_update',
  ERROR = 'error',
}

export type NotificationEvent =
  | { type: WebSocketEvent.NEW_MESSAGE; payload: NewMessageEvent }
  | { type: WebSocketEvent.MESSAGE_STATUS_UPDATE; payload: MessageStatusUpdateEvent };

/**
 * Fire-and-forget fan-out to connected agent sessions. No delivery guarantee.
 */
export interface Notifier {
  publish(group: string, event: NotificationEvent): void;
}

export const accountGroup = (accountId: string): string => `account:${accountId}`;

interface SocketUser {
  userId: string;
  email: string;
}

const AUTH_TIMEOUT_MS = 10000;

/**
 * Socket.io implementation of the notifier. Sockets authenticate with the
 * agent JWT, then join `account:<id>` groups to receive that account's traffic.
 */
export class WebSocketService implements Notifier {
  private io: SocketIOServer | null = null;
  private readonly users = new Map<string, SocketUser>(); // socket id -> user

  constructor(
    private readonly authService: AuthService,
    private readonly corsOrigin: string
  ) {}

  /**
   * Initialize Socket.io server
   */
  initialize(httpServer: HTTPServer): void {
    if (this.io) {
      console.log('[ws] WebSocket service already initialized');
      return;
    }

    this.io = new SocketIOServer(httpServer, {
      cors: {
        origin: this.corsOrigin,
        credentials: true,
      },
      transports: ['websocket', 'polling'],
    });

    this.io.on('connection', (socket) => this.handleConnection(socket));
    console.log('[ws] WebSocket service initialized');
  }

  private handleConnection(socket: Socket): void {
    const authTimer = setTimeout(() => {
      if (!this.users.has(socket.id)) {
        socket.emit(WebSocketEvent.AUTH_ERROR, { message: 'Authentication timeout' });
        socket.disconnect();
      }
    }, AUTH_TIMEOUT_MS);

    socket.on(WebSocketEvent.AUTHENTICATE, (data: { token?: unknown }) => {
      try {
        const token = typeof data?.token === 'string' ? data.token : '';
        const payload = this.authService.verifyAccessToken(token);
        this.users.set(socket.id, payload);
        clearTimeout(authTimer);
        socket.emit(WebSocketEvent.AUTHENTICATED, payload);
        console.log(`[ws] Socket ${socket.id} authenticated for user ${payload.userId}`);
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Authentication failed';
        socket.emit(WebSocketEvent.AUTH_ERROR, { message });
        socket.disconnect();
      }
    });

    socket.on(WebSocketEvent.JOIN_ROOM, (group: unknown) => {
      if (!this.users.has(socket.id) || typeof group !== 'string' || !group.startsWith('account:')) {
        socket.emit(WebSocketEvent.ERROR, { error: 'Cannot join room', code: 'FORBIDDEN' });
        return;
      }
      void socket.join(group);
    });

    socket.on(WebSocketEvent.LEAVE_ROOM, (group: unknown) => {
      if (typeof group === 'string') {
        void socket.leave(group);
      }
    });

    socket.on('disconnect', () => {
      clearTimeout(authTimer);
      this.users.delete(socket.id);
    });
  }

  publish(group: string, event: NotificationEvent): void {
    if (!this.io) {
      console.warn('[ws] WebSocket service not initialized, dropping', event.type);
      return;
    }
    this.io.to(group).emit(event.type, event.payload);
  }

  isInitialized(): boolean {
    return this.io !== null;
  }

  getTotalConnections(): number {
    return this.users.size;
  }

  /**
   * Shutdown the WebSocket service gracefully
   */
  async shutdown(): Promise<void> {
    const io = this.io;
    if (!io) return;

    io.disconnectSockets(true);
    await new Promise<void>((resolve) => {
      io.close(() => resolve());
    });

    this.io = null;
    this.users.clear();
    console.log('[ws] WebSocket service shut down');
  }
}
