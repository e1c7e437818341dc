/**
 * AMI Listener: persistent PBX manager session
 *
 * Keeps one authenticated TCP session to the Asterisk manager interface and
 * forwards every mapped CallEvent to the consumer callback.
 *
 * Connection lifecycle:
 * 1. Connect, read the greeting, send Login (Events: call)
 * 2. On login success: state = connected, keepalive Ping every interval
 * 3. On close / error / rejected login / login timeout / unanswered ping:
 *    reconnect with exponential backoff (base * 2^attempt, capped)
 *
 * Events emitted while disconnected are lost; open sessions are cleaned up
 * by the tracker's inactivity sweep.
 */

import * as net from 'node:net';
import { TransportError, errorMessage } from '../errors.js';
import type { CallEvent } from '../calls/types.js';
import { AmiFrameParser, formatAction } from './frame-parser.js';
import type { AmiFrame } from './frame-parser.js';
import { mapAmiEvent } from './event-mapper.js';

export type ListenerState = 'idle' | 'connecting' | 'connected' | 'disconnected' | 'stopped';

/** The subset of net.Socket the listener relies on */
export interface AmiSocket {
  write(data: string): unknown;
  destroy(): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  on(event: 'connect', listener: () => void): unknown;
  on(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
}

export type SocketFactory = (options: { host: string; port: number }) => AmiSocket;

export interface AmiListenerOptions {
  host: string;
  port: number;
  username: string;
  secret: string;
  reconnectBaseMs: number;
  reconnectMaxMs: number;
  pingIntervalMs: number;
  /** Time allowed from connect until the login response (default: pingIntervalMs) */
  loginTimeoutMs?: number;
  createSocket?: SocketFactory;
}

export interface ListenerStatus {
  state: ListenerState;
  connectedSince: string | null;
  reconnectAttempt: number;
  lastError: string | null;
}

const LOGIN_ACTION_ID = 'login';

export class AmiListener {
  private state: ListenerState = 'idle';
  private socket: AmiSocket | null = null;
  private parser = new AmiFrameParser();
  private connectedSince: Date | null = null;
  private attempt = 0;
  private lastError: string | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private loginTimer: NodeJS.Timeout | null = null;
  private pingTimer: NodeJS.Timeout | null = null;
  private pingPending = false;
  private pingSeq = 0;
  private readonly createSocket: SocketFactory;

  constructor(
    private readonly options: AmiListenerOptions,
    private readonly onEvent: (event: CallEvent) => void,
  ) {
    this.createSocket = options.createSocket ?? ((opts) => net.connect(opts));
  }

  start(): void {
    if (this.state !== 'idle' && this.state !== 'stopped') return;
    this.connect();
  }

  stop(): void {
    this.state = 'stopped';
    this.clearTimers();
    this.connectedSince = null;
    if (this.socket) {
      this.socket.destroy();
      this.socket = null;
    }
  }

  status(): ListenerStatus {
    return {
      state: this.state,
      connectedSince: this.connectedSince?.toISOString() ?? null,
      reconnectAttempt: this.attempt,
      lastError: this.lastError,
    };
  }

  private connect(): void {
    this.state = 'connecting';
    this.parser.reset();
    console.log('[ami] Connecting', { host: this.options.host, port: this.options.port, attempt: this.attempt });

    const socket = this.createSocket({ host: this.options.host, port: this.options.port });
    this.socket = socket;
    socket.setEncoding('utf8');
    this.startLoginTimer(socket);

    socket.on('connect', () => {
      socket.write(formatAction({
        Action: 'Login',
        ActionID: LOGIN_ACTION_ID,
        Username: this.options.username,
        Secret: this.options.secret,
        Events: 'call',
      }));
    });

    socket.on('data', (chunk) => {
      const text = typeof chunk === 'string' ? chunk : chunk.toString('utf8');
      for (const frame of this.parser.push(text)) {
        this.handleFrame(socket, frame);
      }
    });

    socket.on('error', (err) => {
      this.recordFailure(new TransportError(`AMI socket error: ${err.message}`));
    });

    socket.on('close', () => {
      if (this.socket === socket) {
        this.stopLoginTimer();
        this.socket = null;
        this.scheduleReconnect();
      }
    });
  }

  private handleFrame(socket: AmiSocket, frame: AmiFrame): void {
    if (frame.Response) {
      if (frame.ActionID === LOGIN_ACTION_ID) {
        this.handleLogin(socket, frame);
      } else if (frame.ActionID?.startsWith('ping-')) {
        this.pingPending = false;
      }
      return;
    }

    if (!frame.Event) return;

    const event = mapAmiEvent(frame);
    if (!event) return;

    try {
      this.onEvent(event);
    } catch (err) {
      console.error('[ami] Event consumer failed', {
        uniqueId: event.uniqueId,
        type: event.type,
        error: errorMessage(err),
      });
    }
  }

  private handleLogin(socket: AmiSocket, frame: AmiFrame): void {
    this.stopLoginTimer();
    if (frame.Response === 'Success') {
      this.state = 'connected';
      this.attempt = 0;
      this.lastError = null;
      this.connectedSince = new Date();
      this.startPing(socket);
      console.log('[ami] Connected and authenticated', { greeting: this.parser.greeting });
      return;
    }

    this.recordFailure(new TransportError(`AMI login rejected: ${frame.Message ?? 'no message'}`));
    socket.destroy();
  }

  private startLoginTimer(socket: AmiSocket): void {
    this.stopLoginTimer();
    const timeoutMs = this.options.loginTimeoutMs ?? this.options.pingIntervalMs;
    this.loginTimer = setTimeout(() => {
      this.loginTimer = null;
      this.recordFailure(new TransportError(`AMI login timed out after ${timeoutMs}ms`));
      socket.destroy();
    }, timeoutMs);
    this.loginTimer.unref();
  }

  private stopLoginTimer(): void {
    if (this.loginTimer) {
      clearTimeout(this.loginTimer);
      this.loginTimer = null;
    }
  }

  private startPing(socket: AmiSocket): void {
    this.stopPing();
    this.pingTimer = setInterval(() => {
      if (this.pingPending) {
        this.recordFailure(new TransportError('AMI ping unanswered'));
        socket.destroy();
        return;
      }
      this.pingPending = true;
      this.pingSeq += 1;
      socket.write(formatAction({ Action: 'Ping', ActionID: `ping-${this.pingSeq}` }));
    }, this.options.pingIntervalMs);
    this.pingTimer.unref();
  }

  private stopPing(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
    this.pingPending = false;
  }

  private scheduleReconnect(): void {
    this.stopPing();
    this.connectedSince = null;
    if (this.state === 'stopped') return;

    this.state = 'disconnected';
    const delay = Math.min(
      this.options.reconnectMaxMs,
      this.options.reconnectBaseMs * 2 ** this.attempt,
    );
    this.attempt += 1;
    console.warn('[ami] Connection lost, reconnecting', { delayMs: delay, attempt: this.attempt });

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, delay);
  }

  private recordFailure(err: TransportError): void {
    this.lastError = err.message;
    console.error('[ami] Transport failure', { error: err.message });
  }

  private clearTimers(): void {
    this.stopLoginTimer();
    this.stopPing();
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }
}
