/**
 * WsConnection - WebSocket connection wrapper with AsyncIterable support
 *
 * Features:
 * - AsyncIterable interface for `for await` consumption of parsed JSON frames
 * - send() for outbound frames on the same socket
 * - Reconnection-friendly: connect()/close()/isClosed()
 */

import WebSocket from "ws";
import { logger } from "@option-edge/utils";

const log = logger.child("ws");

function rawDataToText(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  return Array.isArray(data) ? Buffer.concat(data).toString("utf8") : Buffer.from(data).toString("utf8");
}

/**
 * Options for creating a WebSocket connection
 */
export interface WsConnectionOptions {
  /**
   * Full WebSocket URL, including auth query parameters
   */
  url: string;

  /**
   * Optional headers to send during handshake
   */
  headers?: Record<string, string>;

  /**
   * Label for logging (never the URL: it carries the team secret)
   */
  label?: string;
}

/**
 * Interface for WebSocket connections used by adapters.
 * Both WsConnection and test fakes implement this interface.
 */
export interface IWsConnection<T> extends AsyncIterable<T> {
  connect: () => Promise<void>;
  close: () => Promise<void>;
  isClosed: () => boolean;
  send: (data: string) => Promise<void>;
}

/**
 * Connection factory type for dependency injection in tests
 */
export type WsConnectionFactory<T = unknown> = (url: string, label: string) => IWsConnection<T>;

/**
 * A WebSocket connection that implements AsyncIterable for message consumption.
 *
 * Usage:
 * ```ts
 * const conn = new WsConnection({ url: "ws://...", label: "exchange" });
 * await conn.connect();
 * for await (const message of conn) {
 *   // message is already parsed JSON
 * }
 * ```
 */
export class WsConnection<T = unknown> implements IWsConnection<T> {
  private ws: WebSocket | null = null;
  private closed = true;
  private readonly url: string;
  private readonly headers: Record<string, string>;
  private readonly label: string;

  // Queue for buffering incoming messages
  private queue: T[] = [];
  private pendingResolve: ((result: IteratorResult<T>) => void) | null = null;
  private pendingReject: ((error: unknown) => void) | null = null;
  private lastError: Error | null = null;

  constructor(options: WsConnectionOptions) {
    this.url = options.url;
    this.headers = options.headers ?? {};
    this.label = options.label ?? "ws";
  }

  /**
   * Connect to the WebSocket server
   */
  async connect(): Promise<void> {
    if (this.ws && !this.closed) {
      return;
    }

    return new Promise((resolve, reject) => {
      let opened = false;
      this.closed = false;
      this.lastError = null;
      this.queue = [];

      const ws = new WebSocket(this.url, { headers: this.headers });
      this.ws = ws;

      ws.on("open", () => {
        opened = true;
        log.debug(`WsConnection opened: ${this.label}`);
        resolve();
      });

      ws.on("message", (data: WebSocket.RawData) => {
        try {
          this.enqueue(JSON.parse(rawDataToText(data)) as T);
        } catch (err) {
          // Drop the frame; one bad frame must not end the stream
          log.warn(`WsConnection parse error: ${this.label}`, { error: err });
        }
      });

      ws.on("close", (code, reason) => {
        log.debug(`WsConnection closed: ${this.label}`, {
          code,
          reason: reason.toString("utf8"),
        });
        this.handleClose();
      });

      ws.on("error", err => {
        log.warn(`WsConnection error: ${this.label}`, { error: err });
        this.lastError = err;

        if (!opened) {
          this.closed = true;
          this.ws = null;
          reject(err);
        } else {
          this.handleClose();
        }
      });
    });
  }

  /**
   * Send a text frame. Resolves once the frame is written to the socket.
   */
  async send(data: string): Promise<void> {
    const ws = this.ws;
    if (ws === null || this.closed || ws.readyState !== WebSocket.OPEN) {
      throw new Error(`WsConnection not open: ${this.label}`);
    }

    return new Promise((resolve, reject) => {
      ws.send(data, error => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Close the WebSocket connection
   */
  async close(): Promise<void> {
    if (this.closed) return;

    this.closed = true;

    if (this.ws) {
      this.ws.close();
      this.ws = null;
    }

    // Wake up any pending iterator
    if (this.pendingResolve) {
      this.pendingResolve({ value: undefined, done: true });
      this.pendingResolve = null;
      this.pendingReject = null;
    }
  }

  /**
   * Check if the connection is closed
   */
  isClosed(): boolean {
    return this.closed;
  }

  // =========================================================================
  // AsyncIterable Implementation
  // =========================================================================

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: async (): Promise<IteratorResult<T>> => {
        // Return queued messages first
        if (this.queue.length > 0) {
          const value = this.queue.shift();
          if (value !== undefined) {
            return { value, done: false };
          }
        }

        // If closed, end iteration
        if (this.closed) {
          if (this.lastError) {
            throw this.lastError;
          }
          return { value: undefined, done: true };
        }

        // Wait for next message
        return new Promise<IteratorResult<T>>((resolve, reject) => {
          this.pendingResolve = resolve;
          this.pendingReject = reject;
        });
      },

      return: async (): Promise<IteratorResult<T>> => {
        await this.close();
        return { value: undefined, done: true };
      },
    };
  }

  // =========================================================================
  // Private Helpers
  // =========================================================================

  private enqueue(message: T): void {
    if (this.pendingResolve) {
      const resolve = this.pendingResolve;
      this.pendingResolve = null;
      this.pendingReject = null;
      resolve({ value: message, done: false });
    } else {
      this.queue.push(message);
    }
  }

  private handleClose(): void {
    this.closed = true;
    this.ws = null;

    if (this.pendingResolve) {
      const resolve = this.pendingResolve;
      const reject = this.pendingReject;
      this.pendingResolve = null;
      this.pendingReject = null;

      if (this.lastError && reject) {
        reject(this.lastError);
      } else {
        resolve({ value: undefined, done: true });
      }
    }
  }
}

/**
 * Default connection factory using WsConnection
 */
export const defaultConnectionFactory = <T = unknown>(url: string, label: string): IWsConnection<T> => {
  return new WsConnection<T>({ url, label, headers: { "User-Agent": "option-edge-bot/0.1" } });
};
