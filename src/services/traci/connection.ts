import net, { type Socket } from "node:net";
import { TraciConnectionError, TraciProtocolError } from "./errors";
import { checkStatuses, encodeMessage, StorageReader } from "./protocol";

interface ConnectionLogger {
  warn(payload: Record<string, unknown>, message: string): void;
}

export interface TraciConnectOptions {
  host: string;
  port: number;
  retries?: number;
  retryDelayMs?: number;
  logger?: ConnectionLogger;
  /** Checked between attempts so a launcher can stop waiting on a dead process. */
  shouldRetry?: () => boolean;
}

export interface EncodedCommand {
  commandId: number;
  bytes: Buffer;
}

interface PendingReply {
  resolve(body: Buffer): void;
  reject(error: Error): void;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

function isConnectionRefused(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ECONNREFUSED";
}

function openSocket(host: string, port: number): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host, port });
    const onError = (error: Error) => {
      socket.destroy();
      reject(error);
    };

    socket.once("error", onError);
    socket.once("connect", () => {
      socket.removeListener("error", onError);
      socket.setNoDelay(true);
      resolve(socket);
    });
  });
}

/**
 * One TCP session with a TraCI server. Messages are strictly request/reply,
 * so sends are queued and at most one reply is awaited at a time.
 */
export class TraciConnection {
  private received: Buffer = Buffer.alloc(0);

  private pending: PendingReply | null = null;

  private queue: Promise<unknown> = Promise.resolve();

  private closed = false;

  private closedPromise: Promise<void>;

  private constructor(private readonly socket: Socket) {
    this.closedPromise = new Promise((resolve) => {
      socket.once("close", () => {
        this.closed = true;
        this.fail(new TraciConnectionError("Connection closed by the simulator"));
        resolve();
      });
    });

    socket.on("data", (chunk: Buffer) => {
      this.received = Buffer.concat([this.received, chunk]);
      this.deliver();
    });
    socket.on("error", (error) => {
      this.fail(new TraciConnectionError(error.message));
    });
  }

  static async connect(options: TraciConnectOptions): Promise<TraciConnection> {
    const retries = Math.max(0, options.retries ?? 60);
    const retryDelayMs = Math.max(0, options.retryDelayMs ?? 1000);

    for (let attempt = 0; ; attempt += 1) {
      try {
        const socket = await openSocket(options.host, options.port);
        return new TraciConnection(socket);
      } catch (error) {
        const canRetry =
          isConnectionRefused(error)
          && attempt < retries
          && (options.shouldRetry?.() ?? true);
        if (!canRetry) {
          const message = error instanceof Error ? error.message : String(error);
          throw new TraciConnectionError(
            `Could not connect to TraCI server at ${options.host}:${options.port}: ${message}`,
          );
        }

        options.logger?.warn(
          { host: options.host, port: options.port, attempt: attempt + 1, retryDelayMs },
          "TraCI server not reachable yet, retrying",
        );
        await sleep(retryDelayMs);
      }
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Sends the commands as one message and resolves with a reader positioned
   * after their status blocks.
   */
  send(commands: readonly EncodedCommand[]): Promise<StorageReader> {
    const exchange = this.queue.then(() => this.exchange(commands));
    this.queue = exchange.catch(() => undefined);
    return exchange;
  }

  async close(): Promise<void> {
    if (!this.closed) {
      this.socket.end();
    }
    await this.closedPromise;
  }

  private async exchange(commands: readonly EncodedCommand[]): Promise<StorageReader> {
    if (this.closed) {
      throw new TraciConnectionError("Connection is closed");
    }

    const reply = new Promise<Buffer>((resolve, reject) => {
      this.pending = { resolve, reject };
    });
    this.socket.write(encodeMessage(commands.map((command) => command.bytes)));
    this.deliver();

    const reader = new StorageReader(await reply);
    checkStatuses(
      reader,
      commands.map((command) => command.commandId),
    );
    return reader;
  }

  private deliver(): void {
    if (!this.pending || this.received.length < 4) {
      return;
    }

    const total = this.received.readInt32BE(0);
    if (total < 4) {
      this.fail(new TraciProtocolError(`Invalid message length ${total}`));
      this.socket.destroy();
      return;
    }
    if (this.received.length < total) {
      return;
    }

    const body = this.received.subarray(4, total);
    this.received = this.received.subarray(total);
    const pending = this.pending;
    this.pending = null;
    pending.resolve(body);
  }

  private fail(error: Error): void {
    const pending = this.pending;
    if (!pending) {
      return;
    }

    this.pending = null;
    pending.reject(error);
  }
}
