import net, { type Server, type Socket } from "node:net";
import { StorageWriter } from "../../src/services/traci/protocol";

export interface ReceivedCommand {
  commandId: number;
  content: Buffer;
}

export interface CommandReply {
  resultCode?: number;
  description?: string;
  response?: Buffer;
}

export type CommandHandler = (command: ReceivedCommand) => CommandReply;

export interface FakeTraciServer {
  port: number;
  received: ReceivedCommand[];
  connectionClosed: Promise<void>;
  close(): Promise<void>;
}

function splitCommands(body: Buffer): ReceivedCommand[] {
  const commands: ReceivedCommand[] = [];
  let offset = 0;
  while (offset < body.length) {
    const short = body.readUInt8(offset);
    if (short > 0) {
      commands.push({
        commandId: body.readUInt8(offset + 1),
        content: body.subarray(offset + 2, offset + short),
      });
      offset += short;
    } else {
      const length = body.readInt32BE(offset + 1);
      commands.push({
        commandId: body.readUInt8(offset + 5),
        content: body.subarray(offset + 6, offset + length),
      });
      offset += length;
    }
  }
  return commands;
}

function statusBlock(commandId: number, resultCode: number, description: string): Buffer {
  const encoded = Buffer.from(description, "latin1");
  return new StorageWriter()
    .ubyte(1 + 1 + 1 + 4 + encoded.length)
    .ubyte(commandId)
    .ubyte(resultCode)
    .string(description)
    .toBuffer();
}

function lengthHeader(contentLength: number): Buffer {
  if (contentLength + 1 <= 255) {
    return new StorageWriter().ubyte(contentLength + 1).toBuffer();
  }
  return new StorageWriter().ubyte(0).int(contentLength + 5).toBuffer();
}

/** Response block of a variable get: length, response id, variable, object id, typed value. */
export function variableResponse(
  responseId: number,
  variableId: number,
  objectId: string,
  value: StorageWriter,
): Buffer {
  const payload = new StorageWriter()
    .ubyte(responseId)
    .ubyte(variableId)
    .string(objectId)
    .toBuffer();
  const typed = value.toBuffer();
  return Buffer.concat([lengthHeader(payload.length + typed.length), payload, typed]);
}

export function versionResponse(apiVersion: number, sumoVersion: string): Buffer {
  const payload = new StorageWriter().ubyte(0x00).int(apiVersion).string(sumoVersion).toBuffer();
  return Buffer.concat([lengthHeader(payload.length), payload]);
}

/**
 * In-process TCP stand-in for a TraCI server. Every received command is
 * recorded and answered through the handler.
 */
export async function startFakeTraciServer(handler: CommandHandler): Promise<FakeTraciServer> {
  const received: ReceivedCommand[] = [];
  const sockets = new Set<Socket>();
  let signalClosed: () => void = () => undefined;
  const connectionClosed = new Promise<void>((resolve) => {
    signalClosed = resolve;
  });

  const server: Server = net.createServer((socket) => {
    sockets.add(socket);
    let pending = Buffer.alloc(0);

    socket.on("data", (chunk: Buffer) => {
      pending = Buffer.concat([pending, chunk]);
      while (pending.length >= 4) {
        const total = pending.readInt32BE(0);
        if (pending.length < total) {
          break;
        }

        const commands = splitCommands(pending.subarray(4, total));
        pending = pending.subarray(total);

        const blocks: Buffer[] = [];
        for (const command of commands) {
          received.push(command);
          const reply = handler(command);
          blocks.push(
            statusBlock(command.commandId, reply.resultCode ?? 0, reply.description ?? ""),
          );
          if (reply.response) {
            blocks.push(reply.response);
          }
        }

        const body = Buffer.concat(blocks);
        socket.write(Buffer.concat([new StorageWriter().int(body.length + 4).toBuffer(), body]));
      }
    });
    socket.on("end", () => socket.end());
    socket.on("close", () => {
      sockets.delete(socket);
      signalClosed();
    });
  });

  await new Promise<void>((resolve) => {
    server.listen(0, "127.0.0.1", () => resolve());
  });
  const address = server.address();
  const port = typeof address === "object" && address ? address.port : 0;

  return {
    port,
    received,
    connectionClosed,
    close() {
      for (const socket of sockets) {
        socket.destroy();
      }
      return new Promise((resolve) => {
        server.close(() => resolve());
      });
    },
  };
}
