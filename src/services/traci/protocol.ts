import {
  RESULT_NAMES,
  RTYPE_OK,
  TYPE_BYTE,
  TYPE_COMPOUND,
  TYPE_DOUBLE,
  TYPE_INTEGER,
  TYPE_STRING,
  TYPE_STRINGLIST,
  TYPE_UBYTE,
} from "./constants";
import { TraciCommandError, TraciProtocolError } from "./errors";

const MAX_SHORT_COMMAND_LENGTH = 255;

/**
 * Big-endian byte builder for command payloads. Methods prefixed with
 * `typed` write the one-byte type tag before the value; the others write
 * the bare value, which some base commands (simulation step) require.
 */
export class StorageWriter {
  private readonly chunks: Buffer[] = [];

  ubyte(value: number): this {
    const chunk = Buffer.alloc(1);
    chunk.writeUInt8(value, 0);
    this.chunks.push(chunk);
    return this;
  }

  byte(value: number): this {
    const chunk = Buffer.alloc(1);
    chunk.writeInt8(value, 0);
    this.chunks.push(chunk);
    return this;
  }

  int(value: number): this {
    const chunk = Buffer.alloc(4);
    chunk.writeInt32BE(value, 0);
    this.chunks.push(chunk);
    return this;
  }

  double(value: number): this {
    const chunk = Buffer.alloc(8);
    chunk.writeDoubleBE(value, 0);
    this.chunks.push(chunk);
    return this;
  }

  string(value: string): this {
    const encoded = Buffer.from(value, "latin1");
    this.int(encoded.length);
    this.chunks.push(encoded);
    return this;
  }

  typedUbyte(value: number): this {
    return this.ubyte(TYPE_UBYTE).ubyte(value);
  }

  typedByte(value: number): this {
    return this.ubyte(TYPE_BYTE).byte(value);
  }

  typedInt(value: number): this {
    return this.ubyte(TYPE_INTEGER).int(value);
  }

  typedDouble(value: number): this {
    return this.ubyte(TYPE_DOUBLE).double(value);
  }

  typedString(value: string): this {
    return this.ubyte(TYPE_STRING).string(value);
  }

  typedStringList(values: readonly string[]): this {
    this.ubyte(TYPE_STRINGLIST).int(values.length);
    for (const value of values) {
      this.string(value);
    }
    return this;
  }

  compound(itemCount: number): this {
    return this.ubyte(TYPE_COMPOUND).int(itemCount);
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.chunks);
  }
}

function typeName(tag: number): string {
  return `0x${tag.toString(16).padStart(2, "0")}`;
}

export class StorageReader {
  private offset = 0;

  constructor(private readonly buffer: Buffer) {}

  get remaining(): number {
    return this.buffer.length - this.offset;
  }

  private ensure(bytes: number): void {
    if (this.remaining < bytes) {
      throw new TraciProtocolError(
        `Unexpected end of message: need ${bytes} byte(s) at offset ${this.offset}, ${this.remaining} left`,
      );
    }
  }

  ubyte(): number {
    this.ensure(1);
    const value = this.buffer.readUInt8(this.offset);
    this.offset += 1;
    return value;
  }

  byte(): number {
    this.ensure(1);
    const value = this.buffer.readInt8(this.offset);
    this.offset += 1;
    return value;
  }

  int(): number {
    this.ensure(4);
    const value = this.buffer.readInt32BE(this.offset);
    this.offset += 4;
    return value;
  }

  double(): number {
    this.ensure(8);
    const value = this.buffer.readDoubleBE(this.offset);
    this.offset += 8;
    return value;
  }

  string(): string {
    const length = this.int();
    if (length < 0) {
      throw new TraciProtocolError(`Negative string length ${length}`);
    }
    this.ensure(length);
    const value = this.buffer.toString("latin1", this.offset, this.offset + length);
    this.offset += length;
    return value;
  }

  stringList(): string[] {
    const count = this.int();
    const values: string[] = [];
    for (let index = 0; index < count; index += 1) {
      values.push(this.string());
    }
    return values;
  }

  /** Command length: one byte, or a zero byte followed by an int for long commands. */
  length(): number {
    const short = this.ubyte();
    return short > 0 ? short : this.int();
  }

  skip(bytes: number): void {
    this.ensure(bytes);
    this.offset += bytes;
  }

  expectType(expected: number): void {
    const actual = this.ubyte();
    if (actual !== expected) {
      throw new TraciProtocolError(
        `Expected value of type ${typeName(expected)}, received ${typeName(actual)}`,
      );
    }
  }

  typedInt(): number {
    this.expectType(TYPE_INTEGER);
    return this.int();
  }

  typedDouble(): number {
    this.expectType(TYPE_DOUBLE);
    return this.double();
  }

  typedString(): string {
    this.expectType(TYPE_STRING);
    return this.string();
  }

  typedStringList(): string[] {
    this.expectType(TYPE_STRINGLIST);
    return this.stringList();
  }
}

export function encodeCommand(commandId: number, content: Buffer = Buffer.alloc(0)): Buffer {
  const shortLength = content.length + 2;
  if (shortLength <= MAX_SHORT_COMMAND_LENGTH) {
    return Buffer.concat([
      new StorageWriter().ubyte(shortLength).ubyte(commandId).toBuffer(),
      content,
    ]);
  }

  return Buffer.concat([
    new StorageWriter().ubyte(0).int(shortLength + 4).ubyte(commandId).toBuffer(),
    content,
  ]);
}

export function encodeVariableCommand(
  commandId: number,
  variableId: number,
  objectId: string,
  value?: Buffer,
): Buffer {
  const header = new StorageWriter().ubyte(variableId).string(objectId).toBuffer();
  return encodeCommand(commandId, value ? Buffer.concat([header, value]) : header);
}

export function encodeMessage(commands: readonly Buffer[]): Buffer {
  const body = Buffer.concat(commands);
  return Buffer.concat([new StorageWriter().int(body.length + 4).toBuffer(), body]);
}

export interface CommandStatus {
  commandId: number;
  resultCode: number;
  description: string;
}

export function readStatus(reader: StorageReader): CommandStatus {
  reader.length();
  const commandId = reader.ubyte();
  const resultCode = reader.ubyte();
  const description = reader.string();
  return { commandId, resultCode, description };
}

/**
 * Consumes one status block per sent command, in order. A refusal from the
 * simulator surfaces as a TraciCommandError; an answer to a different command
 * means the stream is out of sync.
 */
export function checkStatuses(reader: StorageReader, commandIds: readonly number[]): void {
  for (const expected of commandIds) {
    const status = readStatus(reader);
    if (status.resultCode !== RTYPE_OK || status.description) {
      const resultName = RESULT_NAMES[status.resultCode] ?? typeName(status.resultCode);
      throw new TraciCommandError(
        status.description || `Command ${typeName(status.commandId)} failed: ${resultName}`,
        status.commandId,
        status.resultCode,
      );
    }
    if (status.commandId !== expected) {
      throw new TraciProtocolError(
        `Received answer ${typeName(status.commandId)} for command ${typeName(expected)}`,
      );
    }
  }
}
