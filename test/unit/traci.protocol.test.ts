import assert from "node:assert/strict";
import test from "node:test";
import { TraciCommandError, TraciProtocolError } from "../../src/services/traci/errors";
import {
  checkStatuses,
  encodeCommand,
  encodeMessage,
  encodeVariableCommand,
  StorageReader,
  StorageWriter,
} from "../../src/services/traci/protocol";

test("encodeCommand uses a one-byte length for short commands", () => {
  const bytes = encodeCommand(0x02, new StorageWriter().double(0).toBuffer());

  assert.deepEqual([...bytes], [0x0a, 0x02, 0, 0, 0, 0, 0, 0, 0, 0]);
});

test("encodeCommand switches to the extended length header past 255 bytes", () => {
  const bytes = encodeCommand(0xc4, Buffer.alloc(300, 1));

  assert.equal(bytes.length, 306);
  assert.equal(bytes.readUInt8(0), 0);
  assert.equal(bytes.readInt32BE(1), 306);
  assert.equal(bytes.readUInt8(5), 0xc4);
});

test("encodeVariableCommand writes variable id and object id before the value", () => {
  const bytes = encodeVariableCommand(0xa4, 0x40, "veh0");

  assert.deepEqual(
    [...bytes],
    [0x0b, 0xa4, 0x40, 0, 0, 0, 4, 0x76, 0x65, 0x68, 0x30],
  );
});

test("encodeMessage prefixes the total length including the header", () => {
  const message = encodeMessage([encodeCommand(0x00), encodeCommand(0x7f)]);

  assert.deepEqual([...message], [0, 0, 0, 8, 0x02, 0x00, 0x02, 0x7f]);
});

test("typed writer and reader agree on every supported value", () => {
  const buffer = new StorageWriter()
    .typedInt(-7)
    .typedDouble(13.9)
    .typedString("route_0")
    .typedStringList(["a", "bc"])
    .typedByte(-2)
    .toBuffer();
  const reader = new StorageReader(buffer);

  assert.equal(reader.typedInt(), -7);
  assert.equal(reader.typedDouble(), 13.9);
  assert.equal(reader.typedString(), "route_0");
  assert.deepEqual(reader.typedStringList(), ["a", "bc"]);
  reader.expectType(0x08);
  assert.equal(reader.byte(), -2);
  assert.equal(reader.remaining, 0);
});

test("reader rejects a value of the wrong type", () => {
  const reader = new StorageReader(new StorageWriter().typedInt(3).toBuffer());

  assert.throws(
    () => reader.typedDouble(),
    (error: unknown) =>
      error instanceof TraciProtocolError
      && error.message === "Expected value of type 0x0b, received 0x09",
  );
});

test("reader rejects truncated data", () => {
  const reader = new StorageReader(Buffer.from([0, 0, 0, 5, 0x61]));

  assert.throws(() => reader.string(), TraciProtocolError);
});

test("length reads the extended form after a zero byte", () => {
  const reader = new StorageReader(new StorageWriter().ubyte(0).int(300).ubyte(9).toBuffer());

  assert.equal(reader.length(), 300);
  assert.equal(reader.ubyte(), 9);
});

function status(commandId: number, resultCode: number, description: string): Buffer {
  return new StorageWriter()
    .ubyte(7 + description.length)
    .ubyte(commandId)
    .ubyte(resultCode)
    .string(description)
    .toBuffer();
}

test("checkStatuses raises a command error carrying the simulator message", () => {
  const reader = new StorageReader(status(0xc4, 0xff, "Invalid route 'route_9'"));

  assert.throws(
    () => checkStatuses(reader, [0xc4]),
    (error: unknown) =>
      error instanceof TraciCommandError
      && error.message === "Invalid route 'route_9'"
      && error.commandId === 0xc4
      && error.resultCode === 0xff,
  );
});

test("checkStatuses names the result when the simulator gives no description", () => {
  const reader = new StorageReader(status(0xa4, 0x01, ""));

  assert.throws(
    () => checkStatuses(reader, [0xa4]),
    (error: unknown) =>
      error instanceof TraciCommandError
      && error.message === "Command 0xa4 failed: Not implemented",
  );
});

test("checkStatuses detects answers to a different command", () => {
  const reader = new StorageReader(status(0x02, 0x00, ""));

  assert.throws(
    () => checkStatuses(reader, [0xa4]),
    (error: unknown) =>
      error instanceof TraciProtocolError
      && error.message === "Received answer 0x02 for command 0xa4",
  );
});

test("checkStatuses consumes one status per command", () => {
  const reader = new StorageReader(
    Buffer.concat([status(0x02, 0, ""), status(0x7f, 0, ""), Buffer.from([1, 2])]),
  );

  checkStatuses(reader, [0x02, 0x7f]);
  assert.equal(reader.remaining, 2);
});
