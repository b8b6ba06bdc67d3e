export class TraciError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TraciError";
  }
}

/** The simulator understood the command and refused it (unknown route, duplicate id, ...). */
export class TraciCommandError extends TraciError {
  readonly commandId: number;
  readonly resultCode: number;

  constructor(message: string, commandId: number, resultCode: number) {
    super(message);
    this.name = "TraciCommandError";
    this.commandId = commandId;
    this.resultCode = resultCode;
  }
}

/** The bytes on the wire do not match what the request expects. */
export class TraciProtocolError extends TraciError {
  constructor(message: string) {
    super(message);
    this.name = "TraciProtocolError";
  }
}

export class TraciConnectionError extends TraciError {
  constructor(message: string) {
    super(message);
    this.name = "TraciConnectionError";
  }
}
