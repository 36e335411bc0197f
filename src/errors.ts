/** Generic error produced by the client. */
export class ClientError extends Error {
    /** @private */
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "ClientError";
    }
}

/** Error thrown when a connection descriptor string is not valid. */
export class DescriptorParseError extends ClientError {
    /** @private */
    constructor(message: string) {
        super(message);
        this.name = "DescriptorParseError";
    }
}

/** Error thrown when the liveness probe does not return a success status. */
export class ConnectionUnavailableError extends ClientError {
    /** HTTP status returned by the probe. */
    status: number;

    /** @private */
    constructor(message: string, status: number) {
        super(message);
        this.name = "ConnectionUnavailableError";
        this.status = status;
    }
}

/** Error thrown when a connection could not be opened. The `cause` holds the underlying failure. */
export class ConnectionFailedError extends ClientError {
    /** @private */
    constructor(message: string, cause: unknown) {
        super(`${message}: ${describeCause(cause)}`, { cause });
        this.name = "ConnectionFailedError";
    }
}

/** Error thrown when an HTTP exchange fails at the network level or times out. */
export class TransportError extends ClientError {
    /** @private */
    constructor(message: string, cause: unknown) {
        super(`${message}: ${describeCause(cause)}`, { cause });
        this.name = "TransportError";
    }
}

/** Error thrown when the server answers a well-formed request with a non-success status. */
export class RemoteExecutionError extends ClientError {
    status: number;
    body: string;

    /** @private */
    constructor(message: string, status: number, body: string) {
        super(message);
        this.name = "RemoteExecutionError";
        this.status = status;
        this.body = body;
        this.stack = undefined;
    }
}

/** Error thrown when the response body of a query does not match the tabular JSON format. */
export class ResultDecodeError extends ClientError {
    /** @private */
    constructor(message: string) {
        super(message);
        this.name = "ResultDecodeError";
    }
}

/** Error thrown when a cell is read while the cursor is not on a row. */
export class CursorPositionError extends ClientError {
    position: number;

    /** @private */
    constructor(message: string, position: number) {
        super(message);
        this.name = "CursorPositionError";
        this.position = position;
    }
}

/** Error thrown for a column index outside of `1..columnCount`. */
export class ColumnIndexError extends ClientError {
    columnIndex: number;

    /** @private */
    constructor(message: string, columnIndex: number) {
        super(message);
        this.name = "ColumnIndexError";
        this.columnIndex = columnIndex;
    }
}

/** Error thrown when a column label does not name any column of the result. */
export class ColumnNotFoundError extends ClientError {
    label: string;

    /** @private */
    constructor(label: string) {
        super(`Column not found: ${label}`);
        this.name = "ColumnNotFoundError";
        this.label = label;
    }
}

/** Error thrown when the connection, statement or cursor is closed. */
export class ClosedError extends ClientError {
    /** @private */
    constructor(message: string) {
        super(message);
        this.name = "ClosedError";
    }
}

/** Error thrown when a closed connection (or an object created from it) is used. */
export class ConnectionClosedError extends ClosedError {
    /** @private */
    constructor(message: string = "Connection is closed") {
        super(message);
        this.name = "ConnectionClosedError";
    }
}

/** Error thrown when a closed statement is used. */
export class StatementClosedError extends ClosedError {
    /** @private */
    constructor(message: string = "Statement is closed") {
        super(message);
        this.name = "StatementClosedError";
    }
}

/** Error thrown when a closed result set is used. */
export class CursorClosedError extends ClosedError {
    /** @private */
    constructor(message: string = "ResultSet is closed") {
        super(message);
        this.name = "CursorClosedError";
    }
}

/** Error thrown for operations this client deliberately does not implement (writes through a result set,
 * transactions, batches, stored procedures, streams). */
export class UnsupportedOperationError extends ClientError {
    /** @private */
    constructor(message: string) {
        super(message);
        this.name = "UnsupportedOperationError";
    }
}

/** Error thrown when the API was misused. */
export class MisuseError extends ClientError {
    /** @private */
    constructor(message: string) {
        super(message);
        this.name = "MisuseError";
    }
}

/** Error thrown when an internal invariant is violated. */
export class InternalError extends ClientError {
    /** @private */
    constructor(message: string) {
        super(message);
        this.name = "InternalError";
    }
}

function describeCause(cause: unknown): string {
    if (cause instanceof Error) {
        return cause.message;
    }
    return String(cause);
}
