import type { ClientConfig } from "./config.js";
import { DatabaseMetaData } from "./database_metadata.js";
import type { ConnectionDescriptor } from "./descriptor.js";
import {
    ConnectionClosedError, ConnectionFailedError, MisuseError, UnsupportedOperationError,
} from "./errors.js";
import type { FetchFunction } from "./http/client.js";
import { HttpTransport } from "./http/client.js";
import type { Logger } from "./logger.js";
import { createLogger, logger as defaultLogger } from "./logger.js";
import { PreparedStatement, Statement } from "./statement.js";

/** Transaction isolation levels. The server has no transactions, so only `"none"` is ever in effect. */
export type TransactionIsolation =
    | "none"
    | "read-uncommitted"
    | "read-committed"
    | "repeatable-read"
    | "serializable";

/** Opens a connection: builds the HTTP transport and probes the server once.
 *
 * If the probe fails, the transport is released and the promise rejects with a {@link ConnectionFailedError}
 * whose `cause` is the probe failure.
 */
export async function openConnection(
    descriptor: ConnectionDescriptor,
    config: ClientConfig,
    customFetch?: FetchFunction,
): Promise<Connection> {
    const logger = config.logLevel !== undefined ? createLogger(config.logLevel) : defaultLogger;
    const transport = new HttpTransport(descriptor, config, logger, customFetch);
    try {
        await transport.probe();
    } catch (e) {
        transport.close();
        logger.error("Failed to connect", { baseUrl: transport.baseUrl, error: e });
        throw new ConnectionFailedError(`Failed to connect to ${transport.baseUrl}`, e);
    }
    logger.info("Connected", { baseUrl: transport.baseUrl });
    return new Connection(descriptor, config, transport, logger);
}

/** A session with one query engine server.
 *
 * The server is stateless over HTTP, so the session flags kept here (auto-commit, read-only, catalog) are
 * bookkeeping only and never sent to the server.
 */
export class Connection {
    #descriptor: ConnectionDescriptor;
    #config: ClientConfig;
    #transport: HttpTransport;
    #logger: Logger;

    #autoCommit: boolean;
    #readOnly: boolean;
    #catalog: string | null;
    #closed: boolean;

    /** @private */
    constructor(descriptor: ConnectionDescriptor, config: ClientConfig, transport: HttpTransport, logger: Logger) {
        this.#descriptor = descriptor;
        this.#config = config;
        this.#transport = transport;
        this.#logger = logger;
        this.#autoCommit = true;
        this.#readOnly = false;
        this.#catalog = descriptor.path !== "" ? descriptor.path : null;
        this.#closed = false;
    }

    /** Creates a statement for executing SQL text. */
    createStatement(): Statement {
        this.#checkOpen();
        return new Statement(this, this.#transport, this.#logger);
    }

    /** Creates a statement with `?` placeholders. The text is not sent to the server until execution. */
    prepareStatement(sql: string): PreparedStatement {
        this.#checkOpen();
        return new PreparedStatement(this, this.#transport, this.#logger, sql);
    }

    prepareCall(_sql: string): never {
        throw new UnsupportedOperationError("Stored procedures are not supported");
    }

    /** Returns the SQL text unchanged: the server takes it as is. */
    nativeSql(sql: string): string {
        this.#checkOpen();
        return sql;
    }

    setAutoCommit(autoCommit: boolean): void {
        this.#checkOpen();
        this.#autoCommit = autoCommit;
    }

    getAutoCommit(): boolean {
        this.#checkOpen();
        return this.#autoCommit;
    }

    /** Does nothing on the server, which has no transactions. Throws while auto-commit is on. */
    commit(): void {
        this.#checkOpen();
        if (this.#autoCommit) {
            throw new MisuseError("Cannot commit when auto-commit is enabled");
        }
        this.#logger.debug("Commit requested; the server has no transactions");
    }

    /** Does nothing on the server, which has no transactions. Throws while auto-commit is on. */
    rollback(): void {
        this.#checkOpen();
        if (this.#autoCommit) {
            throw new MisuseError("Cannot rollback when auto-commit is enabled");
        }
        this.#logger.debug("Rollback requested; the server has no transactions");
    }

    setSavepoint(_name?: string): never {
        throw new UnsupportedOperationError("Savepoints are not supported");
    }

    releaseSavepoint(_name: string): never {
        throw new UnsupportedOperationError("Savepoints are not supported");
    }

    setReadOnly(readOnly: boolean): void {
        this.#checkOpen();
        this.#readOnly = readOnly;
    }

    isReadOnly(): boolean {
        this.#checkOpen();
        return this.#readOnly;
    }

    setCatalog(catalog: string | null): void {
        this.#checkOpen();
        this.#catalog = catalog;
    }

    /** The current catalog. Initially the path of the connection descriptor, or null if it has none. */
    getCatalog(): string | null {
        this.#checkOpen();
        return this.#catalog;
    }

    getSchema(): string | null {
        this.#checkOpen();
        return null;
    }

    setTransactionIsolation(level: TransactionIsolation): void {
        this.#checkOpen();
        if (level !== "none") {
            throw new UnsupportedOperationError(`Transaction isolation level "${level}" is not supported`);
        }
    }

    getTransactionIsolation(): TransactionIsolation {
        this.#checkOpen();
        return "none";
    }

    createBlob(): never {
        throw new UnsupportedOperationError("Large objects are not supported");
    }

    createClob(): never {
        throw new UnsupportedOperationError("Large objects are not supported");
    }

    getMetaData(): DatabaseMetaData {
        this.#checkOpen();
        return new DatabaseMetaData(this, this.#descriptor, this.#config.user);
    }

    /** Probes the server again. Resolves to false if the connection is closed or the probe fails. */
    async isValid(): Promise<boolean> {
        if (this.#closed) {
            return false;
        }
        try {
            await this.#transport.probe();
            return true;
        } catch (e) {
            this.#logger.warn("Connection validation failed", { baseUrl: this.#transport.baseUrl, error: e });
            return false;
        }
    }

    /** Close the connection and release its sockets. Closing again does nothing.
     *
     * Result sets that were already read stay readable.
     */
    close(): void {
        if (this.#closed) {
            return;
        }
        this.#closed = true;
        this.#transport.close();
        this.#logger.info("Connection closed", { baseUrl: this.#transport.baseUrl });
    }

    /** True if the connection is closed. */
    get closed(): boolean {
        return this.#closed;
    }

    isClosed(): boolean {
        return this.#closed;
    }

    #checkOpen(): void {
        if (this.#closed) {
            throw new ConnectionClosedError();
        }
    }
}
