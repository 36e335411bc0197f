import { MAX_TIMEOUT_MS } from "./config.js";
import type { Connection } from "./connection.js";
import {
    ConnectionClosedError, MisuseError, StatementClosedError, UnsupportedOperationError,
} from "./errors.js";
import type { HttpTransport, RequestOptions } from "./http/client.js";
import type { Logger } from "./logger.js";
import { ResultSet } from "./result_set.js";
import { buildFinalSql, isQueryText } from "./sql.js";
import type { InValue, ParamValue, SqlTime } from "./value.js";
import { DecimalText, checkDate, paramFromValue } from "./value.js";

/** Executes SQL text on the connection that created it.
 *
 * Each execution is one HTTP exchange. Results are read completely into a {@link ResultSet} before the
 * returned promise resolves.
 */
export class Statement {
    #connection: Connection;
    #transport: HttpTransport;
    /** @private */
    protected readonly _logger: Logger;

    #resultSet: ResultSet | undefined;
    #updateCount: number;
    #maxRows: number;
    #queryTimeout: number;
    #closed: boolean;

    /** @private */
    constructor(connection: Connection, transport: HttpTransport, logger: Logger) {
        this.#connection = connection;
        this.#transport = transport;
        this._logger = logger;
        this.#resultSet = undefined;
        this.#updateCount = -1;
        this.#maxRows = 0;
        this.#queryTimeout = 0;
        this.#closed = false;
    }

    /** Executes a statement that returns rows. */
    async executeQuery(sql: string): Promise<ResultSet> {
        this._checkOpen();
        checkSql(sql);
        const result = await this.#transport.executeQuery(sql, this.#requestOptions());
        const resultSet = new ResultSet(result, this);
        this.#resultSet = resultSet;
        this.#updateCount = -1;
        return resultSet;
    }

    /** Executes a statement that does not return rows. The server does not report affected rows, so this
     * resolves to 0 whenever the server accepts the statement. */
    async executeUpdate(sql: string): Promise<number> {
        this._checkOpen();
        checkSql(sql);
        const count = await this.#transport.executeUpdate(sql, this.#requestOptions());
        this.#resultSet = undefined;
        this.#updateCount = count;
        return count;
    }

    /** Executes a statement of either kind. Resolves to true if the text was classified as a query, in which
     * case the rows are available from {@link getResultSet}. */
    async execute(sql: string): Promise<boolean> {
        this._checkOpen();
        checkSql(sql);
        if (isQueryText(sql)) {
            await this.executeQuery(sql);
            return true;
        }
        await this.executeUpdate(sql);
        return false;
    }

    /** The result of the last query, or `undefined` if the last execution was an update. */
    getResultSet(): ResultSet | undefined {
        this._checkOpen();
        return this.#resultSet;
    }

    /** Number of rows affected by the last update, or -1 if the last execution was a query. */
    getUpdateCount(): number {
        this._checkOpen();
        return this.#updateCount;
    }

    /** Closes the current result set. There is never a further result, so this always returns false. */
    getMoreResults(): boolean {
        this._checkOpen();
        this.#resultSet?.close();
        this.#resultSet = undefined;
        this.#updateCount = -1;
        return false;
    }

    /** Caps the number of rows the server returns for each query of this statement. 0 keeps the connection
     * default. */
    setMaxRows(maxRows: number): void {
        this._checkOpen();
        checkNonNegative(maxRows, "Max rows");
        this.#maxRows = maxRows;
    }

    getMaxRows(): number {
        this._checkOpen();
        return this.#maxRows;
    }

    /** Bounds each exchange of this statement, in seconds. 0 keeps the connection timeout. Other values must
     * come to at least one millisecond and at most {@link MAX_TIMEOUT_MS}. */
    setQueryTimeout(seconds: number): void {
        this._checkOpen();
        if (!Number.isFinite(seconds) || seconds < 0) {
            throw new MisuseError(`Query timeout must be a non-negative number of seconds, got ${seconds}`);
        }
        const ms = Math.round(seconds * 1000);
        if (seconds > 0 && (ms < 1 || ms > MAX_TIMEOUT_MS)) {
            throw new MisuseError(
                `Query timeout must be between 0.001 and ${MAX_TIMEOUT_MS / 1000} seconds, got ${seconds}`,
            );
        }
        this.#queryTimeout = seconds;
    }

    getQueryTimeout(): number {
        this._checkOpen();
        return this.#queryTimeout;
    }

    cancel(): never {
        throw new UnsupportedOperationError("Cancelling a running statement is not supported");
    }

    addBatch(_sql: string): never {
        throw new UnsupportedOperationError("Batch execution is not supported");
    }

    clearBatch(): never {
        throw new UnsupportedOperationError("Batch execution is not supported");
    }

    executeBatch(): never {
        throw new UnsupportedOperationError("Batch execution is not supported");
    }

    /** The connection that created this statement. */
    getConnection(): Connection {
        this._checkOpen();
        return this.#connection;
    }

    /** Close the statement and its current result set. Closing again does nothing. */
    close(): void {
        if (this.#closed) {
            return;
        }
        this.#closed = true;
        this.#resultSet?.close();
        this.#resultSet = undefined;
    }

    /** True if the statement is closed. */
    get closed(): boolean {
        return this.#closed;
    }

    isClosed(): boolean {
        return this.#closed;
    }

    /** @private */
    protected _checkOpen(): void {
        if (this.#closed) {
            throw new StatementClosedError();
        } else if (this.#connection.closed) {
            throw new ConnectionClosedError();
        }
    }

    #requestOptions(): RequestOptions {
        const options: RequestOptions = {};
        if (this.#maxRows > 0) {
            options.maxResultRows = this.#maxRows;
        }
        if (this.#queryTimeout > 0) {
            options.timeoutMs = Math.round(this.#queryTimeout * 1000);
        }
        return options;
    }
}

/** A statement with `?` placeholders whose values are bound by index before execution.
 *
 * Values are written into the SQL text as literals; see {@link buildFinalSql} for the exact rules. Parameters
 * are numbered from 1.
 */
export class PreparedStatement extends Statement {
    readonly sql: string;
    #params: Map<number, ParamValue>;

    /** @private */
    constructor(connection: Connection, transport: HttpTransport, logger: Logger, sql: string) {
        super(connection, transport, logger);
        this.sql = sql;
        this.#params = new Map();
    }

    setNull(index: number): void {
        this.#bind(index, { type: "null" });
    }

    setBoolean(index: number, value: boolean): void {
        this.#bind(index, { type: "boolean", value });
    }

    /** Binds an integer in the range of a signed byte. */
    setByte(index: number, value: number): void {
        this.#bindInteger(index, value, 8);
    }

    /** Binds an integer in the range of a signed 16-bit integer. */
    setShort(index: number, value: number): void {
        this.#bindInteger(index, value, 16);
    }

    setInt(index: number, value: number): void {
        if (!Number.isSafeInteger(value)) {
            throw new MisuseError(`Parameter ${index} must be an integer, got ${value}`);
        }
        this.#bind(index, { type: "number", value });
    }

    setLong(index: number, value: bigint): void {
        this.#bind(index, { type: "bigint", value });
    }

    /** Same as {@link setDouble}. The value is written as given, without rounding to single precision. */
    setFloat(index: number, value: number): void {
        this.setDouble(index, value);
    }

    setDouble(index: number, value: number): void {
        this.#bind(index, paramFromValue(value));
    }

    setString(index: number, value: string | null): void {
        this.#bind(index, value === null ? { type: "null" } : { type: "text", value });
    }

    /** Binds an exact decimal. A string is validated as a decimal literal. */
    setBigDecimal(index: number, value: DecimalText | string | null): void {
        if (value === null) {
            this.#bind(index, { type: "null" });
        } else {
            this.#bind(index, { type: "decimal", value: typeof value === "string" ? new DecimalText(value) : value });
        }
    }

    /** Binds the UTC date part of `value`, written as `'YYYY-MM-DD'`. */
    setDate(index: number, value: Date | null): void {
        this.#bind(index, value === null ? { type: "null" } : { type: "date", value: checkDate(value) });
    }

    setTime(index: number, value: SqlTime | null): void {
        this.#bind(index, value === null ? { type: "null" } : { type: "time", value });
    }

    /** Binds a UTC timestamp, written as `'YYYY-MM-DD HH:MM:SS.fff'`. */
    setTimestamp(index: number, value: Date | null): void {
        this.#bind(index, value === null ? { type: "null" } : { type: "timestamp", value: checkDate(value) });
    }

    /** Binds any supported JavaScript value. A `Date` is bound as a timestamp. */
    setObject(index: number, value: InValue): void {
        this.#bind(index, paramFromValue(value));
    }

    clearParameters(): void {
        this._checkOpen();
        this.#params.clear();
    }

    /** The SQL text that would be sent with the parameters bound so far. */
    buildFinalSql(): string {
        return buildFinalSql(this.sql, this.#params);
    }

    /** Executes the prepared text with the bound parameters, or `sql` if given. */
    override async executeQuery(sql?: string): Promise<ResultSet> {
        return super.executeQuery(sql ?? this.#finalSql());
    }

    /** Executes the prepared text with the bound parameters, or `sql` if given. */
    override async executeUpdate(sql?: string): Promise<number> {
        return super.executeUpdate(sql ?? this.#finalSql());
    }

    /** Executes the prepared text with the bound parameters, or `sql` if given. */
    override async execute(sql?: string): Promise<boolean> {
        return super.execute(sql ?? this.#finalSql());
    }

    #finalSql(): string {
        const finalSql = this.buildFinalSql();
        this._logger.debug("Built prepared statement SQL", { sql: finalSql });
        return finalSql;
    }

    #bindInteger(index: number, value: number, bits: 8 | 16): void {
        const max = 2 ** (bits - 1) - 1;
        if (!Number.isInteger(value) || value < -max - 1 || value > max) {
            throw new MisuseError(`Parameter ${index} must be a ${bits}-bit integer, got ${value}`);
        }
        this.#bind(index, { type: "number", value });
    }

    #bind(index: number, param: ParamValue): void {
        this._checkOpen();
        if (!Number.isInteger(index) || index < 1) {
            throw new MisuseError(`Invalid parameter index: ${index}`);
        }
        this.#params.set(index, param);
    }
}

function checkSql(sql: string): void {
    if (sql.trim() === "") {
        throw new MisuseError("SQL text must not be empty");
    }
}

function checkNonNegative(num: number, what: string): void {
    if (!Number.isInteger(num) || num < 0) {
        throw new MisuseError(`${what} must be a non-negative integer, got ${num}`);
    }
}
