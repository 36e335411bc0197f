import type { Coerced, IntegerBits, ObjectValue } from "./convert.js";
import {
    toBoolean, toBytes, toDate, toDecimal, toFloat, toInteger, toLong,
    toObject, toText, toTime, toTimestamp,
} from "./convert.js";
import {
    ColumnIndexError, ColumnNotFoundError, CursorClosedError, CursorPositionError,
    MisuseError, UnsupportedOperationError,
} from "./errors.js";
import type * as proto from "./proto.js";
import { ResultSetMetaData } from "./result_set_metadata.js";
import type { Statement } from "./statement.js";
import { typeFamily } from "./types.js";
import type { Cell, DecimalText, SqlTime } from "./value.js";
import { cellFromWire } from "./value.js";

/** A column, either by its 1-based index or by its label (matched case-insensitively). */
export type ColumnRef = number | string;

/** A scrollable, read-only cursor over the rows of one executed query.
 *
 * All rows are held in memory, so the cursor can move in any direction and stays readable after the
 * connection that produced it is closed. The cursor position is 0 before the first row, `1..N` on a row and
 * `N + 1` after the last row.
 */
export class ResultSet {
    #statement: Statement | undefined;
    #columns: ReadonlyArray<proto.ColumnMeta>;
    #rows: ReadonlyArray<ReadonlyArray<Cell>>;
    #labels: Map<string, number>;
    #rowCount: number;
    #stats: proto.WireStats;

    #position: number;
    #wasNull: boolean;
    #closed: boolean;

    /** @private */
    constructor(result: proto.WireResult, statement?: Statement) {
        this.#statement = statement;
        this.#columns = result.columns;
        const families = result.columns.map((col) => typeFamily(col.wireType));
        this.#rows = result.rows.map((row) => row.map((value, idx) => cellFromWire(value, families[idx])));
        this.#rowCount = result.rowCount;
        this.#stats = result.stats;

        // the first column wins when several share a label
        this.#labels = new Map();
        result.columns.forEach((col, idx) => {
            const key = col.name.toLowerCase();
            if (!this.#labels.has(key)) {
                this.#labels.set(key, idx + 1);
            }
        });

        this.#position = 0;
        this.#wasNull = false;
        this.#closed = false;
    }

    /** Moves to the next row. Returns false, and stays after the last row, once the rows are exhausted. */
    next(): boolean {
        this.#checkOpen();
        if (this.#position < this.#rows.length) {
            this.#position += 1;
            return true;
        }
        this.#position = this.#rows.length + 1;
        return false;
    }

    /** Moves to the previous row, or before the first row if there is none. */
    previous(): boolean {
        this.#checkOpen();
        if (this.#position > 1) {
            this.#position -= 1;
            return this.#onRow();
        }
        this.#position = 0;
        return false;
    }

    /** Moves to row `row`. Positive numbers count from the first row (1), negative numbers from the last row
     * (-1), and 0 moves before the first row. Positions past either end are clamped. */
    absolute(row: number): boolean {
        this.#checkOpen();
        checkInteger(row, "Row number");
        const count = this.#rows.length;
        if (row === 0) {
            this.#position = 0;
        } else if (row > 0) {
            this.#position = Math.min(row, count + 1);
        } else {
            this.#position = Math.max(count + row + 1, 0);
        }
        return this.#onRow();
    }

    /** Same as `absolute(getRowPosition() + rows)`. */
    relative(rows: number): boolean {
        this.#checkOpen();
        checkInteger(rows, "Row offset");
        return this.absolute(this.#position + rows);
    }

    first(): boolean {
        return this.absolute(1);
    }

    last(): boolean {
        return this.absolute(-1);
    }

    beforeFirst(): void {
        this.#checkOpen();
        this.#position = 0;
    }

    afterLast(): void {
        this.#checkOpen();
        this.#position = this.#rows.length + 1;
    }

    /** Number of the current row, or 0 when the cursor is not on a row. */
    getRow(): number {
        this.#checkOpen();
        return this.#onRow() ? this.#position : 0;
    }

    /** Raw cursor position, including the before-first (0) and after-last (`N + 1`) positions. */
    getRowPosition(): number {
        this.#checkOpen();
        return this.#position;
    }

    isBeforeFirst(): boolean {
        this.#checkOpen();
        return this.#position === 0 && this.#rows.length > 0;
    }

    isAfterLast(): boolean {
        this.#checkOpen();
        return this.#position > this.#rows.length && this.#rows.length > 0;
    }

    isFirst(): boolean {
        this.#checkOpen();
        return this.#position === 1 && this.#rows.length > 0;
    }

    isLast(): boolean {
        this.#checkOpen();
        return this.#position === this.#rows.length && this.#rows.length > 0;
    }

    /** True if the last value read by a getter was a SQL NULL. A value that failed to parse is not a NULL. */
    wasNull(): boolean {
        this.#checkOpen();
        return this.#wasNull;
    }

    getString(column: ColumnRef): string | null {
        return this.#read(column, toText);
    }

    getBoolean(column: ColumnRef): boolean {
        return this.#read(column, toBoolean);
    }

    getByte(column: ColumnRef): number {
        return this.#readInteger(column, 8);
    }

    getShort(column: ColumnRef): number {
        return this.#readInteger(column, 16);
    }

    getInt(column: ColumnRef): number {
        return this.#readInteger(column, 32);
    }

    /** Reads a 64-bit integer. Numbers in the response are parsed as JSON doubles first, so integers beyond
     * `Number.MAX_SAFE_INTEGER` arrive already rounded; a server that sends them as text keeps them exact. */
    getLong(column: ColumnRef): bigint {
        return this.#read(column, toLong);
    }

    getFloat(column: ColumnRef): number {
        return this.#read(column, (cell) => toFloat(cell, true));
    }

    getDouble(column: ColumnRef): number {
        return this.#read(column, (cell) => toFloat(cell, false));
    }

    getBigDecimal(column: ColumnRef): DecimalText | null {
        return this.#read(column, toDecimal);
    }

    getBytes(column: ColumnRef): Uint8Array | null {
        return this.#read(column, toBytes);
    }

    getDate(column: ColumnRef): Date | null {
        return this.#read(column, toDate);
    }

    getTime(column: ColumnRef): SqlTime | null {
        return this.#read(column, toTime);
    }

    getTimestamp(column: ColumnRef): Date | null {
        return this.#read(column, toTimestamp);
    }

    getObject(column: ColumnRef): ObjectValue {
        return this.#read(column, toObject);
    }

    /** Returns the 1-based index of the column with the given label. Labels are matched case-insensitively. */
    findColumn(label: string): number {
        this.#checkOpen();
        const index = this.#labels.get(label.toLowerCase());
        if (index === undefined) {
            throw new ColumnNotFoundError(label);
        }
        return index;
    }

    getMetaData(): ResultSetMetaData {
        this.#checkOpen();
        return new ResultSetMetaData(this.#columns);
    }

    /** The statement that produced this result set, if any. */
    getStatement(): Statement | undefined {
        this.#checkOpen();
        return this.#statement;
    }

    /** Execution statistics reported by the server. */
    getStatistics(): proto.WireStats {
        this.#checkOpen();
        return {...this.#stats};
    }

    /** Row count reported by the server. It is not guaranteed to match the number of rows in the result. */
    getAdvisoryRowCount(): number {
        this.#checkOpen();
        return this.#rowCount;
    }

    getType(): "scroll-insensitive" {
        this.#checkOpen();
        return "scroll-insensitive";
    }

    getConcurrency(): "read-only" {
        this.#checkOpen();
        return "read-only";
    }

    updateRow(): never {
        throw new UnsupportedOperationError("Result sets are read-only");
    }

    insertRow(): never {
        throw new UnsupportedOperationError("Result sets are read-only");
    }

    deleteRow(): never {
        throw new UnsupportedOperationError("Result sets are read-only");
    }

    getCharacterStream(_column: ColumnRef): never {
        throw new UnsupportedOperationError("Streams are not supported");
    }

    getBinaryStream(_column: ColumnRef): never {
        throw new UnsupportedOperationError("Streams are not supported");
    }

    /** Close the result set. The rows are released; closing again does nothing. */
    close(): void {
        if (this.#closed) {
            return;
        }
        this.#closed = true;
        this.#rows = [];
    }

    /** True if the result set is closed. */
    get closed(): boolean {
        return this.#closed;
    }

    isClosed(): boolean {
        return this.#closed;
    }

    #readInteger(column: ColumnRef, bits: IntegerBits): number {
        return this.#read(column, (cell) => toInteger(cell, bits));
    }

    #read<T>(column: ColumnRef, coerce: (cell: Cell) => Coerced<T>): T {
        const cell = this.#cell(column);
        const { value, wasNull } = coerce(cell);
        this.#wasNull = wasNull;
        return value;
    }

    #cell(column: ColumnRef): Cell {
        this.#checkOpen();
        const index = typeof column === "string" ? this.findColumn(column) : column;
        if (!this.#onRow()) {
            throw new CursorPositionError(`Invalid row position: ${this.#position}`, this.#position);
        }
        if (!Number.isInteger(index) || index < 1 || index > this.#columns.length) {
            throw new ColumnIndexError(`Invalid column index: ${index}`, index);
        }
        return this.#rows[this.#position - 1][index - 1];
    }

    #onRow(): boolean {
        return this.#position >= 1 && this.#position <= this.#rows.length;
    }

    #checkOpen(): void {
        if (this.#closed) {
            throw new CursorClosedError();
        }
    }
}

function checkInteger(num: number, what: string): void {
    if (!Number.isInteger(num)) {
        throw new MisuseError(`${what} must be an integer, got ${num}`);
    }
}
