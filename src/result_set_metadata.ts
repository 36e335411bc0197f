import { ColumnIndexError } from "./errors.js";
import type * as proto from "./proto.js";
import type { SqlType } from "./types.js";
import {
    displaySizeOf, isNullableType, isSignedType, jsTypeNameOf,
    precisionOf, sqlTypeOf, unwrapNullable,
} from "./types.js";

/** Nullability of a column as far as the wire format tells. */
export type ColumnNullability = "nullable" | "unknown";

/** Description of the columns of a {@link ResultSet}. Columns are numbered from 1. */
export class ResultSetMetaData {
    #columns: ReadonlyArray<proto.ColumnMeta>;

    /** @private */
    constructor(columns: ReadonlyArray<proto.ColumnMeta>) {
        this.#columns = columns;
    }

    getColumnCount(): number {
        return this.#columns.length;
    }

    getColumnName(column: number): string {
        return this.#column(column).name;
    }

    getColumnLabel(column: number): string {
        return this.#column(column).name;
    }

    /** Type name as sent by the server, without a `NULLABLE(...)` wrapper, in upper case. */
    getColumnTypeName(column: number): string {
        return unwrapNullable(this.#column(column).wireType);
    }

    getColumnType(column: number): SqlType {
        return sqlTypeOf(this.#column(column).wireType);
    }

    /** Name of the JavaScript type that {@link ResultSet.getObject} returns for this column. */
    getColumnClassName(column: number): string {
        return jsTypeNameOf(this.#column(column).wireType);
    }

    /** A column is reported as nullable only if the server wrapped its type in `NULLABLE(...)`. */
    isNullable(column: number): ColumnNullability {
        return isNullableType(this.#column(column).wireType) ? "nullable" : "unknown";
    }

    isSigned(column: number): boolean {
        return isSignedType(this.#column(column).wireType);
    }

    getColumnDisplaySize(column: number): number {
        return displaySizeOf(this.#column(column).wireType);
    }

    getPrecision(column: number): number {
        return precisionOf(this.#column(column).wireType);
    }

    getScale(column: number): number {
        this.#column(column);
        return 0;
    }

    getSchemaName(column: number): string {
        this.#column(column);
        return "";
    }

    getTableName(column: number): string {
        this.#column(column);
        return "";
    }

    getCatalogName(column: number): string {
        this.#column(column);
        return "";
    }

    isAutoIncrement(column: number): boolean {
        this.#column(column);
        return false;
    }

    isCaseSensitive(column: number): boolean {
        this.#column(column);
        return true;
    }

    isSearchable(column: number): boolean {
        this.#column(column);
        return true;
    }

    isCurrency(column: number): boolean {
        this.#column(column);
        return false;
    }

    isReadOnly(column: number): boolean {
        this.#column(column);
        return true;
    }

    isWritable(column: number): boolean {
        this.#column(column);
        return false;
    }

    isDefinitelyWritable(column: number): boolean {
        this.#column(column);
        return false;
    }

    #column(column: number): proto.ColumnMeta {
        if (!Number.isInteger(column) || column < 1 || column > this.#columns.length) {
            throw new ColumnIndexError(`Invalid column index: ${column}`, column);
        }
        return this.#columns[column - 1];
    }
}
