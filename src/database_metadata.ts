import type { Connection } from "./connection.js";
import type { ConnectionDescriptor } from "./descriptor.js";
import { DESCRIPTOR_PREFIX } from "./descriptor.js";
import { UnsupportedOperationError } from "./errors.js";

export const PRODUCT_NAME = "DuckDB Federated Query Engine";
export const PRODUCT_VERSION = "1.0.0";
export const DRIVER_NAME = "FQE HTTP Client";
export const DRIVER_VERSION = "1.0.0";
export const DRIVER_MAJOR_VERSION = 1;
export const DRIVER_MINOR_VERSION = 0;

/** Static description of what the server and this client support. */
export class DatabaseMetaData {
    #connection: Connection;
    #descriptor: ConnectionDescriptor;
    #user: string | undefined;

    /** @private */
    constructor(connection: Connection, descriptor: ConnectionDescriptor, user: string | undefined) {
        this.#connection = connection;
        this.#descriptor = descriptor;
        this.#user = user;
    }

    getConnection(): Connection {
        return this.#connection;
    }

    /** The descriptor of the connection, without its options. */
    getURL(): string {
        const { host, port, path } = this.#descriptor;
        return `${DESCRIPTOR_PREFIX}${host}:${port}/${path}`;
    }

    /** The configured user, or an empty string if none was given. */
    getUserName(): string {
        return this.#user ?? "";
    }

    isReadOnly(): boolean {
        return this.#connection.isReadOnly();
    }

    getDatabaseProductName(): string {
        return PRODUCT_NAME;
    }

    getDatabaseProductVersion(): string {
        return PRODUCT_VERSION;
    }

    getDriverName(): string {
        return DRIVER_NAME;
    }

    getDriverVersion(): string {
        return DRIVER_VERSION;
    }

    getDriverMajorVersion(): number {
        return DRIVER_MAJOR_VERSION;
    }

    getDriverMinorVersion(): number {
        return DRIVER_MINOR_VERSION;
    }

    getIdentifierQuoteString(): string {
        return "\"";
    }

    getSQLKeywords(): string {
        return "";
    }

    supportsTransactions(): boolean {
        return false;
    }

    supportsStoredProcedures(): boolean {
        return false;
    }

    supportsBatchUpdates(): boolean {
        return false;
    }

    supportsMultipleResultSets(): boolean {
        return false;
    }

    supportsSavepoints(): boolean {
        return false;
    }

    supportsResultSetType(type: string): boolean {
        return type === "scroll-insensitive";
    }

    supportsResultSetConcurrency(type: string, concurrency: string): boolean {
        return type === "scroll-insensitive" && concurrency === "read-only";
    }

    usesLocalFiles(): boolean {
        return false;
    }

    allProceduresAreCallable(): boolean {
        return false;
    }

    allTablesAreSelectable(): boolean {
        return true;
    }

    getTables(): never {
        throw new UnsupportedOperationError("Catalog queries are not supported");
    }

    getColumns(): never {
        throw new UnsupportedOperationError("Catalog queries are not supported");
    }

    getSchemas(): never {
        throw new UnsupportedOperationError("Catalog queries are not supported");
    }

    getCatalogs(): never {
        throw new UnsupportedOperationError("Catalog queries are not supported");
    }

    getPrimaryKeys(): never {
        throw new UnsupportedOperationError("Catalog queries are not supported");
    }

    getProcedures(): never {
        throw new UnsupportedOperationError("Catalog queries are not supported");
    }
}
