export { fetch, Request, Headers } from "cross-fetch";

export type { ClientConfig, ConnectionOptions, PropertyInfo } from "./config.js";
export {
    DEFAULT_MAX_RESULT_ROWS, DEFAULT_TIMEOUT_SECONDS, MAX_TIMEOUT_MS, getPropertyInfo, resolveConfig,
} from "./config.js";
export type { TransactionIsolation } from "./connection.js";
export { Connection } from "./connection.js";
export type { Coerced, IntegerBits, ObjectValue } from "./convert.js";
export {
    DatabaseMetaData, DRIVER_MAJOR_VERSION, DRIVER_MINOR_VERSION, DRIVER_NAME, DRIVER_VERSION,
    PRODUCT_NAME, PRODUCT_VERSION,
} from "./database_metadata.js";
export type { ConnectionDescriptor } from "./descriptor.js";
export { DEFAULT_HOST, DEFAULT_PORT, DESCRIPTOR_PREFIX, acceptsDescriptor, parseDescriptor } from "./descriptor.js";
export type { ConnectOptions } from "./driver.js";
export { Driver, DriverRegistry, connect } from "./driver.js";
export * from "./errors.js";
export type { FetchFunction, FetchInit, RequestOptions } from "./http/client.js";
export type { LogContext, Logger, LogLevel } from "./logger.js";
export { LOG_LEVELS, createLogger } from "./logger.js";
export type { ColumnMeta, WireResult, WireStats, WireValue } from "./proto.js";
export type { ColumnRef } from "./result_set.js";
export { ResultSet } from "./result_set.js";
export type { ColumnNullability } from "./result_set_metadata.js";
export { ResultSetMetaData } from "./result_set_metadata.js";
export { buildFinalSql, isQueryText } from "./sql.js";
export { PreparedStatement, Statement } from "./statement.js";
export type { TypeFamily } from "./types.js";
export { SqlType } from "./types.js";
export type { InValue, ParamValue } from "./value.js";
export { DecimalText, SqlTime } from "./value.js";
