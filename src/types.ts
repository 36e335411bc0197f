// Wire type names reported in the `meta` section of a result, and what they mean for coercion and metadata.

/** Coarse classification of a wire type that decides how its cells are stored and coerced. */
export type TypeFamily =
    | "boolean"
    | "integer"
    | "float"
    | "decimal"
    | "text"
    | "date"
    | "time"
    | "timestamp"
    | "blob"
    | "other"

/** Type codes reported by {@link ResultSetMetaData.getColumnType}, in the numbering that SQL tooling
 * conventionally uses for standard types. */
export enum SqlType {
    Boolean = 16,
    TinyInt = -6,
    SmallInt = 5,
    Integer = 4,
    BigInt = -5,
    Real = 7,
    Double = 8,
    Decimal = 3,
    Varchar = 12,
    Date = 91,
    Time = 92,
    Timestamp = 93,
    Blob = 2004,
    Other = 1111,
}

const nullablePrefix = "NULLABLE(";

/** True if the type is wrapped as `NULLABLE(<inner>)`. */
export function isNullableType(wireType: string): boolean {
    const upper = wireType.trim().toUpperCase();
    return upper.startsWith(nullablePrefix) && upper.endsWith(")");
}

/** Strips a `NULLABLE(...)` wrapper and returns the inner type name in upper case. */
export function unwrapNullable(wireType: string): string {
    const upper = wireType.trim().toUpperCase();
    if (isNullableType(upper)) {
        return upper.substring(nullablePrefix.length, upper.length - 1).trim();
    }
    return upper;
}

/** Base name of a type, without parameters such as the precision of `DECIMAL(18,3)`. */
function baseName(wireType: string): string {
    const inner = unwrapNullable(wireType);
    const paren = inner.indexOf("(");
    return (paren >= 0 ? inner.substring(0, paren) : inner).trim();
}

const families: Record<string, TypeFamily> = {
    "BOOLEAN": "boolean",
    "BOOL": "boolean",
    "TINYINT": "integer",
    "SMALLINT": "integer",
    "INTEGER": "integer",
    "INT": "integer",
    "BIGINT": "integer",
    "HUGEINT": "integer",
    "UTINYINT": "integer",
    "USMALLINT": "integer",
    "UINTEGER": "integer",
    "UBIGINT": "integer",
    "REAL": "float",
    "FLOAT": "float",
    "DOUBLE": "float",
    "DECIMAL": "decimal",
    "NUMERIC": "decimal",
    "VARCHAR": "text",
    "TEXT": "text",
    "STRING": "text",
    "UUID": "text",
    "DATE": "date",
    "TIME": "time",
    "TIMESTAMP": "timestamp",
    "TIMESTAMP WITH TIME ZONE": "timestamp",
    "TIMESTAMPTZ": "timestamp",
    "DATETIME": "timestamp",
    "BLOB": "blob",
    "BYTEA": "blob",
};

export function typeFamily(wireType: string): TypeFamily {
    return families[baseName(wireType)] ?? "other";
}

const sqlTypes: Record<string, SqlType> = {
    "BOOLEAN": SqlType.Boolean,
    "TINYINT": SqlType.TinyInt,
    "SMALLINT": SqlType.SmallInt,
    "INTEGER": SqlType.Integer,
    "BIGINT": SqlType.BigInt,
    "REAL": SqlType.Real,
    "DOUBLE": SqlType.Double,
    "DECIMAL": SqlType.Decimal,
    "VARCHAR": SqlType.Varchar,
    "DATE": SqlType.Date,
    "TIME": SqlType.Time,
    "TIMESTAMP": SqlType.Timestamp,
    "BLOB": SqlType.Blob,
};

export function sqlTypeOf(wireType: string): SqlType {
    return sqlTypes[baseName(wireType)] ?? SqlType.Other;
}

const displaySizes: Record<string, number> = {
    "BOOLEAN": 5,
    "TINYINT": 4,
    "SMALLINT": 6,
    "INTEGER": 11,
    "BIGINT": 20,
    "REAL": 13,
    "DOUBLE": 22,
    "VARCHAR": 255,
    "DATE": 10,
    "TIME": 8,
    "TIMESTAMP": 19,
};

export function displaySizeOf(wireType: string): number {
    return displaySizes[baseName(wireType)] ?? 255;
}

const precisions: Record<string, number> = {
    "TINYINT": 3,
    "SMALLINT": 5,
    "INTEGER": 10,
    "BIGINT": 19,
    "REAL": 7,
    "DOUBLE": 15,
};

export function precisionOf(wireType: string): number {
    return precisions[baseName(wireType)] ?? 0;
}

const signedTypes = new Set(["TINYINT", "SMALLINT", "INTEGER", "BIGINT", "REAL", "DOUBLE", "DECIMAL"]);

export function isSignedType(wireType: string): boolean {
    return signedTypes.has(baseName(wireType));
}

/** Name of the JavaScript type that {@link ResultSet.getObject} returns for non-null cells of this type.
 * Blobs arrive as text in the JSON format, so they are reported as strings. */
export function jsTypeNameOf(wireType: string): string {
    switch (typeFamily(wireType)) {
        case "boolean":
            return "boolean";
        case "integer":
        case "float":
        case "decimal":
            return "number";
        default:
            return "string";
    }
}
