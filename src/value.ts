import { MisuseError } from "./errors.js";
import type * as proto from "./proto.js";
import type { TypeFamily } from "./types.js";
import { impossible } from "./util.js";

/** A decoded cell. Every cell of a result is stored in this form, and the typed getters of
 * {@link ResultSet} coerce it to the requested representation. */
export type Cell =
    | { type: "null" }
    | { type: "boolean", value: boolean }
    | { type: "integer", value: bigint }
    | { type: "float", value: number }
    | { type: "text", value: string }
    | { type: "bytes", value: Uint8Array }

const nullCell: Cell = { type: "null" };

/** Builds a {@link Cell} from a wire value. The column's type family decides whether an integral JSON number
 * is stored as an integer or as a float. */
export function cellFromWire(value: proto.WireValue, family: TypeFamily): Cell {
    if (value === null) {
        return nullCell;
    } else if (typeof value === "boolean") {
        return { type: "boolean", value };
    } else if (typeof value === "number") {
        if (Number.isInteger(value) && family !== "float" && family !== "decimal") {
            return { type: "integer", value: BigInt(value) };
        }
        return { type: "float", value };
    } else if (typeof value === "string") {
        return { type: "text", value };
    } else {
        throw impossible(value, "Impossible type of WireValue");
    }
}

/** Time of day without a date, returned by {@link ResultSet.getTime} and accepted by
 * {@link PreparedStatement.setTime}. */
export class SqlTime {
    readonly hours: number;
    readonly minutes: number;
    readonly seconds: number;
    /** Fraction of the second, in nanoseconds. */
    readonly nanos: number;

    constructor(hours: number, minutes: number, seconds: number, nanos: number = 0) {
        if (!inRange(hours, 0, 23) || !inRange(minutes, 0, 59) || !inRange(seconds, 0, 59)
            || !inRange(nanos, 0, 999_999_999)) {
            throw new MisuseError(`Invalid time of day ${hours}:${minutes}:${seconds}.${nanos}`);
        }
        this.hours = hours;
        this.minutes = minutes;
        this.seconds = seconds;
        this.nanos = nanos;
    }

    /** Formats the time as `HH:MM:SS`. */
    toString(): string {
        return `${pad(this.hours, 2)}:${pad(this.minutes, 2)}:${pad(this.seconds, 2)}`;
    }
}

/** Exact decimal number kept as text, so that it is sent to the server without going through a float. */
export class DecimalText {
    readonly text: string;

    constructor(text: string) {
        const trimmed = text.trim();
        if (!decimalRegex.test(trimmed)) {
            throw new MisuseError(`Not a decimal number: ${JSON.stringify(text)}`);
        }
        this.text = trimmed;
    }

    toString(): string {
        return this.text;
    }
}

const exponentRegex = /^(-?)([0-9])(?:\.([0-9]+))?e([+-][0-9]+)$/;

/** Formats a number as plain decimal text, without the exponent that `String()` uses for very large and very
 * small magnitudes. Non-finite numbers keep their `String()` form. */
export function plainNumberText(num: number): string {
    const text = String(num);
    const match = exponentRegex.exec(text);
    if (match === null) {
        return text;
    }
    const sign = match[1] ?? "";
    const digits = (match[2] ?? "") + (match[3] ?? "");
    // Index of the decimal point within `digits`. `String()` only uses an exponent below 1e-6 or from 1e21
    // upward, so the point always falls outside the digits.
    const point = 1 + Number(match[4]);
    if (point <= 0) {
        return `${sign}0.${"0".repeat(-point)}${digits}`;
    }
    return `${sign}${digits}${"0".repeat(point - digits.length)}`;
}

export const decimalRegex = /^[+-]?(?:[0-9]+(?:\.[0-9]*)?|\.[0-9]+)(?:[eE][+-]?[0-9]+)?$/;

/** A value bound to a parameter of a {@link PreparedStatement}. The tag decides how the value is written as a
 * SQL literal. */
export type ParamValue =
    | { type: "null" }
    | { type: "boolean", value: boolean }
    | { type: "number", value: number }
    | { type: "bigint", value: bigint }
    | { type: "text", value: string }
    | { type: "decimal", value: DecimalText }
    | { type: "date", value: Date }
    | { type: "time", value: SqlTime }
    | { type: "timestamp", value: Date }

/** JavaScript values that {@link PreparedStatement.setObject} accepts. */
export type InValue =
    | null
    | undefined
    | boolean
    | number
    | bigint
    | string
    | Date
    | SqlTime
    | DecimalText

export function paramFromValue(value: InValue): ParamValue {
    if (value === null || value === undefined) {
        return { type: "null" };
    } else if (typeof value === "boolean") {
        return { type: "boolean", value };
    } else if (typeof value === "number") {
        if (!Number.isFinite(value)) {
            throw new MisuseError("Only finite numbers (not Infinity or NaN) can be passed as parameters");
        }
        return { type: "number", value };
    } else if (typeof value === "bigint") {
        return { type: "bigint", value };
    } else if (typeof value === "string") {
        return { type: "text", value };
    } else if (value instanceof Date) {
        return { type: "timestamp", value: checkDate(value) };
    } else if (value instanceof SqlTime) {
        return { type: "time", value };
    } else if (value instanceof DecimalText) {
        return { type: "decimal", value };
    } else {
        throw impossible(value, "Unsupported type of parameter value");
    }
}

export function checkDate(value: Date): Date {
    if (Number.isNaN(value.getTime())) {
        throw new MisuseError("Invalid Date cannot be passed as a parameter");
    }
    return value;
}

/** Formats the UTC date part as `YYYY-MM-DD`. */
export function formatDate(value: Date): string {
    return `${pad(value.getUTCFullYear(), 4)}-${pad(value.getUTCMonth() + 1, 2)}-${pad(value.getUTCDate(), 2)}`;
}

/** Formats a UTC timestamp as `YYYY-MM-DD HH:MM:SS.fff`. */
export function formatTimestamp(value: Date): string {
    const time = `${pad(value.getUTCHours(), 2)}:${pad(value.getUTCMinutes(), 2)}:${pad(value.getUTCSeconds(), 2)}`;
    return `${formatDate(value)} ${time}.${pad(value.getUTCMilliseconds(), 3)}`;
}

function pad(num: number, width: number): string {
    return String(num).padStart(width, "0");
}

function inRange(num: number, min: number, max: number): boolean {
    return Number.isInteger(num) && num >= min && num <= max;
}
