// Coercion of decoded cells to the representations requested by the typed getters of a result set.
//
// All functions here are pure. Numeric parsing of text never throws: text that does not parse yields the zero
// value of the requested type. Only a genuine null cell sets `wasNull`, so callers can tell a null apart from
// a value that failed to parse.

import type { Cell } from "./value.js";
import { DecimalText, SqlTime, decimalRegex, plainNumberText } from "./value.js";
import { impossible } from "./util.js";

export type Coerced<T> = {
    value: T,
    wasNull: boolean,
}

export type IntegerBits = 8 | 16 | 32;

/** Natural JavaScript representation of a cell, returned by {@link toObject}. */
export type ObjectValue = null | boolean | number | bigint | string | Uint8Array;

const truthyTokens = new Set(["true", "1", "yes", "on"]);
const integerRegex = /^[+-]?[0-9]+$/;

function present<T>(value: T): Coerced<T> {
    return { value, wasNull: false };
}

function absent<T>(value: T): Coerced<T> {
    return { value, wasNull: true };
}

/** Coerces to an integer of the given width. Integers that do not fit wrap around, floats are truncated
 * toward zero first. Text must be a plain integer literal that fits the width, otherwise the result is 0. */
export function toInteger(cell: Cell, bits: IntegerBits): Coerced<number> {
    if (cell.type === "null") {
        return absent(0);
    }
    if (cell.type === "text") {
        const parsed = parseIntegerText(cell.value);
        if (parsed === undefined || BigInt.asIntN(bits, parsed) !== parsed) {
            return present(0);
        }
        return present(Number(parsed));
    }
    const wide = integerOf(cell);
    return present(Number(BigInt.asIntN(bits, wide)));
}

/** Coerces to a 64-bit integer, with the same rules as {@link toInteger}. */
export function toLong(cell: Cell): Coerced<bigint> {
    if (cell.type === "null") {
        return absent(0n);
    }
    if (cell.type === "text") {
        const parsed = parseIntegerText(cell.value);
        if (parsed === undefined || BigInt.asIntN(64, parsed) !== parsed) {
            return present(0n);
        }
        return present(parsed);
    }
    return present(BigInt.asIntN(64, integerOf(cell)));
}

function integerOf(cell: Exclude<Cell, { type: "null" | "text" }>): bigint {
    switch (cell.type) {
        case "boolean":
            return cell.value ? 1n : 0n;
        case "integer":
            return cell.value;
        case "float":
            return Number.isFinite(cell.value) ? BigInt(Math.trunc(cell.value)) : 0n;
        case "bytes":
            return 0n;
        default:
            throw impossible(cell, "Impossible type of Cell");
    }
}

function parseIntegerText(text: string): bigint | undefined {
    if (!integerRegex.test(text)) {
        return undefined;
    }
    return BigInt(text);
}

/** Coerces to a float. With `single`, the result is rounded to single precision. */
export function toFloat(cell: Cell, single: boolean = false): Coerced<number> {
    const round = single ? Math.fround : (num: number) => num;
    switch (cell.type) {
        case "null":
            return absent(0);
        case "boolean":
            return present(cell.value ? 1 : 0);
        case "integer":
            return present(round(Number(cell.value)));
        case "float":
            return present(round(cell.value));
        case "text": {
            const text = cell.value.trim();
            return present(decimalRegex.test(text) ? round(Number(text)) : 0);
        }
        case "bytes":
            return present(0);
        default:
            throw impossible(cell, "Impossible type of Cell");
    }
}

/** Coerces to a boolean. Numbers are true when nonzero, text when it is one of `true`, `1`, `yes` or `on`
 * (in any case). */
export function toBoolean(cell: Cell): Coerced<boolean> {
    switch (cell.type) {
        case "null":
            return absent(false);
        case "boolean":
            return present(cell.value);
        case "integer":
            return present(cell.value !== 0n);
        case "float":
            return present(cell.value !== 0 && !Number.isNaN(cell.value));
        case "text":
            return present(truthyTokens.has(cell.value.toLowerCase()));
        case "bytes":
            return present(false);
        default:
            throw impossible(cell, "Impossible type of Cell");
    }
}

/** Coerces to text. Numbers are formatted as plain decimals, without any locale or exponent. */
export function toText(cell: Cell): Coerced<string | null> {
    switch (cell.type) {
        case "null":
            return absent(null);
        case "boolean":
            return present(cell.value ? "true" : "false");
        case "integer":
            return present(cell.value.toString());
        case "float":
            return present(plainNumberText(cell.value));
        case "text":
            return present(cell.value);
        case "bytes":
            return present(new TextDecoder().decode(cell.value));
        default:
            throw impossible(cell, "Impossible type of Cell");
    }
}

/** Coerces to an exact decimal. Text that is not a decimal literal, booleans and non-finite floats give
 * `null`. */
export function toDecimal(cell: Cell): Coerced<DecimalText | null> {
    switch (cell.type) {
        case "null":
            return absent(null);
        case "integer":
            return present(new DecimalText(cell.value.toString()));
        case "float":
            return present(Number.isFinite(cell.value) ? new DecimalText(plainNumberText(cell.value)) : null);
        case "text":
            return present(decimalRegex.test(cell.value) ? new DecimalText(cell.value) : null);
        case "boolean":
        case "bytes":
            return present(null);
        default:
            throw impossible(cell, "Impossible type of Cell");
    }
}

/** Coerces to bytes. Text is encoded as UTF-8, other values are encoded from their text form. */
export function toBytes(cell: Cell): Coerced<Uint8Array | null> {
    if (cell.type === "null") {
        return absent(null);
    } else if (cell.type === "bytes") {
        return present(cell.value);
    }
    const text = toText(cell).value ?? "";
    return present(new TextEncoder().encode(text));
}

const dateRegex = /^([0-9]{4})-([0-9]{1,2})-([0-9]{1,2})$/;
const timeRegex = /^([0-9]{1,2}):([0-9]{1,2}):([0-9]{1,2})(?:\.([0-9]{1,9}))?$/;
const timestampRegex =
    /^([0-9]{4})-([0-9]{1,2})-([0-9]{1,2})[ T]([0-9]{1,2}):([0-9]{1,2}):([0-9]{1,2})(?:\.([0-9]{1,9}))?$/;

/** Coerces `YYYY-MM-DD` text to a `Date` at midnight UTC. Anything else gives `null`. */
export function toDate(cell: Cell): Coerced<Date | null> {
    if (cell.type === "null") {
        return absent(null);
    } else if (cell.type !== "text") {
        return present(null);
    }
    const match = dateRegex.exec(cell.value.trim());
    if (match === null) {
        return present(null);
    }
    return present(utcDate(int(match[1]), int(match[2]), int(match[3]), 0, 0, 0, 0));
}

/** Coerces `HH:MM:SS[.fraction]` text to a {@link SqlTime}. Anything else gives `null`. */
export function toTime(cell: Cell): Coerced<SqlTime | null> {
    if (cell.type === "null") {
        return absent(null);
    } else if (cell.type !== "text") {
        return present(null);
    }
    const match = timeRegex.exec(cell.value.trim());
    if (match === null) {
        return present(null);
    }
    const [hours, minutes, seconds] = [int(match[1]), int(match[2]), int(match[3])];
    if (hours > 23 || minutes > 59 || seconds > 59) {
        return present(null);
    }
    return present(new SqlTime(hours, minutes, seconds, nanosOf(match[4])));
}

/** Coerces `YYYY-MM-DD HH:MM:SS[.fraction]` text (or with a `T` separator) to a `Date`, read as UTC.
 * Anything else gives `null`. */
export function toTimestamp(cell: Cell): Coerced<Date | null> {
    if (cell.type === "null") {
        return absent(null);
    } else if (cell.type !== "text") {
        return present(null);
    }
    const match = timestampRegex.exec(cell.value.trim());
    if (match === null) {
        return present(null);
    }
    const [hours, minutes, seconds] = [int(match[4]), int(match[5]), int(match[6])];
    if (hours > 23 || minutes > 59 || seconds > 59) {
        return present(null);
    }
    const millis = Math.floor(nanosOf(match[7]) / 1_000_000);
    return present(utcDate(int(match[1]), int(match[2]), int(match[3]), hours, minutes, seconds, millis));
}

/** Returns the natural JavaScript value of the cell. Integers that are not safe as a `number` are returned as
 * `bigint`. */
export function toObject(cell: Cell): Coerced<ObjectValue> {
    switch (cell.type) {
        case "null":
            return absent(null);
        case "integer": {
            const num = Number(cell.value);
            return present(Number.isSafeInteger(num) ? num : cell.value);
        }
        case "boolean":
        case "float":
        case "text":
        case "bytes":
            return present(cell.value);
        default:
            throw impossible(cell, "Impossible type of Cell");
    }
}

function utcDate(
    year: number, month: number, day: number,
    hours: number, minutes: number, seconds: number, millis: number,
): Date | null {
    const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds, millis));
    // Date.UTC silently rolls over out-of-range fields (e.g. February 30th)
    if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
        return null;
    }
    return date;
}

function int(text: string | undefined): number {
    return text === undefined ? 0 : parseInt(text, 10);
}

function nanosOf(fraction: string | undefined): number {
    if (fraction === undefined) {
        return 0;
    }
    return parseInt(fraction.padEnd(9, "0"), 10);
}
