import { ResultDecodeError } from "../../errors.js";

export type Value = Obj | Array<Value> | string | number | true | false | null;
export type Obj = {[key: string]: Value | undefined};

export type ObjectFun<T> = (obj: Obj) => T;

export function string(value: Value | undefined): string {
    if (typeof value === "string") {
        return value;
    }
    throw typeError(value, "string");
}

export function numberOpt(value: Value | undefined): number | undefined {
    if (value === null || value === undefined) {
        return undefined;
    } else if (typeof value === "number") {
        return value;
    }
    throw typeError(value, "number or null");
}

export function integerOpt(value: Value | undefined): number | undefined {
    const num = numberOpt(value);
    if (num !== undefined && !Number.isInteger(num)) {
        throw new ResultDecodeError(`Expected integer, received ${num}`);
    }
    return num;
}

export function array(value: Value | undefined): Array<Value> {
    if (Array.isArray(value)) {
        return value;
    }
    throw typeError(value, "array");
}

export function object(value: Value | undefined): Obj {
    if (value !== null && typeof value === "object" && !Array.isArray(value)) {
        return value;
    }
    throw typeError(value, "object");
}

export function objectOpt(value: Value | undefined): Obj | undefined {
    if (value === null || value === undefined) {
        return undefined;
    }
    return object(value);
}

export function arrayObjectsMap<T>(value: Value | undefined, fun: ObjectFun<T>): Array<T> {
    return array(value).map((elemValue) => fun(object(elemValue)));
}

function typeError(value: Value | undefined, expected: string): Error {
    if (value === undefined) {
        return new ResultDecodeError(`Expected ${expected}, but the property was missing`);
    }

    let received: string = typeof value;
    if (value === null) {
        received = "null";
    } else if (Array.isArray(value)) {
        received = "array";
    }
    return new ResultDecodeError(`Expected ${expected}, received ${received}`);
}

/** Parses `text` as JSON and reads the top-level object with `fun`. A top-level `null` reads as `undefined`. */
export function readJsonObjectOpt<T>(text: string, fun: ObjectFun<T>): T | undefined {
    const value = parseJson(text);
    if (value === null) {
        return undefined;
    }
    return fun(object(value));
}

function parseJson(text: string): Value {
    try {
        return JSON.parse(text);
    } catch (e) {
        throw new ResultDecodeError(`Response body is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
}
