import { ResultDecodeError } from "../errors.js";
import * as d from "../encoding/json/decode.js";
import type { Logger } from "../logger.js";
import { logger as defaultLogger } from "../logger.js";
import type * as proto from "../proto.js";
import { emptyWireResult } from "../proto.js";

/** Decodes a response body into a {@link proto.WireResult}, throwing {@link ResultDecodeError} if the body is
 * not a tabular JSON result. A body of `null` decodes to an empty result. */
export function decodeWireResult(body: string): proto.WireResult {
    return d.readJsonObjectOpt(body, WireResultBody) ?? emptyWireResult();
}

/** Like {@link decodeWireResult}, but a body without tabular data (empty, not JSON, or of another shape)
 * decodes to an empty result. Used for statements that are not expected to return rows. */
export function decodeWireResultOrEmpty(body: string, logger: Logger = defaultLogger): proto.WireResult {
    if (body.trim() === "") {
        return emptyWireResult();
    }
    try {
        return decodeWireResult(body);
    } catch (e) {
        if (!(e instanceof ResultDecodeError)) {
            throw e;
        }
        logger.debug("Response carries no tabular result", { reason: e.message });
        return emptyWireResult();
    }
}

export function WireResultBody(obj: d.Obj): proto.WireResult {
    const columns = d.arrayObjectsMap(obj["meta"], ColumnMeta);
    const rows = d.array(obj["data"]).map((rowValue, rowIdx) => Row(rowValue, rowIdx, columns.length));
    const rowCount = d.integerOpt(obj["rows"]) ?? rows.length;
    const statsObj = d.objectOpt(obj["statistics"]);
    const stats = statsObj !== undefined
        ? WireStats(statsObj)
        : {elapsedSeconds: 0, rowsRead: 0, bytesRead: 0};
    return {columns, rows, rowCount, stats};
}

function ColumnMeta(obj: d.Obj): proto.ColumnMeta {
    const name = d.string(obj["name"]);
    const wireType = d.string(obj["type"]);
    return {name, wireType};
}

function WireStats(obj: d.Obj): proto.WireStats {
    const elapsedSeconds = d.numberOpt(obj["elapsed"]) ?? 0;
    const rowsRead = d.integerOpt(obj["rows_read"]) ?? 0;
    const bytesRead = d.integerOpt(obj["bytes_read"]) ?? 0;
    return {elapsedSeconds, rowsRead, bytesRead};
}

function Row(value: d.Value, rowIdx: number, columnCount: number): Array<proto.WireValue> {
    const cells = d.array(value);
    if (cells.length !== columnCount) {
        throw new ResultDecodeError(
            `Row ${rowIdx} has ${cells.length} values, but the result has ${columnCount} columns`,
        );
    }
    return cells.map(WireValue);
}

function WireValue(value: d.Value): proto.WireValue {
    if (value === null || typeof value === "boolean" || typeof value === "number" || typeof value === "string") {
        return value;
    }
    return JSON.stringify(value);
}
