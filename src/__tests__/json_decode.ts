import { ResultDecodeError } from "../errors.js";
import { decodeWireResult, decodeWireResultOrEmpty } from "../http/json_decode.js";
import { createLogger } from "../logger.js";

const emptyResult = {
    columns: [],
    rows: [],
    rowCount: 0,
    stats: { elapsedSeconds: 0, rowsRead: 0, bytesRead: 0 },
};

describe("decodeWireResult()", () => {
    test("full result", () => {
        const body = JSON.stringify({
            meta: [{ name: "id", type: "INTEGER" }, { name: "msg", type: "Nullable(VARCHAR)" }],
            data: [[1, "a"], [2, null]],
            rows: 2,
            statistics: { elapsed: 0.25, rows_read: 10, bytes_read: 80 },
        });
        expect(decodeWireResult(body)).toStrictEqual({
            columns: [{ name: "id", wireType: "INTEGER" }, { name: "msg", wireType: "Nullable(VARCHAR)" }],
            rows: [[1, "a"], [2, null]],
            rowCount: 2,
            stats: { elapsedSeconds: 0.25, rowsRead: 10, bytesRead: 80 },
        });
    });

    test("missing rows and statistics", () => {
        const result = decodeWireResult('{"meta": [{"name": "x", "type": "BOOLEAN"}], "data": [[true], [false]]}');
        expect(result.rowCount).toStrictEqual(2);
        expect(result.stats).toStrictEqual({ elapsedSeconds: 0, rowsRead: 0, bytesRead: 0 });
    });

    test("reported row count is kept as is", () => {
        const result = decodeWireResult('{"meta": [{"name": "x", "type": "INTEGER"}], "data": [[1]], "rows": 7}');
        expect(result.rowCount).toStrictEqual(7);
        expect(result.rows).toStrictEqual([[1]]);
    });

    test("nested values are kept as JSON text", () => {
        const result = decodeWireResult('{"meta": [{"name": "l", "type": "INTEGER[]"}], "data": [[[1, 2]], [{"a": 1}]]}');
        expect(result.rows).toStrictEqual([["[1,2]"], ['{"a":1}']]);
    });

    test("null body is an empty result", () => {
        expect(decodeWireResult("null")).toStrictEqual(emptyResult);
        expect(decodeWireResult(" null\n")).toStrictEqual(emptyResult);
    });

    test("invalid JSON", () => {
        expect(() => decodeWireResult("Ok.")).toThrow(ResultDecodeError);
        expect(() => decodeWireResult("Ok.")).toThrow(/^Response body is not valid JSON: /);
    });

    test("wrong shape", () => {
        expect(() => decodeWireResult("[]")).toThrow("Expected object, received array");
        expect(() => decodeWireResult('{"data": []}')).toThrow("Expected array, but the property was missing");
        expect(() => decodeWireResult('{"meta": [{"name": 1, "type": "INTEGER"}], "data": []}'))
            .toThrow("Expected string, received number");
    });

    test("row with the wrong number of values", () => {
        const body = '{"meta": [{"name": "a", "type": "INTEGER"}, {"name": "b", "type": "INTEGER"}], "data": [[1, 2], [3]]}';
        expect(() => decodeWireResult(body)).toThrow("Row 1 has 1 values, but the result has 2 columns");
    });
});

describe("decodeWireResultOrEmpty()", () => {
    const logger = createLogger("silent");

    test("empty body", () => {
        expect(decodeWireResultOrEmpty("", logger)).toStrictEqual(emptyResult);
        expect(decodeWireResultOrEmpty(" \n", logger)).toStrictEqual(emptyResult);
    });

    test("non-tabular body", () => {
        expect(decodeWireResultOrEmpty("Ok.\n", logger)).toStrictEqual(emptyResult);
        expect(decodeWireResultOrEmpty('{"status": "done"}', logger)).toStrictEqual(emptyResult);
    });

    test("tabular body", () => {
        const result = decodeWireResultOrEmpty('{"meta": [{"name": "x", "type": "INTEGER"}], "data": [[1]]}', logger);
        expect(result.rows).toStrictEqual([[1]]);
    });

    test("logs at debug level", () => {
        const lines: Array<string> = [];
        decodeWireResultOrEmpty("Ok.", createLogger("debug", (line) => lines.push(line)));
        expect(lines.length).toStrictEqual(1);
        expect(lines[0]).toMatch(/^\[fqe-client\] DEBUG Response carries no tabular result \{"reason":"Response body is not valid JSON: /);
    });
});
