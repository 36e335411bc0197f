// Types for the tabular JSON format returned by the query endpoint (`default_format=JSONCompact`).
//
// A response body looks like this:
//
//     {
//         "meta": [{"name": "msg", "type": "VARCHAR"}],
//         "data": [["hi"]],
//         "rows": 1,
//         "statistics": {"elapsed": 0.001, "rows_read": 1, "bytes_read": 2}
//     }

/** A single cell as it appears in `data`. Nested values (lists, structs, maps) are kept as JSON text. */
export type WireValue = null | boolean | number | string;

export type ColumnMeta = {
    name: string,
    /** Type name reported by the server, possibly wrapped as `NULLABLE(<inner>)`. */
    wireType: string,
}

export type WireStats = {
    elapsedSeconds: number,
    rowsRead: number,
    bytesRead: number,
}

export type WireResult = {
    columns: Array<ColumnMeta>,
    /** Row-major cells. Every row has exactly `columns.length` cells. */
    rows: Array<Array<WireValue>>,
    /** Row count reported by the server. Advisory only, `rows.length` is authoritative. */
    rowCount: number,
    stats: WireStats,
}

export function emptyWireResult(): WireResult {
    return {
        columns: [],
        rows: [],
        rowCount: 0,
        stats: { elapsedSeconds: 0, rowsRead: 0, bytesRead: 0 },
    };
}
