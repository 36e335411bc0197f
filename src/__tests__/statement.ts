import * as fqe from "..";
import { FakeServer } from "./helpers/fake_server.js";

const queryUrl = "http://db.test:8123/?add_http_cors_header=1&default_format=JSONCompact&max_result_rows=10000";

function withConnection(f: (conn: fqe.Connection, server: FakeServer) => Promise<void>): () => Promise<void> {
    return async () => {
        const server = new FakeServer();
        const conn = await fqe.connect("fqe://db.test:8123?logLevel=silent", {}, { fetch: server.fetch });
        try {
            await f(conn, server);
        } finally {
            conn.close();
        }
    };
}

describe("Statement", () => {
    test("executeQuery() posts the SQL text and reads the rows", withConnection(async (conn, server) => {
        server.replyRows([["msg", "VARCHAR"]], [["hi"]]);
        const stmt = conn.createStatement();
        const rs = await stmt.executeQuery("SELECT 'hi' as msg");

        expect(server.posts.length).toStrictEqual(1);
        const request = server.posts[0];
        expect(request.url).toStrictEqual(queryUrl);
        expect(request.body).toStrictEqual("SELECT 'hi' as msg");
        expect(request.headers.get("content-type")).toStrictEqual("text/plain");

        expect(rs.next()).toStrictEqual(true);
        expect(rs.getString("msg")).toStrictEqual("hi");
        expect(rs.next()).toStrictEqual(false);
        expect(rs.getStatement()).toBe(stmt);
        expect(stmt.getResultSet()).toBe(rs);
        expect(stmt.getUpdateCount()).toStrictEqual(-1);
    }));

    test("executeUpdate() resolves to 0", withConnection(async (conn, server) => {
        server.reply("");
        const stmt = conn.createStatement();
        expect(await stmt.executeUpdate("CREATE TABLE t (x INTEGER)")).toStrictEqual(0);
        expect(stmt.getUpdateCount()).toStrictEqual(0);
        expect(stmt.getResultSet()).toStrictEqual(undefined);
        expect(server.posts[0].body).toStrictEqual("CREATE TABLE t (x INTEGER)");
    }));

    test("executeUpdate() accepts a tabular or a plain text answer", withConnection(async (conn, server) => {
        server.replyRows([["Count", "BIGINT"]], [[3]]).reply("Ok.\n");
        const stmt = conn.createStatement();
        expect(await stmt.executeUpdate("INSERT INTO t VALUES (1), (2), (3)")).toStrictEqual(0);
        expect(await stmt.executeUpdate("DROP TABLE t")).toStrictEqual(0);
    }));

    test("execute() routes by the leading keyword", withConnection(async (conn, server) => {
        server.replyRows([["x", "INTEGER"]], [[1]]).reply("");
        const stmt = conn.createStatement();

        expect(await stmt.execute("  select 1 as x")).toStrictEqual(true);
        expect(stmt.getResultSet()?.next()).toStrictEqual(true);
        expect(stmt.getUpdateCount()).toStrictEqual(-1);

        expect(await stmt.execute("DROP TABLE t")).toStrictEqual(false);
        expect(stmt.getResultSet()).toStrictEqual(undefined);
        expect(stmt.getUpdateCount()).toStrictEqual(0);
    }));

    test("empty SQL is rejected before anything is sent", withConnection(async (conn, server) => {
        const stmt = conn.createStatement();
        await expect(stmt.executeQuery("  ")).rejects.toThrow(fqe.MisuseError);
        await expect(stmt.execute("")).rejects.toThrow("SQL text must not be empty");
        expect(server.posts.length).toStrictEqual(0);
    }));

    test("server error", withConnection(async (conn, server) => {
        server.reply("Catalog Error: Table with name t does not exist!", 500);
        const stmt = conn.createStatement();
        const promise = stmt.executeQuery("SELECT * FROM t");
        await expect(promise).rejects.toThrow(fqe.RemoteExecutionError);
        await expect(promise).rejects.toThrow("Query failed: HTTP 500 - Catalog Error: Table with name t does not exist!");
    }));

    test("update error", withConnection(async (conn, server) => {
        server.reply("Parser Error", 400);
        const stmt = conn.createStatement();
        await expect(stmt.executeUpdate("CREAT TABLE t")).rejects.toThrow("Update failed: HTTP 400 - Parser Error");
    }));

    test("query answered with something that is not a table", withConnection(async (conn, server) => {
        server.reply("Ok.\n");
        const stmt = conn.createStatement();
        await expect(stmt.executeQuery("SELECT 1")).rejects.toThrow(fqe.ResultDecodeError);
    }));

    test("failed query keeps the previous result", withConnection(async (conn, server) => {
        server.replyRows([["x", "INTEGER"]], [[1]]).reply("boom", 500);
        const stmt = conn.createStatement();
        const rs = await stmt.executeQuery("SELECT 1 AS x");
        await expect(stmt.executeQuery("SELECT nope")).rejects.toThrow(fqe.RemoteExecutionError);
        expect(stmt.getResultSet()).toBe(rs);
        expect(rs.isClosed()).toStrictEqual(false);
    }));

    test("network failure", withConnection(async (conn, server) => {
        server.failNetwork();
        const stmt = conn.createStatement();
        await expect(stmt.executeQuery("SELECT 1")).rejects
            .toThrow("Network error while talking to http://db.test:8123/: fetch failed");
    }));

    test("max rows and query timeout apply to each request", withConnection(async (conn, server) => {
        server.replyRows([["x", "INTEGER"]], [[1]]).hang();
        const stmt = conn.createStatement();
        stmt.setMaxRows(5);
        expect(stmt.getMaxRows()).toStrictEqual(5);
        await stmt.executeQuery("SELECT 1 AS x");
        expect(server.posts[0].url)
            .toStrictEqual("http://db.test:8123/?add_http_cors_header=1&default_format=JSONCompact&max_result_rows=5");

        stmt.setQueryTimeout(0.05);
        await expect(stmt.executeQuery("SELECT 2")).rejects
            .toThrow("Request to http://db.test:8123/ timed out after 50 ms");
    }));

    test("a null response body is an empty result", withConnection(async (conn, server) => {
        server.reply("null");
        const rs = await conn.createStatement().executeQuery("DESCRIBE t");
        expect(rs.getMetaData().getColumnCount()).toStrictEqual(0);
        expect(rs.next()).toStrictEqual(false);
    }));

    test("invalid limits", withConnection(async (conn) => {
        const stmt = conn.createStatement();
        expect(() => stmt.setMaxRows(-1)).toThrow(fqe.MisuseError);
        expect(() => stmt.setMaxRows(2.5)).toThrow(fqe.MisuseError);
        expect(() => stmt.setQueryTimeout(-1)).toThrow(fqe.MisuseError);
        expect(() => stmt.setQueryTimeout(Infinity)).toThrow(fqe.MisuseError);
    }));

    test("query timeout must fit a timer", withConnection(async (conn) => {
        const stmt = conn.createStatement();
        expect(() => stmt.setQueryTimeout(0.0001))
            .toThrow("Query timeout must be between 0.001 and 2147483.647 seconds, got 0.0001");
        expect(() => stmt.setQueryTimeout(2200000)).toThrow(fqe.MisuseError);
        expect(() => stmt.setQueryTimeout(5000000)).toThrow(fqe.MisuseError);
        expect(stmt.getQueryTimeout()).toStrictEqual(0);

        stmt.setQueryTimeout(2147483);
        expect(stmt.getQueryTimeout()).toStrictEqual(2147483);
        stmt.setQueryTimeout(0);
        expect(stmt.getQueryTimeout()).toStrictEqual(0);
    }));

    test("getMoreResults() closes the current result set", withConnection(async (conn, server) => {
        server.replyRows([["x", "INTEGER"]], [[1]]);
        const stmt = conn.createStatement();
        const rs = await stmt.executeQuery("SELECT 1 AS x");
        expect(stmt.getMoreResults()).toStrictEqual(false);
        expect(rs.isClosed()).toStrictEqual(true);
        expect(stmt.getResultSet()).toStrictEqual(undefined);
        expect(stmt.getUpdateCount()).toStrictEqual(-1);
    }));

    test("close() closes the current result set", withConnection(async (conn, server) => {
        server.replyRows([["x", "INTEGER"]], [[1]]);
        const stmt = conn.createStatement();
        const rs = await stmt.executeQuery("SELECT 1 AS x");
        stmt.close();
        stmt.close();
        expect(stmt.isClosed()).toStrictEqual(true);
        expect(rs.isClosed()).toStrictEqual(true);
        await expect(stmt.executeQuery("SELECT 1")).rejects.toThrow(fqe.StatementClosedError);
        expect(() => stmt.getUpdateCount()).toThrow("Statement is closed");
    }));

    test("unsupported operations", withConnection(async (conn) => {
        const stmt = conn.createStatement();
        expect(() => stmt.addBatch("SELECT 1")).toThrow(fqe.UnsupportedOperationError);
        expect(() => stmt.executeBatch()).toThrow(fqe.UnsupportedOperationError);
        expect(() => stmt.cancel()).toThrow(fqe.UnsupportedOperationError);
        expect(stmt.getConnection()).toBe(conn);
    }));
});

describe("PreparedStatement", () => {
    test("binds parameters as literals", withConnection(async (conn, server) => {
        server.reply("");
        const stmt = conn.prepareStatement("INSERT INTO people VALUES (?, ?, ?, ?, ?)");
        stmt.setInt(1, 7);
        stmt.setString(2, "O'Brien");
        stmt.setBoolean(3, true);
        stmt.setNull(4);
        stmt.setDate(5, new Date(Date.UTC(1990, 4, 17)));

        expect(stmt.buildFinalSql()).toStrictEqual("INSERT INTO people VALUES (7, 'O''Brien', true, NULL, '1990-05-17')");
        expect(await stmt.executeUpdate()).toStrictEqual(0);
        expect(server.posts[0].body).toStrictEqual("INSERT INTO people VALUES (7, 'O''Brien', true, NULL, '1990-05-17')");
    }));

    test("other setters", withConnection(async (conn) => {
        const stmt = conn.prepareStatement("SELECT ?, ?, ?, ?, ?, ?");
        stmt.setLong(1, 9007199254740993n);
        stmt.setDouble(2, 0.5);
        stmt.setBigDecimal(3, "10.25");
        stmt.setTime(4, new fqe.SqlTime(9, 0, 5));
        stmt.setTimestamp(5, new Date(Date.UTC(2024, 1, 29, 12, 0, 0, 250)));
        stmt.setObject(6, "x?");
        expect(stmt.buildFinalSql())
            .toStrictEqual("SELECT 9007199254740993, 0.5, 10.25, '09:00:05', '2024-02-29 12:00:00.250', 'x?'");
    }));

    test("setObject() picks the literal from the value", withConnection(async (conn) => {
        const stmt = conn.prepareStatement("SELECT ?, ?, ?, ?");
        stmt.setObject(1, null);
        stmt.setObject(2, 42);
        stmt.setObject(3, new Date(Date.UTC(2024, 0, 1)));
        stmt.setObject(4, new fqe.DecimalText("1.0"));
        expect(stmt.buildFinalSql()).toStrictEqual("SELECT NULL, 42, '2024-01-01 00:00:00.000', 1.0");
    }));

    test("unbound parameters stop the substitution", withConnection(async (conn) => {
        const stmt = conn.prepareStatement("SELECT ?, ?, ?");
        stmt.setInt(1, 1);
        stmt.setInt(3, 3);
        expect(stmt.buildFinalSql()).toStrictEqual("SELECT 1, ?, ?");
    }));

    test("rebinding and clearing", withConnection(async (conn) => {
        const stmt = conn.prepareStatement("SELECT ?");
        stmt.setInt(1, 1);
        stmt.setInt(1, 2);
        expect(stmt.buildFinalSql()).toStrictEqual("SELECT 2");
        stmt.clearParameters();
        expect(stmt.buildFinalSql()).toStrictEqual("SELECT ?");
    }));

    test("narrow integer and float setters", withConnection(async (conn) => {
        const stmt = conn.prepareStatement("SELECT ?, ?, ?");
        stmt.setByte(1, -128);
        stmt.setShort(2, 32767);
        stmt.setFloat(3, 0.1);
        expect(stmt.buildFinalSql()).toStrictEqual("SELECT -128, 32767, 0.1");

        expect(() => stmt.setByte(1, 128)).toThrow("Parameter 1 must be a 8-bit integer, got 128");
        expect(() => stmt.setShort(2, -32769)).toThrow(fqe.MisuseError);
        expect(() => stmt.setShort(2, 1.5)).toThrow(fqe.MisuseError);
        expect(() => stmt.setFloat(3, Infinity)).toThrow(fqe.MisuseError);
    }));

    test("invalid bindings", withConnection(async (conn) => {
        const stmt = conn.prepareStatement("SELECT ?");
        expect(() => stmt.setInt(0, 1)).toThrow("Invalid parameter index: 0");
        expect(() => stmt.setInt(1.5, 1)).toThrow(fqe.MisuseError);
        expect(() => stmt.setInt(1, 1.5)).toThrow(fqe.MisuseError);
        expect(() => stmt.setDouble(1, NaN)).toThrow(fqe.MisuseError);
        expect(() => stmt.setDate(1, new Date(NaN))).toThrow(fqe.MisuseError);
        expect(() => stmt.setBigDecimal(1, "ten")).toThrow(fqe.MisuseError);
    }));

    test("executeQuery() without arguments runs the bound text", withConnection(async (conn, server) => {
        server.replyRows([["name", "VARCHAR"]], [["alice"]]);
        const stmt = conn.prepareStatement("SELECT name FROM people WHERE id = ?");
        stmt.setInt(1, 1);
        const rs = await stmt.executeQuery();
        expect(server.posts[0].body).toStrictEqual("SELECT name FROM people WHERE id = 1");
        expect(rs.next()).toStrictEqual(true);
        expect(rs.getString(1)).toStrictEqual("alice");
    }));

    test("execute() classifies the bound text", withConnection(async (conn, server) => {
        server.replyRows([["x", "INTEGER"]], [[5]]);
        const stmt = conn.prepareStatement("SELECT ? AS x");
        stmt.setInt(1, 5);
        expect(await stmt.execute()).toStrictEqual(true);
        expect(stmt.getResultSet()?.getMetaData().getColumnName(1)).toStrictEqual("x");
    }));

    test("explicit SQL text bypasses the bound parameters", withConnection(async (conn, server) => {
        server.reply("");
        const stmt = conn.prepareStatement("DELETE FROM t WHERE id = ?");
        stmt.setInt(1, 1);
        await stmt.executeUpdate("DELETE FROM t");
        expect(server.posts[0].body).toStrictEqual("DELETE FROM t");
    }));
});
