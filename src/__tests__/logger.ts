import { createLogger, defaultLogLevel, formatEntry, isLogLevel } from "../logger.js";

describe("formatEntry()", () => {
    test("message without context", () => {
        expect(formatEntry("info", "Connected")).toStrictEqual("[fqe-client] INFO  Connected");
        expect(formatEntry("error", "Failed", {})).toStrictEqual("[fqe-client] ERROR Failed");
    });

    test("message with context", () => {
        expect(formatEntry("debug", "Executing query", { sql: "SELECT 1" }))
            .toStrictEqual('[fqe-client] DEBUG Executing query {"sql":"SELECT 1"}');
    });

    test("sensitive keys are redacted", () => {
        expect(formatEntry("warn", "Auth", { password: "test-secret", authToken: "test-token", user: "alice" }))
            .toStrictEqual('[fqe-client] WARN  Auth {"password":"[REDACTED]","authToken":"[REDACTED]","user":"alice"}');
    });

    test("passwords inside text are redacted", () => {
        expect(formatEntry("warn", "Bad descriptor fqe://h?password=test-secret&user=alice"))
            .toStrictEqual("[fqe-client] WARN  Bad descriptor fqe://h?password=[REDACTED]&user=alice");
        expect(formatEntry("info", "Sent", { header: "Authorization: Basic dGVzdDp0ZXN0" }))
            .toStrictEqual('[fqe-client] INFO  Sent {"header":"Authorization:[REDACTED]"}');
    });

    test("errors and bigints in context", () => {
        expect(formatEntry("error", "Failed", { error: new Error("boom"), rows: 5n }))
            .toStrictEqual('[fqe-client] ERROR Failed {"error":"boom","rows":"5"}');
    });
});

describe("createLogger()", () => {
    test("drops entries below the level", () => {
        const lines: Array<string> = [];
        const logger = createLogger("warn", (line) => lines.push(line));
        logger.debug("a");
        logger.info("b");
        logger.warn("c");
        logger.error("d");
        expect(lines).toStrictEqual(["[fqe-client] WARN  c", "[fqe-client] ERROR d"]);
        expect(logger.level).toStrictEqual("warn");
    });

    test("silent drops everything", () => {
        const lines: Array<string> = [];
        const logger = createLogger("silent", (line) => lines.push(line));
        logger.error("d");
        expect(lines).toStrictEqual([]);
    });

    test("debug keeps everything", () => {
        const lines: Array<string> = [];
        const logger = createLogger("debug", (line) => lines.push(line));
        logger.debug("a");
        logger.info("b");
        expect(lines).toStrictEqual(["[fqe-client] DEBUG a", "[fqe-client] INFO  b"]);
    });
});

describe("defaultLogLevel()", () => {
    const saved = process.env["FQE_LOG_LEVEL"];
    afterEach(() => {
        if (saved === undefined) {
            delete process.env["FQE_LOG_LEVEL"];
        } else {
            process.env["FQE_LOG_LEVEL"] = saved;
        }
    });

    test("reads the environment", () => {
        process.env["FQE_LOG_LEVEL"] = "DEBUG";
        expect(defaultLogLevel()).toStrictEqual("debug");
    });

    test("falls back to warn", () => {
        delete process.env["FQE_LOG_LEVEL"];
        expect(defaultLogLevel()).toStrictEqual("warn");
        process.env["FQE_LOG_LEVEL"] = "chatty";
        expect(defaultLogLevel()).toStrictEqual("warn");
    });
});

test("isLogLevel()", () => {
    expect(isLogLevel("info")).toStrictEqual(true);
    expect(isLogLevel("silent")).toStrictEqual(true);
    expect(isLogLevel("INFO")).toStrictEqual(false);
    expect(isLogLevel("trace")).toStrictEqual(false);
});
