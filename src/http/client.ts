import { Agent as HttpAgent } from "node:http";
import { Agent as HttpsAgent } from "node:https";

import { fetch as crossFetch, Headers } from "cross-fetch";
import { Base64 } from "js-base64";

import type { ClientConfig } from "../config.js";
import type { ConnectionDescriptor } from "../descriptor.js";
import { baseUrlOf } from "../descriptor.js";
import {
    ClientError, ConnectionClosedError, ConnectionUnavailableError,
    RemoteExecutionError, TransportError,
} from "../errors.js";
import type { Logger } from "../logger.js";
import type * as proto from "../proto.js";

import { decodeWireResult, decodeWireResultOrEmpty } from "./json_decode.js";

/** Options passed to the fetch function. `agent` is honoured by the Node implementation of `cross-fetch`. */
export interface FetchInit extends RequestInit {
    agent?: HttpAgent;
}

/** Signature of the function used to send requests. Any `fetch` implementation fits. */
export type FetchFunction = (url: string, init: FetchInit) => Promise<Response>;

/** Per-call settings that override the connection configuration. */
export interface RequestOptions {
    /** Bound on the exchange, in milliseconds. */
    timeoutMs?: number;
    /** Cap on the number of rows the server returns. */
    maxResultRows?: number;
}

/** The HTTP side of a connection: sends SQL text to the query endpoint and decodes the responses.
 *
 * Every call performs exactly one exchange, bounded by the configured timeout, and is never retried.
 */
export class HttpTransport {
    #baseUrl: string;
    #maxResultRows: number;
    #authHeader: string | undefined;
    #timeoutMs: number;
    #fetch: FetchFunction;
    #agent: HttpAgent;
    #logger: Logger;
    #closed: boolean;

    /** @private */
    constructor(descriptor: ConnectionDescriptor, config: ClientConfig, logger: Logger, customFetch?: FetchFunction) {
        this.#baseUrl = baseUrlOf(descriptor, config.ssl);
        this.#maxResultRows = config.maxResultRows;
        if (config.user !== undefined && config.password !== undefined) {
            this.#authHeader = `Basic ${Base64.encode(`${config.user}:${config.password}`)}`;
        }
        this.#timeoutMs = config.timeoutMs;
        this.#fetch = customFetch ?? crossFetch;
        this.#agent = config.ssl ? new HttpsAgent({ keepAlive: true }) : new HttpAgent({ keepAlive: true });
        this.#logger = logger;
        this.#closed = false;

        this.#logger.debug("HTTP transport initialized", { baseUrl: this.#baseUrl });
    }

    /** URL that the probe is sent to and that queries are posted to. */
    get baseUrl(): string {
        return this.#baseUrl;
    }

    /** Checks that the server answers with a success status. */
    async probe(): Promise<void> {
        const response = await this.#send(this.#baseUrl, { method: "GET" });
        await this.#readBody(response);
        if (!response.ok) {
            throw new ConnectionUnavailableError(`Connection test failed: HTTP ${response.status}`, response.status);
        }
    }

    /** Executes a statement that returns rows. */
    async executeQuery(sql: string, options: RequestOptions = {}): Promise<proto.WireResult> {
        this.#logger.debug("Executing query", { sql });
        const body = await this.#post(sql, "Query", options);
        try {
            return decodeWireResult(body);
        } catch (e) {
            this.#logger.error("Failed to parse query result", { error: e });
            throw e;
        }
    }

    /** Executes a statement that does not return rows. Always resolves to 0, because the server does not
     * report the number of affected rows. */
    async executeUpdate(sql: string, options: RequestOptions = {}): Promise<number> {
        this.#logger.debug("Executing update", { sql });
        const body = await this.#post(sql, "Update", options);
        decodeWireResultOrEmpty(body, this.#logger);
        return 0;
    }

    /** Release the pooled sockets. Closing again does nothing. */
    close(): void {
        if (this.#closed) {
            return;
        }
        this.#closed = true;
        this.#agent.destroy();
        this.#logger.debug("HTTP transport closed", { baseUrl: this.#baseUrl });
    }

    /** True if the transport is closed. */
    get closed(): boolean {
        return this.#closed;
    }

    /** URL that SQL text is posted to, with the query options that select the tabular JSON format. */
    queryUrl(maxResultRows: number = this.#maxResultRows): string {
        return `${this.#baseUrl}?add_http_cors_header=1&default_format=JSONCompact&max_result_rows=${maxResultRows}`;
    }

    async #post(sql: string, what: string, options: RequestOptions): Promise<string> {
        const response = await this.#send(this.queryUrl(options.maxResultRows), {
            method: "POST",
            headers: { "Content-Type": "text/plain" },
            body: sql,
        }, options.timeoutMs);
        const body = await this.#readBody(response);
        if (!response.ok) {
            const message = `${what} failed: HTTP ${response.status} - ${body}`;
            this.#logger.error(message);
            throw new RemoteExecutionError(message, response.status, body);
        }
        return body;
    }

    async #send(url: string, init: FetchInit, timeoutMs: number = this.#timeoutMs): Promise<Response> {
        if (this.#closed) {
            throw new ConnectionClosedError("Connection is closed");
        }

        const headers = new Headers(init.headers);
        if (this.#authHeader !== undefined) {
            headers.set("Authorization", this.#authHeader);
        }

        try {
            return await this.#fetch(url, {
                ...init,
                headers,
                agent: this.#agent,
                signal: AbortSignal.timeout(timeoutMs),
            });
        } catch (e) {
            throw this.#transportError(e, timeoutMs);
        }
    }

    async #readBody(response: Response): Promise<string> {
        try {
            return await response.text();
        } catch (e) {
            throw this.#transportError(e, this.#timeoutMs);
        }
    }

    #transportError(e: unknown, timeoutMs: number): Error {
        if (e instanceof ClientError) {
            return e;
        }
        const timedOut = e instanceof Error && (e.name === "AbortError" || e.name === "TimeoutError");
        const message = timedOut
            ? `Request to ${this.#baseUrl} timed out after ${timeoutMs} ms`
            : `Network error while talking to ${this.#baseUrl}`;
        this.#logger.error(message, { error: e });
        return new TransportError(message, e);
    }
}
