import { DescriptorParseError } from "./errors.js";

/** Scheme prefix that every connection descriptor starts with. */
export const DESCRIPTOR_PREFIX = "fqe://";
/** Host used when the descriptor does not name one. */
export const DEFAULT_HOST = "localhost";
/** Port used when the descriptor has no port or the port is not a number. */
export const DEFAULT_PORT = 8080;

/** Result of parsing a connection descriptor using {@link parseDescriptor}. */
export interface ConnectionDescriptor {
    readonly host: string;
    readonly port: number;
    /** Everything after the first `/` and before the `?`, without the leading slash. May be empty. */
    readonly path: string;
    /** Query string options in the order they appear. A repeated key keeps its last value. */
    readonly options: ReadonlyMap<string, string>;
}

/** True if `raw` looks like a descriptor this client can parse. */
export function acceptsDescriptor(raw: string | undefined | null): boolean {
    return typeof raw === "string" && raw.startsWith(DESCRIPTOR_PREFIX);
}

/** Parses a descriptor of the form `fqe://host[:port][/path][?key=value[&key=value...]]`.
 *
 * Only the prefix is validated. A missing host becomes {@link DEFAULT_HOST}, and a port that is missing or
 * not a decimal number becomes {@link DEFAULT_PORT}. Option pairs without `=` are ignored.
 */
export function parseDescriptor(raw: string): ConnectionDescriptor {
    if (!acceptsDescriptor(raw)) {
        throw new DescriptorParseError(
            `Invalid connection descriptor ${JSON.stringify(raw)}, expected it to start with ` +
                JSON.stringify(DESCRIPTOR_PREFIX),
        );
    }

    const rest = raw.substring(DESCRIPTOR_PREFIX.length);
    const [location, query] = splitOnce(rest, "?");
    const [hostPort, path] = splitOnce(location, "/");
    const [hostText, portText] = splitOnce(hostPort, ":");

    const host = hostText !== "" ? hostText : DEFAULT_HOST;
    const port = portText !== undefined ? parsePort(portText) : DEFAULT_PORT;

    const options = new Map<string, string>();
    if (query !== undefined) {
        for (const pair of query.split("&")) {
            const [key, value] = splitOnce(pair, "=");
            if (value !== undefined) {
                options.set(key, value);
            }
        }
    }

    return Object.freeze({ host, port, path: path ?? "", options });
}

/** The HTTP(S) URL that requests for this descriptor are sent to. Always ends with a slash. */
export function baseUrlOf(descriptor: ConnectionDescriptor, ssl: boolean): string {
    const scheme = ssl ? "https" : "http";
    return `${scheme}://${descriptor.host}:${descriptor.port}/`;
}

function parsePort(text: string): number {
    if (!/^[0-9]{1,5}$/.test(text)) {
        return DEFAULT_PORT;
    }
    return parseInt(text, 10);
}

function splitOnce(text: string, separator: string): [string, string | undefined] {
    const pos = text.indexOf(separator);
    if (pos < 0) {
        return [text, undefined];
    }
    return [text.substring(0, pos), text.substring(pos + separator.length)];
}
