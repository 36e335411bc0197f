import type { ConnectionOptions, PropertyInfo } from "./config.js";
import { getPropertyInfo, resolveConfig } from "./config.js";
import type { Connection } from "./connection.js";
import { openConnection } from "./connection.js";
import {
    DRIVER_MAJOR_VERSION, DRIVER_MINOR_VERSION, DRIVER_NAME, DRIVER_VERSION,
} from "./database_metadata.js";
import { acceptsDescriptor, parseDescriptor } from "./descriptor.js";
import { DescriptorParseError } from "./errors.js";
import type { FetchFunction } from "./http/client.js";

/** Settings of {@link connect} that are not connection options. */
export interface ConnectOptions {
    /** Used in place of the `fetch` function from `cross-fetch`. */
    fetch?: FetchFunction;
}

/** Opens a connection to the server named by `descriptor`.
 *
 * Options from `overrides` take precedence over the options in the descriptor. The promise rejects with a
 * {@link DescriptorParseError} if the descriptor is not valid, and with a {@link ConnectionFailedError} if the
 * server cannot be reached or does not answer the probe with a success status.
 */
export async function connect(
    descriptor: string,
    overrides: ConnectionOptions = {},
    options: ConnectOptions = {},
): Promise<Connection> {
    const parsed = parseDescriptor(descriptor);
    const config = resolveConfig(parsed, overrides);
    return openConnection(parsed, config, options.fetch);
}

/** Entry point that tools discover connections through. Holds the client's identity and opens connections for
 * the descriptors it accepts. */
export class Driver {
    readonly name: string = DRIVER_NAME;
    readonly version: string = DRIVER_VERSION;
    readonly majorVersion: number = DRIVER_MAJOR_VERSION;
    readonly minorVersion: number = DRIVER_MINOR_VERSION;
    /** This client does not implement the full standard driver interface. */
    readonly standardCompliant: boolean = false;

    #options: ConnectOptions;

    constructor(options: ConnectOptions = {}) {
        this.#options = options;
    }

    acceptsDescriptor(descriptor: string | undefined | null): boolean {
        return acceptsDescriptor(descriptor);
    }

    /** Lists the connection options, filled in with the values from `descriptor` and `overrides`. */
    getPropertyInfo(descriptor?: string, overrides: ConnectionOptions = {}): Array<PropertyInfo> {
        const options: ConnectionOptions = {};
        if (descriptor !== undefined && acceptsDescriptor(descriptor)) {
            Object.assign(options, Object.fromEntries(parseDescriptor(descriptor).options));
        }
        Object.assign(options, overrides);
        return getPropertyInfo(options);
    }

    /** Opens a connection, or resolves to `undefined` if the descriptor is not one this driver accepts. */
    async connect(descriptor: string, overrides: ConnectionOptions = {}): Promise<Connection | undefined> {
        if (!acceptsDescriptor(descriptor)) {
            return undefined;
        }
        return connect(descriptor, overrides, this.#options);
    }
}

/** An explicitly populated list of drivers. Nothing is registered at import time. */
export class DriverRegistry {
    #drivers: Array<Driver>;

    constructor() {
        this.#drivers = [];
    }

    /** Adds a driver. Registering the same driver twice has no effect. */
    register(driver: Driver): void {
        if (!this.#drivers.includes(driver)) {
            this.#drivers.push(driver);
        }
    }

    /** Removes a driver. Returns false if it was not registered. */
    deregister(driver: Driver): boolean {
        const index = this.#drivers.indexOf(driver);
        if (index < 0) {
            return false;
        }
        this.#drivers.splice(index, 1);
        return true;
    }

    /** Registered drivers, in the order of registration. */
    get drivers(): ReadonlyArray<Driver> {
        return [...this.#drivers];
    }

    /** Finds the first registered driver that accepts `descriptor`. */
    driverFor(descriptor: string): Driver | undefined {
        return this.#drivers.find((driver) => driver.acceptsDescriptor(descriptor));
    }

    /** Opens a connection with the first registered driver that accepts `descriptor`. */
    async connect(descriptor: string, overrides: ConnectionOptions = {}): Promise<Connection> {
        const driver = this.driverFor(descriptor);
        const conn = driver !== undefined ? await driver.connect(descriptor, overrides) : undefined;
        if (conn === undefined) {
            throw new DescriptorParseError(`No registered driver accepts ${JSON.stringify(descriptor)}`);
        }
        return conn;
    }
}
