import { InternalError } from "./errors.js";

export function impossible(value: never, message: string): Error {
    return new InternalError(`${message}: ${JSON.stringify(value)}`);
}
