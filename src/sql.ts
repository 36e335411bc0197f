import type { ParamValue } from "./value.js";
import { formatDate, formatTimestamp } from "./value.js";
import { impossible } from "./util.js";

const queryKeywords = ["SELECT", "SHOW", "DESCRIBE", "EXPLAIN"];

/** True if the SQL text starts with a keyword that produces rows (`SELECT`, `SHOW`, `DESCRIBE` or `EXPLAIN`),
 * ignoring case and leading whitespace. */
export function isQueryText(sql: string): boolean {
    const upper = sql.trim().toUpperCase();
    return queryKeywords.some((keyword) => upper.startsWith(keyword));
}

/** Writes a parameter value as a SQL literal. Text is single-quoted with embedded quotes doubled; no other
 * escaping is done. */
export function sqlLiteral(param: ParamValue): string {
    switch (param.type) {
        case "null":
            return "NULL";
        case "boolean":
        case "number":
        case "bigint":
            return String(param.value);
        case "decimal":
            return param.value.text;
        case "text":
            return quote(param.value);
        case "date":
            return quote(formatDate(param.value));
        case "time":
            return quote(param.value.toString());
        case "timestamp":
            return quote(formatTimestamp(param.value));
        default:
            throw impossible(param, "Impossible type of ParamValue");
    }
}

function quote(text: string): string {
    return `'${text.replace(/'/g, "''")}'`;
}

/** Substitutes bound parameters into the `?` placeholders of `sql`.
 *
 * Parameters are taken in order starting from index 1, and the substitution stops at the first index that is
 * not bound or when no placeholder is left. Each value replaces the leftmost placeholder that has not been
 * replaced yet; question marks inside the literals written so far are never treated as placeholders.
 */
export function buildFinalSql(sql: string, params: ReadonlyMap<number, ParamValue>): string {
    let result = "";
    let rest = sql;
    for (let index = 1; ; ++index) {
        const param = params.get(index);
        if (param === undefined) {
            break;
        }
        const placeholder = rest.indexOf("?");
        if (placeholder < 0) {
            break;
        }
        result += rest.substring(0, placeholder) + sqlLiteral(param);
        rest = rest.substring(placeholder + 1);
    }
    return result + rest;
}
