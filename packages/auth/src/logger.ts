/**
 * Audit logger
 *
 * Emits log records through the OpenTelemetry Logs API. Without a
 * registered LoggerProvider the records are dropped, so the host decides
 * where audit logs go.
 *
 * @module logger
 */

import type { AnyValueMap } from "@opentelemetry/api-logs";
import { SeverityNumber, logs } from "@opentelemetry/api-logs";

export interface Logger {
    debug(message: string, attributes?: AnyValueMap): void;
    info(message: string, attributes?: AnyValueMap): void;
    warn(message: string, attributes?: AnyValueMap): void;
    error(message: string, attributes?: AnyValueMap): void;
}

const INSTRUMENTATION_SCOPE = "@authgate/auth";

/**
 * Create a logger bound to a component name.
 *
 * The OpenTelemetry logger is looked up on every call, so a provider
 * registered after this logger was created still receives its records.
 *
 * @param name - Component name, recorded as `logger.name`
 * @param defaultAttributes - Attributes added to every record
 */
export function getLogger(name: string, defaultAttributes?: AnyValueMap): Logger {
    function emitLog(severityNumber: SeverityNumber, severityText: string, message: string, attributes?: AnyValueMap): void {
        logs.getLogger(INSTRUMENTATION_SCOPE).emit({
            severityNumber,
            severityText,
            body: message,
            attributes: { "logger.name": name, ...defaultAttributes, ...attributes },
        });
    }

    return {
        debug(message, attributes?) {
            emitLog(SeverityNumber.DEBUG, "DEBUG", message, attributes);
        },
        info(message, attributes?) {
            emitLog(SeverityNumber.INFO, "INFO", message, attributes);
        },
        warn(message, attributes?) {
            emitLog(SeverityNumber.WARN, "WARN", message, attributes);
        },
        error(message, attributes?) {
            emitLog(SeverityNumber.ERROR, "ERROR", message, attributes);
        },
    };
}

/**
 * Convert server-side error details into log attributes.
 *
 * Arrays of strings and primitives are kept; anything else is stringified.
 */
export function toLogAttributes(details: Readonly<Record<string, unknown>>): AnyValueMap {
    const attributes: AnyValueMap = {};
    for (const [key, value] of Object.entries(details)) {
        if (value === undefined) continue;
        if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
            attributes[`auth.${key}`] = value;
        } else if (Array.isArray(value) && value.every((item): item is string => typeof item === "string")) {
            attributes[`auth.${key}`] = value;
        } else {
            attributes[`auth.${key}`] = String(value);
        }
    }
    return attributes;
}
