import pino, { type DestinationStream, type Logger } from "pino";
import { getRequestId } from "./request-id";
import { sanitizeUrlPath } from "./redaction";

const LOG_REDACTIONS = [
  // Session material.
  "req.headers.authorization",
  "req.headers.cookie",
  "req.headers.set-cookie",
  "res.headers.set-cookie",
  // SAML protocol payloads.
  "req.body.SAMLResponse",
  "req.body.SAMLRequest",
  "req.body.RelayState",
  "req.query.SAMLResponse",
  "req.query.SAMLRequest",
  "req.query.Signature",
  "SAMLResponse",
  "SAMLRequest",
  "samlResponse",
  "token",
  "sessionToken",
  "privateKeyPem"
];

export interface CreateLoggerOptions {
  level?: string;
  stream?: DestinationStream;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  return pino(
    {
      level: options.level ?? process.env.LOG_LEVEL ?? "info",
      base: {
        service: "saml-sp"
      },
      redact: {
        paths: LOG_REDACTIONS,
        remove: true
      },
      serializers: {
        // Redirect-binding messages travel in the query string; never log it.
        req(req) {
          const url = typeof req.url === "string" ? sanitizeUrlPath(req.url) : undefined;
          return {
            method: req.method,
            url,
            hostname: req.hostname,
            remoteAddress: req.remoteAddress,
            remotePort: req.remotePort
          };
        },
        res(res) {
          return { statusCode: res.statusCode };
        }
      },
      mixin(_mergeObject, _level, logger) {
        const fields: Record<string, string> = {};

        const bindings = logger.bindings();
        const hasReqId = "requestId" in bindings || "reqId" in bindings;
        if (!hasReqId) {
          const requestId = getRequestId();
          if (requestId) fields.requestId = requestId;
        }

        return fields;
      }
    },
    options.stream
  );
}
