import { randomUUID } from "crypto";
import type { Context } from "aws-lambda";
import { DateTime } from "luxon";
import { loadConfig } from "./config";
import { InvalidJsonError } from "./errors";
import { createLogger, errorFields } from "./logger";
import type { HttpResponse } from "./types";

interface FunctionUrlEvent {
  rawPath?: string;
  body?: string | null;
  isBase64Encoded?: boolean;
  headers?: Record<string, string | undefined>;
  queryStringParameters?: Record<string, string | undefined> | null;
  requestContext?: {
    http?: {
      method?: string;
      path?: string;
    };
  };
}

type ResponseBody = Record<string, unknown>;

const CORS_HEADERS: Record<string, string> = {
  "Content-Type": "application/json",
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type",
};

// Packages the health check expects to find in the deployment
const RUNTIME_DEPENDENCIES = ["axios", "luxon", "@aws-sdk/client-s3"];

export function createResponse(statusCode: number, body: ResponseBody): HttpResponse {
  return {
    statusCode,
    headers: { ...CORS_HEADERS },
    body: JSON.stringify(body),
  };
}

function timestamp(): string {
  return DateTime.utc().toISO() ?? new Date().toISOString();
}

function decodeBody(event: FunctionUrlEvent): string {
  const body = event.body ?? "";
  return event.isBase64Encoded ? Buffer.from(body, "base64").toString("utf-8") : body;
}

function parseJsonBody(raw: string): unknown {
  if (!raw) return {};
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new InvalidJsonError(error);
  }
}

async function checkLibrary(name: string): Promise<"available" | "not available"> {
  try {
    await import(name);
    return "available";
  } catch {
    return "not available";
  }
}

function handleRoot(queryParams: Record<string, string | undefined>, environment: string): ResponseBody {
  return {
    message: "Welcome to Lambda Function URL API",
    timestamp: timestamp(),
    environment,
    query_params: queryParams,
    endpoints: {
      "GET /": "This message",
      "GET /health": "Health check",
      "POST /api/data": "Process data",
    },
  };
}

async function handleHealth(): Promise<ResponseBody> {
  const checks: Record<string, string> = {};
  for (const name of RUNTIME_DEPENDENCIES) {
    checks[name] = await checkLibrary(name);
  }
  return { status: "healthy", timestamp: timestamp(), checks };
}

function handlePostData(data: unknown): ResponseBody {
  return {
    message: "Data received and processed",
    timestamp: timestamp(),
    received_data: data,
    processed: true,
  };
}

/**
 * Lambda Function URL handler.
 */
export async function handler(
  event: FunctionUrlEvent,
  context?: Pick<Context, "awsRequestId">
): Promise<HttpResponse> {
  const requestId = context?.awsRequestId;
  let logger = createLogger({ service: "api", requestId });

  try {
    const config = loadConfig();
    logger = createLogger({ service: "api", level: config.LOG_LEVEL, requestId });

    const method = event.requestContext?.http?.method ?? "GET";
    const path = event.rawPath ?? "/";
    logger.info("Received HTTP request", { method, path });

    if (path === "/" && method === "GET") {
      return createResponse(200, handleRoot(event.queryStringParameters ?? {}, config.ENVIRONMENT));
    }
    if (path === "/health" && method === "GET") {
      return createResponse(200, await handleHealth());
    }
    if (path === "/api/data" && method === "POST") {
      const data = parseJsonBody(decodeBody(event));
      logger.info("Processing POST data", { data });
      return createResponse(200, handlePostData(data));
    }

    return createResponse(404, { error: "Not found", path, method });
  } catch (error) {
    if (error instanceof InvalidJsonError) {
      logger.error("JSON decode error", errorFields(error));
      return createResponse(error.status, { error: "Invalid JSON in request body" });
    }

    // The caller gets a trace id; the exception itself only goes to the logs
    const traceId = randomUUID();
    logger.error("Error handling request", { traceId, ...errorFields(error) });
    return createResponse(500, { error: "Internal server error", traceId });
  }
}
