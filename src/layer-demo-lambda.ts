import { randomUUID } from "crypto";
import type { Context } from "aws-lambda";
import { S3Client, ListBucketsCommand } from "@aws-sdk/client-s3";
import axios, { type AxiosInstance } from "axios";
import { DateTime } from "luxon";
import { loadConfig } from "./config";
import { createLogger, errorFields, type Logger } from "./logger";
import type { LambdaResponse } from "./types";

interface LambdaEvent {
  action?: string;
  data?: Record<string, unknown>;
  url?: string;
}

export interface FetchedResponse {
  status: number;
  contentType: string;
  text: string;
}

export interface LayerDemoDependencies {
  countBuckets: () => Promise<number>;
  fetchUrl: (url: string, timeoutMs: number) => Promise<FetchedResponse>;
}

export const LAYER_LIBRARIES = ["axios", "@aws-sdk/client-s3", "luxon", "zod"];

/**
 * GET a URL and hand back the raw text; axios rejects non-2xx statuses.
 */
export function createHttpFetcher(client: AxiosInstance = axios.create()) {
  return async function fetchUrl(url: string, timeoutMs: number): Promise<FetchedResponse> {
    const response = await client.get<string>(url, {
      timeout: timeoutMs,
      responseType: "text",
      transformResponse: (raw: string) => raw,
    });
    return {
      status: response.status,
      contentType: String(response.headers["content-type"] ?? ""),
      text: typeof response.data === "string" ? response.data : JSON.stringify(response.data),
    };
  };
}

export function createBucketCounter(client: S3Client = new S3Client({})) {
  return async function countBuckets(): Promise<number> {
    const response = await client.send(new ListBucketsCommand({}));
    return response.Buckets?.length ?? 0;
  };
}

async function processData(
  data: Record<string, unknown>,
  deps: LayerDemoDependencies,
  logger: Logger
): Promise<Record<string, unknown>> {
  logger.info("Processing data", { data });

  let bucketCount = 0;
  try {
    bucketCount = await deps.countBuckets();
  } catch (error) {
    logger.warn("Could not list S3 buckets", errorFields(error));
  }

  return {
    message: "Data processed successfully",
    data,
    s3_buckets_accessible: bucketCount,
    layer_libraries: LAYER_LIBRARIES,
  };
}

async function fetchData(
  url: string,
  timeoutMs: number,
  deps: LayerDemoDependencies,
  logger: Logger
): Promise<Record<string, unknown>> {
  logger.info("Fetching data", { url });

  try {
    const response = await deps.fetchUrl(url, timeoutMs);
    return {
      message: "Data fetched successfully",
      url,
      status_code: response.status,
      data: response.contentType.startsWith("application/json")
        ? JSON.parse(response.text)
        : response.text.slice(0, 100),
    };
  } catch (error) {
    logger.error("Request failed", { url, ...errorFields(error) });
    throw error;
  }
}

/**
 * Demonstrates calling libraries shipped in a Lambda layer: S3 through the
 * AWS SDK for `process`, axios for `fetch`.
 */
export function createLayerDemoHandler(deps: LayerDemoDependencies) {
  return async function handler(
    event: LambdaEvent,
    context: Pick<Context, "functionName" | "awsRequestId">
  ): Promise<LambdaResponse> {
    let logger = createLogger({ service: "layer-demo", requestId: context.awsRequestId });

    try {
      const config = loadConfig();
      logger = createLogger({
        service: "layer-demo",
        level: config.LOG_LEVEL,
        requestId: context.awsRequestId,
      });
      logger.info("Received event", { event });

      const action = event.action ?? "process";
      let result: Record<string, unknown>;

      if (action === "process") {
        result = await processData(event.data ?? {}, deps, logger);
      } else if (action === "fetch") {
        result = await fetchData(event.url ?? config.DEFAULT_FETCH_URL, config.FETCH_TIMEOUT_MS, deps, logger);
      } else {
        result = { message: `Unknown action: ${action}` };
      }

      result.metadata = {
        timestamp: DateTime.utc().toISO(),
        environment: config.ENVIRONMENT,
        layer_version: config.LAYER_VERSION,
        function_name: context.functionName,
        request_id: context.awsRequestId,
      };

      logger.info("Request processed successfully");
      return {
        statusCode: 200,
        body: JSON.stringify(result),
      };
    } catch (error) {
      const traceId = randomUUID();
      logger.error("Error processing request", { traceId, ...errorFields(error) });
      return {
        statusCode: 500,
        body: JSON.stringify({ error: "Internal server error", traceId }),
      };
    }
  };
}

export const handler = createLayerDemoHandler({
  countBuckets: createBucketCounter(),
  fetchUrl: createHttpFetcher(),
});
