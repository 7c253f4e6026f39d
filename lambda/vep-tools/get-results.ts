/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

import { s3Uri, ToolContext } from "./context";
import { fail, succeed, ToolFailure, ToolResult } from "./envelope";
import { ObjectMetadata, StorageError } from "./ports";
import { isRecord, validateEventStructure, validationFailure } from "./validators";

/** Suggested delay between polls of an unfinished prediction. */
export const CHECK_INTERVAL_SECONDS = 30;

const RETRY_AFTER_SECONDS = 30;

const OUTPUT_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export interface CompletedResultData {
  status: "completed";
  results: unknown;
  output_id: string;
  s3_output_path: string;
  completion_time: string | null;
}

export interface InProgressResultData {
  status: "in_progress";
  output_id: string;
  message: string;
  expected_paths: { success: string; failure: string };
  check_interval_seconds: number;
}

export type GetResultsData = CompletedResultData | InProgressResultData;

/** The two storage locations an output id resolves to. */
export interface ResultLocations {
  readonly outputId: string;
  readonly successKey: string;
  readonly failureKey: string;
}

/**
 * Reduces a bare id or a full `s3://bucket/prefix/<id>.out` path to the
 * canonical output id.
 *
 * @param raw - The identifier supplied by the caller
 * @returns The canonical id, or undefined when the identifier is malformed
 */
export function normalizeOutputId(raw: string): string | undefined {
  let candidate = raw.trim();

  if (candidate.startsWith("s3://")) {
    const path = candidate.slice("s3://".length);
    const slash = path.indexOf("/");
    if (slash <= 0 || slash === path.length - 1) {
      return undefined;
    }
    const key = path.slice(slash + 1);
    candidate = key.slice(key.lastIndexOf("/") + 1);
  }

  if (candidate.endsWith(".out")) {
    candidate = candidate.slice(0, -".out".length);
  }
  return OUTPUT_ID_PATTERN.test(candidate) ? candidate : undefined;
}

/**
 * Maps an output id to its success and failure object keys.
 *
 * @param outputId - A canonical output id
 * @param outputPrefix - Prefix the endpoint writes results under
 * @param failurePrefix - Prefix the endpoint writes failures under
 * @returns The result locations
 */
export function resultLocations(
  outputId: string,
  outputPrefix: string,
  failurePrefix: string
): ResultLocations {
  return {
    outputId,
    successKey: `${outputPrefix}/${outputId}.out`,
    failureKey: `${failurePrefix}/${outputId}.out`
  };
}

/**
 * Converts a storage probe error into the failure reported to the caller.
 *
 * @param error - The adapter error
 * @param outputId - The output id being looked up
 * @param path - The s3:// path that was probed
 * @returns The storage failure
 */
export function storageFailure(
  error: StorageError,
  outputId: string,
  path: string
): ToolFailure {
  const details = {
    output_id: outputId,
    s3_path: path,
    storage_error_code: error.code
  };

  if (error.kind === "connection") {
    return fail(
      "S3_CONNECTION_ERROR",
      `Could not connect to object storage: ${error.message}`,
      details
    );
  }

  switch (error.code) {
    case "AccessDenied":
    case "Forbidden":
      return fail(
        "ACCESS_DENIED",
        "Access denied while checking prediction results",
        details
      );
    case "NoSuchBucket":
      return fail("BUCKET_NOT_FOUND", "Results bucket does not exist", details);
    case "InvalidBucketName":
    case "InvalidObjectName":
      return fail("INVALID_S3_NAME", "Invalid bucket or object name", details);
    case "RequestTimeout":
    case "ServiceUnavailable":
    case "SlowDown":
      return fail(
        "S3_SERVICE_UNAVAILABLE",
        "Object storage is temporarily unavailable",
        {
          ...details,
          retry_suggested: true,
          retry_after_seconds: RETRY_AFTER_SECONDS
        }
      );
  }

  if (error.statusCode === 403) {
    return fail(
      "ACCESS_DENIED",
      "Access denied while checking prediction results",
      details
    );
  }
  if (error.statusCode === 503) {
    return fail(
      "S3_SERVICE_UNAVAILABLE",
      "Object storage is temporarily unavailable",
      {
        ...details,
        retry_suggested: true,
        retry_after_seconds: RETRY_AFTER_SECONDS
      }
    );
  }
  return fail("S3_ERROR", `Object storage error: ${error.message}`, details);
}

type Probe =
  | { readonly found: true; readonly metadata: ObjectMetadata }
  | { readonly found: false }
  | { readonly failure: ToolFailure };

async function probe(
  ctx: ToolContext,
  key: string,
  outputId: string
): Promise<Probe> {
  try {
    const metadata = await ctx.store.head(key);
    return metadata === undefined ? { found: false } : { found: true, metadata };
  } catch (error) {
    if (!(error instanceof StorageError)) {
      throw error;
    }
    return {
      failure: storageFailure(error, outputId, s3Uri(ctx.config.bucketName, key))
    };
  }
}

async function completedResult(
  ctx: ToolContext,
  locations: ResultLocations,
  metadata: ObjectMetadata
): Promise<ToolResult<GetResultsData>> {
  const path = s3Uri(ctx.config.bucketName, locations.successKey);

  let body: string;
  try {
    body = await ctx.store.get(locations.successKey);
  } catch (error) {
    if (!(error instanceof StorageError)) {
      throw error;
    }
    return fail(
      "RESULT_RETRIEVAL_ERROR",
      `Failed to read prediction results: ${error.message}`,
      {
        output_id: locations.outputId,
        s3_output_path: path,
        storage_error_code: error.code
      }
    );
  }

  if (body.trim() === "") {
    return fail("RESULT_PARSE_ERROR", "Prediction result object is empty", {
      output_id: locations.outputId,
      s3_output_path: path
    });
  }

  let results: unknown;
  try {
    results = JSON.parse(body);
  } catch (error) {
    return fail(
      "RESULT_PARSE_ERROR",
      "Prediction result object is not valid JSON",
      {
        output_id: locations.outputId,
        s3_output_path: path,
        parse_error: error instanceof Error ? error.message : String(error),
        raw_output_preview: body.slice(0, 500)
      }
    );
  }

  return succeed<GetResultsData>("Results retrieved successfully", {
    status: "completed",
    results,
    output_id: locations.outputId,
    s3_output_path: path,
    completion_time: metadata.lastModified?.toISOString() ?? null
  });
}

async function failedResult(
  ctx: ToolContext,
  locations: ResultLocations,
  metadata: ObjectMetadata
): Promise<ToolFailure> {
  const path = s3Uri(ctx.config.bucketName, locations.failureKey);

  let body: string;
  try {
    body = await ctx.store.get(locations.failureKey);
  } catch (error) {
    if (!(error instanceof StorageError)) {
      throw error;
    }
    return fail(
      "FAILURE_RETRIEVAL_ERROR",
      `Prediction failed but the failure details could not be read: ${error.message}`,
      {
        status: "failed",
        output_id: locations.outputId,
        s3_failure_path: path,
        storage_error_code: error.code
      }
    );
  }

  let errorDetails: unknown = { error_message: body.trim() };
  try {
    const parsed: unknown = JSON.parse(body);
    if (isRecord(parsed)) {
      errorDetails = parsed;
    }
  } catch (error) {
    // Failure objects written by the container are often plain text.
    if (!(error instanceof SyntaxError)) {
      throw error;
    }
  }

  return fail("PREDICTION_FAILED", "Async inference prediction failed", {
    status: "failed",
    output_id: locations.outputId,
    s3_failure_path: path,
    failure_time: metadata.lastModified?.toISOString() ?? null,
    error_details: errorDetails
  });
}

/**
 * Looks up the state of an asynchronous prediction.
 *
 * Performs one probe of the success object and, if absent, one of the
 * failure object. Neither existing means the prediction is still running,
 * which is reported as a successful `in_progress` response.
 *
 * @param payload - The tool payload, expected to carry `output_id`
 * @param ctx - Configuration and collaborators for this invocation
 * @returns The completed or in-progress result, or a typed failure
 */
export async function getResults(
  payload: unknown,
  ctx: ToolContext
): Promise<ToolResult<GetResultsData>> {
  const { config, telemetry } = ctx;

  const shape = validateEventStructure(payload, ["output_id"]);
  if (!shape.valid) {
    await telemetry.putMetric("ResultsError", 1);
    return validationFailure("INVALID_EVENT_STRUCTURE", shape.errors);
  }
  const rawId = shape.event.output_id;
  if (typeof rawId !== "string") {
    await telemetry.putMetric("ResultsError", 1);
    return validationFailure("INVALID_EVENT_STRUCTURE", [
      "Required field 'output_id' must be a string"
    ]);
  }

  const outputId = normalizeOutputId(rawId);
  if (outputId === undefined) {
    await telemetry.putMetric("ResultsError", 1);
    return fail(
      "INVALID_OUTPUT_ID",
      "Output id must be a bare id or a full s3:// path to a .out object",
      { output_id: rawId }
    );
  }

  const locations = resultLocations(
    outputId,
    config.outputPrefix,
    config.failurePrefix
  );

  const success = await probe(ctx, locations.successKey, outputId);
  if ("failure" in success) {
    await telemetry.putMetric("ResultsError", 1);
    return success.failure;
  }
  if (success.found) {
    const result = await completedResult(ctx, locations, success.metadata);
    await telemetry.putMetric(result.ok ? "ResultsCompleted" : "ResultsError", 1);
    telemetry.logEvent("results_lookup", { output_id: outputId, status: "completed" });
    return result;
  }

  const failure = await probe(ctx, locations.failureKey, outputId);
  if ("failure" in failure) {
    await telemetry.putMetric("ResultsError", 1);
    return failure.failure;
  }
  if (failure.found) {
    await telemetry.putMetric("ResultsFailed", 1);
    telemetry.logEvent(
      "results_lookup",
      { output_id: outputId, status: "failed" },
      "WARN"
    );
    return failedResult(ctx, locations, failure.metadata);
  }

  await telemetry.putMetric("ResultsInProgress", 1);
  telemetry.logEvent("results_lookup", { output_id: outputId, status: "in_progress" });
  return succeed<GetResultsData>("Prediction is still in progress", {
    status: "in_progress",
    output_id: outputId,
    message: `Prediction is still processing. Check again in ${CHECK_INTERVAL_SECONDS} seconds.`,
    expected_paths: {
      success: s3Uri(config.bucketName, locations.successKey),
      failure: s3Uri(config.bucketName, locations.failureKey)
    },
    check_interval_seconds: CHECK_INTERVAL_SECONDS
  });
}
