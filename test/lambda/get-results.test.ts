/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

/**
 * Unit tests for the get_results tool.
 */

import {
  CHECK_INTERVAL_SECONDS,
  getResults,
  normalizeOutputId,
  resultLocations
} from "../../lambda/vep-tools/get-results";
import { StorageError } from "../../lambda/vep-tools/ports";
import { createTestHarness, TestHarness } from "./fakes";

const SUCCESS_KEY = "async-inference-output/abc-123.out";
const FAILURE_KEY = "async-inference-failures/abc-123.out";
const SUCCESS_PATH = `s3://test-bucket/${SUCCESS_KEY}`;
const FAILURE_PATH = `s3://test-bucket/${FAILURE_KEY}`;

describe("normalizeOutputId", () => {
  test.each([
    ["abc-123", "abc-123"],
    [" abc-123 ", "abc-123"],
    ["abc-123.out", "abc-123"],
    ["s3://test-bucket/async-inference-output/abc-123.out", "abc-123"],
    ["s3://other-bucket/nested/prefix/abc-123.out", "abc-123"]
  ])("normalizes %s to %s", (raw, expected) => {
    expect(normalizeOutputId(raw)).toBe(expected);
  });

  test.each([["s3://bucket-only"], ["s3://bucket/"], ["../secrets"], [""], ["a b"]])(
    "rejects %s",
    (raw) => {
      expect(normalizeOutputId(raw)).toBeUndefined();
    }
  );
});

describe("resultLocations", () => {
  test("maps an id to exactly one success and one failure key", () => {
    expect(
      resultLocations("abc-123", "async-inference-output", "async-inference-failures")
    ).toEqual({
      outputId: "abc-123",
      successKey: SUCCESS_KEY,
      failureKey: FAILURE_KEY
    });
  });
});

describe("getResults", () => {
  let harness: TestHarness;

  beforeEach(() => {
    harness = createTestHarness();
  });

  test("reports in_progress when neither object exists", async () => {
    const result = await getResults({ output_id: "abc-123" }, harness.ctx);

    expect(result).toEqual({
      ok: true,
      message: "Prediction is still in progress",
      data: {
        status: "in_progress",
        output_id: "abc-123",
        message: "Prediction is still processing. Check again in 30 seconds.",
        expected_paths: { success: SUCCESS_PATH, failure: FAILURE_PATH },
        check_interval_seconds: CHECK_INTERVAL_SECONDS
      }
    });
    expect(harness.store.headCalls).toEqual([SUCCESS_KEY, FAILURE_KEY]);
    expect(harness.sink.names()).toEqual(["ResultsInProgress"]);
  });

  test("returns the same in_progress answer on repeated polls", async () => {
    const first = await getResults({ output_id: "abc-123" }, harness.ctx);
    const second = await getResults({ output_id: "abc-123" }, harness.ctx);

    expect(second).toEqual(first);
  });

  test("returns parsed results once the success object exists", async () => {
    harness.store.seed(
      SUCCESS_KEY,
      '{"predictions":[{"position":1,"score":-0.42}]}',
      new Date("2025-01-15T11:58:00.000Z")
    );

    const result = await getResults({ output_id: "abc-123" }, harness.ctx);

    expect(result).toEqual({
      ok: true,
      message: "Results retrieved successfully",
      data: {
        status: "completed",
        results: { predictions: [{ position: 1, score: -0.42 }] },
        output_id: "abc-123",
        s3_output_path: SUCCESS_PATH,
        completion_time: "2025-01-15T11:58:00.000Z"
      }
    });
    expect(harness.store.headCalls).toEqual([SUCCESS_KEY]);
  });

  test("resolves a full s3 path to the same result as the bare id", async () => {
    harness.store.seed(SUCCESS_KEY, '{"score":1}');

    const fromId = await getResults({ output_id: "abc-123" }, harness.ctx);
    const fromPath = await getResults({ output_id: SUCCESS_PATH }, harness.ctx);

    expect(fromPath).toEqual(fromId);
  });

  test("prefers the success object when both exist", async () => {
    harness.store.seed(SUCCESS_KEY, '{"score":1}');
    harness.store.seed(FAILURE_KEY, '{"error":"late failure"}');

    const result = await getResults({ output_id: "abc-123" }, harness.ctx);

    expect(result.ok).toBe(true);
  });

  test("reports PREDICTION_FAILED with the parsed failure body", async () => {
    harness.store.seed(
      FAILURE_KEY,
      '{"error":"CUDA out of memory"}',
      new Date("2025-01-15T11:59:30.000Z")
    );

    const result = await getResults({ output_id: "abc-123" }, harness.ctx);

    expect(result).toEqual({
      ok: false,
      code: "PREDICTION_FAILED",
      message: "Async inference prediction failed",
      details: {
        status: "failed",
        output_id: "abc-123",
        s3_failure_path: FAILURE_PATH,
        failure_time: "2025-01-15T11:59:30.000Z",
        error_details: { error: "CUDA out of memory" }
      }
    });
    expect(harness.sink.names()).toEqual(["ResultsFailed"]);
  });

  test("wraps a plain-text failure body as an error message", async () => {
    harness.store.seed(FAILURE_KEY, "Model container crashed\n");

    const result = await getResults({ output_id: "abc-123" }, harness.ctx);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.details.error_details).toEqual({
        error_message: "Model container crashed"
      });
    }
  });

  test("reports an unreadable failure body as FAILURE_RETRIEVAL_ERROR", async () => {
    harness.store.seed(FAILURE_KEY, "{}");
    harness.store.getErrors.set(
      FAILURE_KEY,
      new StorageError("Access Denied", "AccessDenied", "service", 403)
    );

    const result = await getResults({ output_id: "abc-123" }, harness.ctx);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.code).toBe("FAILURE_RETRIEVAL_ERROR");
    }
  });

  test("reports a non-JSON result body as RESULT_PARSE_ERROR", async () => {
    harness.store.seed(SUCCESS_KEY, "not json");

    const result = await getResults({ output_id: "abc-123" }, harness.ctx);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.code).toBe("RESULT_PARSE_ERROR");
      expect(result.message).toBe("Prediction result object is not valid JSON");
      expect(result.details.raw_output_preview).toBe("not json");
    }
    expect(harness.sink.names()).toEqual(["ResultsError"]);
  });

  test("reports an empty result body as RESULT_PARSE_ERROR", async () => {
    harness.store.seed(SUCCESS_KEY, "  ");

    const result = await getResults({ output_id: "abc-123" }, harness.ctx);

    expect(result).toEqual({
      ok: false,
      code: "RESULT_PARSE_ERROR",
      message: "Prediction result object is empty",
      details: { output_id: "abc-123", s3_output_path: SUCCESS_PATH }
    });
  });

  test("reports a failed result read as RESULT_RETRIEVAL_ERROR", async () => {
    harness.store.seed(SUCCESS_KEY, "{}");
    harness.store.getErrors.set(
      SUCCESS_KEY,
      new StorageError("We encountered an internal error.", "InternalError", "service", 500)
    );

    const result = await getResults({ output_id: "abc-123" }, harness.ctx);

    expect(result).toEqual({
      ok: false,
      code: "RESULT_RETRIEVAL_ERROR",
      message: "Failed to read prediction results: We encountered an internal error.",
      details: {
        output_id: "abc-123",
        s3_output_path: SUCCESS_PATH,
        storage_error_code: "InternalError"
      }
    });
  });

  test.each([
    ["AccessDenied", 403, "ACCESS_DENIED"],
    ["NoSuchBucket", 404, "BUCKET_NOT_FOUND"],
    ["InvalidBucketName", 400, "INVALID_S3_NAME"],
    ["InternalError", 500, "S3_ERROR"],
    ["UnknownError", 403, "ACCESS_DENIED"]
  ])("maps a %s probe error (%i) to %s", async (code, status, expected) => {
    harness.store.headErrors.set(
      SUCCESS_KEY,
      new StorageError("probe failed", code, "service", status)
    );

    const result = await getResults({ output_id: "abc-123" }, harness.ctx);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.code).toBe(expected);
      expect(result.details.s3_path).toBe(SUCCESS_PATH);
      expect(result.details.storage_error_code).toBe(code);
    }
  });

  test("marks throttling as retryable", async () => {
    harness.store.headErrors.set(
      FAILURE_KEY,
      new StorageError("Please reduce your request rate.", "SlowDown", "service", 503)
    );

    const result = await getResults({ output_id: "abc-123" }, harness.ctx);

    expect(result).toEqual({
      ok: false,
      code: "S3_SERVICE_UNAVAILABLE",
      message: "Object storage is temporarily unavailable",
      details: {
        output_id: "abc-123",
        s3_path: FAILURE_PATH,
        storage_error_code: "SlowDown",
        retry_suggested: true,
        retry_after_seconds: 30
      }
    });
  });

  test("maps a connection failure to S3_CONNECTION_ERROR", async () => {
    harness.store.headErrors.set(
      SUCCESS_KEY,
      new StorageError("getaddrinfo ENOTFOUND", "Error", "connection")
    );

    const result = await getResults({ output_id: "abc-123" }, harness.ctx);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.code).toBe("S3_CONNECTION_ERROR");
    }
  });

  test("rejects a malformed identifier before probing storage", async () => {
    const result = await getResults({ output_id: "s3://bucket-only" }, harness.ctx);

    expect(result).toEqual({
      ok: false,
      code: "INVALID_OUTPUT_ID",
      message: "Output id must be a bare id or a full s3:// path to a .out object",
      details: { output_id: "s3://bucket-only" }
    });
    expect(harness.store.headCalls).toHaveLength(0);
  });

  test("rejects a missing output_id", async () => {
    const result = await getResults({}, harness.ctx);

    expect(result).toEqual({
      ok: false,
      code: "INVALID_EVENT_STRUCTURE",
      message: "Input validation failed",
      details: { errors: ["Missing required field: 'output_id'"] }
    });
  });

  test("rejects a non-string output_id", async () => {
    const result = await getResults({ output_id: 42 }, harness.ctx);

    expect(result).toEqual({
      ok: false,
      code: "INVALID_EVENT_STRUCTURE",
      message: "Input validation failed",
      details: { errors: ["Required field 'output_id' must be a string"] }
    });
  });
});
