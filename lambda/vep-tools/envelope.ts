/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

/**
 * Tagged tool results and the uniform response envelope they are rendered into.
 *
 * Handlers never build envelopes themselves. They return a {@link ToolResult}
 * and the router converts it exactly once with {@link toEnvelope}.
 */

/**
 * Every error kind a tool invocation can report.
 */
export type ErrorCode =
  | "MISSING_TOOL_NAME"
  | "UNKNOWN_TOOL"
  | "HANDLER_ERROR"
  | "CONFIGURATION_ERROR"
  | "INVALID_EVENT_STRUCTURE"
  | "VALIDATION_ERROR"
  | "S3_UPLOAD_ERROR"
  | "SAGEMAKER_VALIDATION_ERROR"
  | "SAGEMAKER_MODEL_ERROR"
  | "SAGEMAKER_INTERNAL_ERROR"
  | "SAGEMAKER_SERVICE_UNAVAILABLE"
  | "SAGEMAKER_ERROR"
  | "SAGEMAKER_RESPONSE_ERROR"
  | "AWS_CONNECTION_ERROR"
  | "INVALID_OUTPUT_ID"
  | "ACCESS_DENIED"
  | "BUCKET_NOT_FOUND"
  | "INVALID_S3_NAME"
  | "S3_SERVICE_UNAVAILABLE"
  | "S3_CONNECTION_ERROR"
  | "S3_ERROR"
  | "RESULT_RETRIEVAL_ERROR"
  | "RESULT_PARSE_ERROR"
  | "FAILURE_RETRIEVAL_ERROR"
  | "PREDICTION_FAILED";

export type Details = Record<string, unknown>;

export interface ToolSuccess<T> {
  readonly ok: true;
  readonly message: string;
  readonly data: T;
}

export interface ToolFailure {
  readonly ok: false;
  readonly code: ErrorCode;
  readonly message: string;
  readonly details: Details;
}

/** Outcome of a tool operation before it crosses the Lambda boundary. */
export type ToolResult<T> = ToolSuccess<T> | ToolFailure;

export interface SuccessEnvelope<T = unknown> {
  success: true;
  message: string;
  data: T;
  timestamp: string;
}

export interface ErrorEnvelope {
  success: false;
  message: string;
  error_code: ErrorCode;
  details: Details;
  timestamp: string;
}

/** The only shape returned to the gateway. */
export type ResponseEnvelope<T = unknown> = SuccessEnvelope<T> | ErrorEnvelope;

export function succeed<T>(message: string, data: T): ToolSuccess<T> {
  return { ok: true, message, data };
}

export function fail(
  code: ErrorCode,
  message: string,
  details: Details = {}
): ToolFailure {
  return { ok: false, code, message, details };
}

/**
 * Renders a tool result as the response envelope.
 *
 * @param result - The tagged result produced by a handler or the router
 * @param now - The instant stamped on the envelope
 * @returns The envelope returned to the caller
 */
export function toEnvelope<T>(
  result: ToolResult<T>,
  now: Date = new Date()
): ResponseEnvelope<T> {
  const timestamp = now.toISOString();
  if (result.ok) {
    return {
      success: true,
      message: result.message,
      data: result.data,
      timestamp
    };
  }
  return {
    success: false,
    message: result.message,
    error_code: result.code,
    details: result.details,
    timestamp
  };
}

/**
 * Extracts a printable message from anything thrown.
 *
 * @param error - The caught value
 * @returns The error message, or its string form
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
