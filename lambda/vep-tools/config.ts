/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

import { LogLevel, parseLogLevel } from "./telemetry";

export const DEFAULT_INPUT_PREFIX = "async-inference-input";
export const DEFAULT_OUTPUT_PREFIX = "async-inference-output";
export const DEFAULT_FAILURE_PREFIX = "async-inference-failures";
export const DEFAULT_METRICS_NAMESPACE = "SageMaker/AsyncEndpoint/Lambda";

/**
 * Settings needed before any tool is resolved. These always have defaults.
 */
export interface TelemetrySettings {
  readonly functionName: string;
  readonly logLevel: LogLevel;
  readonly metricsNamespace: string;
}

/**
 * Runtime configuration of the tool function, read from its environment.
 */
export interface ToolConfig {
  readonly endpointName: string;
  readonly bucketName: string;
  /** Key prefix for uploaded request bodies, without a trailing slash. */
  readonly inputPrefix: string;
  /** Key prefix the endpoint writes results under, without a trailing slash. */
  readonly outputPrefix: string;
  /** Key prefix the endpoint writes failures under, without a trailing slash. */
  readonly failurePrefix: string;
}

/**
 * Raised when required environment variables are missing.
 */
export class ConfigurationError extends Error {
  constructor(public readonly missing: string[]) {
    super(`Missing required environment variables: ${missing.join(", ")}`);
    this.name = "ConfigurationError";
  }
}

function readPrefix(value: string | undefined, fallback: string): string {
  const prefix = (value ?? "").trim().replace(/\/+$/, "");
  return prefix === "" ? fallback : prefix;
}

/**
 * Reads the logging and metrics settings.
 *
 * @param env - The process environment
 * @returns The telemetry settings
 */
export function loadTelemetrySettings(
  env: NodeJS.ProcessEnv = process.env
): TelemetrySettings {
  return {
    functionName: env.AWS_LAMBDA_FUNCTION_NAME ?? "vep-tools",
    logLevel: parseLogLevel(env.LOG_LEVEL),
    metricsNamespace:
      env.METRICS_NAMESPACE?.trim() || DEFAULT_METRICS_NAMESPACE
  };
}

/**
 * Reads the endpoint and bucket configuration.
 *
 * @param env - The process environment
 * @returns The tool configuration
 * @throws {ConfigurationError} If the endpoint or bucket name is not set
 */
export function loadToolConfig(
  env: NodeJS.ProcessEnv = process.env
): ToolConfig {
  const endpointName = env.SAGEMAKER_ENDPOINT_NAME?.trim() ?? "";
  const bucketName = env.S3_BUCKET_NAME?.trim() ?? "";

  const missing: string[] = [];
  if (endpointName === "") {
    missing.push("SAGEMAKER_ENDPOINT_NAME");
  }
  if (bucketName === "") {
    missing.push("S3_BUCKET_NAME");
  }
  if (missing.length > 0) {
    throw new ConfigurationError(missing);
  }

  return {
    endpointName,
    bucketName,
    inputPrefix: readPrefix(env.S3_INPUT_PREFIX, DEFAULT_INPUT_PREFIX),
    outputPrefix: readPrefix(env.S3_OUTPUT_PREFIX, DEFAULT_OUTPUT_PREFIX),
    failurePrefix: readPrefix(env.S3_FAILURE_PREFIX, DEFAULT_FAILURE_PREFIX)
  };
}
