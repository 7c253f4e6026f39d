/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

import { ToolConfig } from "./config";
import { AsyncInferenceClient, ObjectStore } from "./ports";
import { Telemetry } from "./telemetry";

/**
 * Everything a tool handler needs for one invocation.
 */
export interface ToolContext {
  readonly config: ToolConfig;
  readonly store: ObjectStore;
  readonly inference: AsyncInferenceClient;
  readonly telemetry: Telemetry;
  /** Produces a fresh job id for each submission. */
  readonly generateId: () => string;
  readonly now: () => Date;
}

/**
 * Formats an s3:// URI.
 *
 * @param bucket - The bucket name
 * @param key - The object key
 * @returns The URI
 */
export function s3Uri(bucket: string, key: string): string {
  return `s3://${bucket}/${key}`;
}
