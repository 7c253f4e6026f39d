/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

/**
 * Capability interfaces the tool handlers depend on.
 *
 * The AWS SDK adapters in `aws-adapters.ts` implement these for the deployed
 * function. Tests substitute in-memory implementations.
 */

/** Whether a failure came back from the service or never reached it. */
export type ServiceErrorKind = "service" | "connection";

/**
 * An error raised by an adapter, carrying the service's error name.
 */
export class ServiceError extends Error {
  /**
   * Creates a new ServiceError.
   *
   * @param message - The error message
   * @param code - The service error name (e.g. "AccessDenied", "ModelError")
   * @param kind - Whether the service answered or the connection failed
   * @param statusCode - The HTTP status returned by the service, when there was one
   */
  constructor(
    message: string,
    public readonly code: string,
    public readonly kind: ServiceErrorKind = "service",
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = "ServiceError";
  }
}

/** Raised by {@link ObjectStore} implementations. */
export class StorageError extends ServiceError {
  constructor(
    message: string,
    code: string,
    kind: ServiceErrorKind = "service",
    statusCode?: number
  ) {
    super(message, code, kind, statusCode);
    this.name = "StorageError";
  }
}

/** Raised by {@link AsyncInferenceClient} implementations. */
export class InferenceError extends ServiceError {
  constructor(
    message: string,
    code: string,
    kind: ServiceErrorKind = "service",
    statusCode?: number
  ) {
    super(message, code, kind, statusCode);
    this.name = "InferenceError";
  }
}

/** Metadata returned when probing an object. */
export interface ObjectMetadata {
  readonly lastModified?: Date;
  readonly contentLength?: number;
}

/**
 * Object storage scoped to a single bucket.
 */
export interface ObjectStore {
  /** The bucket every key is resolved against. */
  readonly bucket: string;

  put(key: string, body: string, contentType: string): Promise<void>;

  /**
   * Reads object metadata.
   *
   * @returns The metadata, or undefined when the object does not exist
   */
  head(key: string): Promise<ObjectMetadata | undefined>;

  get(key: string): Promise<string>;
}

export interface AsyncInferenceSubmission {
  /** The s3:// location of the uploaded request body. */
  readonly inputLocation: string;
  readonly inferenceId: string;
  /** Opaque attributes forwarded to the model container. */
  readonly customAttributes: string;
}

export interface AsyncInferenceReceipt {
  readonly inferenceId?: string;
  readonly outputLocation?: string;
  readonly failureLocation?: string;
}

/**
 * Submits requests to an asynchronous inference endpoint.
 */
export interface AsyncInferenceClient {
  readonly endpointName: string;

  submit(request: AsyncInferenceSubmission): Promise<AsyncInferenceReceipt>;
}

export type MetricUnit = "Count" | "Milliseconds" | "None";

export interface MetricDatum {
  readonly name: string;
  readonly value: number;
  readonly unit: MetricUnit;
  readonly dimensions: Record<string, string>;
  readonly timestamp: Date;
}

/**
 * Destination for custom metrics.
 */
export interface MetricsSink {
  publish(namespace: string, datums: MetricDatum[]): Promise<void>;
}
