/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

import {
  CloudWatchClient,
  PutMetricDataCommand
} from "@aws-sdk/client-cloudwatch";
import {
  GetObjectCommand,
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException
} from "@aws-sdk/client-s3";
import {
  InvokeEndpointAsyncCommand,
  SageMakerRuntimeClient,
  SageMakerRuntimeServiceException
} from "@aws-sdk/client-sagemaker-runtime";

import {
  AsyncInferenceClient,
  AsyncInferenceReceipt,
  AsyncInferenceSubmission,
  InferenceError,
  MetricDatum,
  MetricsSink,
  ObjectMetadata,
  ObjectStore,
  StorageError
} from "./ports";

/** Seconds SageMaker waits for the container to finish one request. */
export const INVOCATION_TIMEOUT_SECONDS = 3600;

/** Seconds a queued request stays valid before SageMaker drops it. */
export const REQUEST_TTL_SECONDS = 21600;

const NOT_FOUND_CODES = new Set(["NotFound", "NoSuchKey"]);

function toStorageError(error: unknown): StorageError {
  if (error instanceof S3ServiceException) {
    return new StorageError(
      error.message,
      error.name,
      "service",
      error.$metadata.httpStatusCode
    );
  }
  if (error instanceof Error) {
    return new StorageError(error.message, error.name, "connection");
  }
  return new StorageError(String(error), "UnknownError", "connection");
}

function toInferenceError(error: unknown): InferenceError {
  if (error instanceof SageMakerRuntimeServiceException) {
    return new InferenceError(
      error.message,
      error.name,
      "service",
      error.$metadata.httpStatusCode
    );
  }
  if (error instanceof Error) {
    return new InferenceError(error.message, error.name, "connection");
  }
  return new InferenceError(String(error), "UnknownError", "connection");
}

/**
 * {@link ObjectStore} backed by Amazon S3.
 */
export class S3ObjectStore implements ObjectStore {
  constructor(
    private readonly client: S3Client,
    public readonly bucket: string
  ) {}

  async put(key: string, body: string, contentType: string): Promise<void> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: body,
          ContentType: contentType
        })
      );
    } catch (error) {
      throw toStorageError(error);
    }
  }

  async head(key: string): Promise<ObjectMetadata | undefined> {
    try {
      const response = await this.client.send(
        new HeadObjectCommand({ Bucket: this.bucket, Key: key })
      );
      return {
        lastModified: response.LastModified,
        contentLength: response.ContentLength
      };
    } catch (error) {
      const storageError = toStorageError(error);
      if (
        NOT_FOUND_CODES.has(storageError.code) ||
        (storageError.statusCode === 404 && storageError.code !== "NoSuchBucket")
      ) {
        return undefined;
      }
      throw storageError;
    }
  }

  async get(key: string): Promise<string> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: key })
      );
      return (await response.Body?.transformToString("utf-8")) ?? "";
    } catch (error) {
      throw toStorageError(error);
    }
  }
}

/**
 * {@link AsyncInferenceClient} backed by a SageMaker asynchronous endpoint.
 */
export class SageMakerAsyncInference implements AsyncInferenceClient {
  constructor(
    private readonly client: SageMakerRuntimeClient,
    public readonly endpointName: string
  ) {}

  async submit(
    request: AsyncInferenceSubmission
  ): Promise<AsyncInferenceReceipt> {
    try {
      const response = await this.client.send(
        new InvokeEndpointAsyncCommand({
          EndpointName: this.endpointName,
          InputLocation: request.inputLocation,
          InferenceId: request.inferenceId,
          CustomAttributes: request.customAttributes,
          ContentType: "application/json",
          Accept: "application/json",
          InvocationTimeoutSeconds: INVOCATION_TIMEOUT_SECONDS,
          RequestTTLSeconds: REQUEST_TTL_SECONDS
        })
      );
      return {
        inferenceId: response.InferenceId,
        outputLocation: response.OutputLocation,
        failureLocation: response.FailureLocation
      };
    } catch (error) {
      throw toInferenceError(error);
    }
  }
}

/**
 * {@link MetricsSink} publishing to CloudWatch custom metrics.
 */
export class CloudWatchMetricsSink implements MetricsSink {
  constructor(private readonly client: CloudWatchClient) {}

  async publish(namespace: string, datums: MetricDatum[]): Promise<void> {
    await this.client.send(
      new PutMetricDataCommand({
        Namespace: namespace,
        MetricData: datums.map((datum) => ({
          MetricName: datum.name,
          Value: datum.value,
          Unit: datum.unit,
          Timestamp: datum.timestamp,
          Dimensions: Object.entries(datum.dimensions).map(([Name, Value]) => ({
            Name,
            Value
          }))
        }))
      })
    );
  }
}
