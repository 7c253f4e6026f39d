/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

import { BaseConfig, ConfigType } from "../types";

/**
 * GPU instance types the protein language model can be hosted on.
 */
export const GPU_INSTANCE_TYPES: readonly string[] = [
  "ml.g6.2xlarge",
  "ml.g6.4xlarge",
  "ml.g6.8xlarge",
  "ml.g6.12xlarge",
  "ml.g6e.2xlarge",
  "ml.g6e.4xlarge",
  "ml.g6e.8xlarge",
  "ml.g6e.12xlarge",
  "ml.g5.2xlarge",
  "ml.g5.4xlarge",
  "ml.g5.8xlarge",
  "ml.g5.12xlarge",
  "ml.p4d.24xlarge",
  "ml.p3.2xlarge",
  "ml.p3.8xlarge",
  "ml.p3.16xlarge"
];

const BUCKET_NAME_PATTERN = /^[a-z0-9][a-z0-9-]*[a-z0-9]$/;

/**
 * Configuration class for the VEP endpoint constructs.
 *
 * Covers the async inference bucket, the SageMaker model and endpoint,
 * endpoint autoscaling and the tool Lambda that fronts the endpoint.
 */
export class VEPEndpointConfig extends BaseConfig {
  /** The SageMaker instance type hosting the model. */
  public readonly INSTANCE_TYPE: string;
  /** The Hugging Face model id loaded by the container. */
  public readonly MODEL_ID: string;
  /** The name of the SageMaker endpoint. */
  public readonly ENDPOINT_NAME: string;
  /** The name of the production variant. */
  public readonly VARIANT_NAME: string;
  /** The minimum instance count kept by autoscaling. */
  public readonly MIN_CAPACITY: number;
  /** The maximum instance count autoscaling may reach. */
  public readonly MAX_CAPACITY: number;
  /** Requests an instance processes at once. */
  public readonly MAX_CONCURRENT_INVOCATIONS: number;
  /** Whether to attach backlog-driven autoscaling to the endpoint. */
  public readonly ENABLE_AUTOSCALING: boolean;
  /** Seconds to wait after a scaling activity before scaling again. */
  public readonly SCALING_COOLDOWN_SECONDS: number;
  /** Explicit name for the async inference bucket; generated when unset. */
  public readonly BUCKET_NAME?: string;
  /** Key prefix for request payloads. */
  public readonly INPUT_PREFIX: string;
  /** Key prefix SageMaker writes results under. */
  public readonly OUTPUT_PREFIX: string;
  /** Key prefix SageMaker writes failures under. */
  public readonly FAILURE_PREFIX: string;
  /** Key prefix for model artifacts the endpoint may read. */
  public readonly MODEL_PREFIX: string;
  /** Serving container image; the region's Hugging Face PyTorch image when unset. */
  public readonly CONTAINER_IMAGE_URI?: string;
  /** s3:// URL of a model.tar.gz carrying custom inference code. */
  public readonly MODEL_DATA_URL?: string;
  /** Entry script inside MODEL_DATA_URL. */
  public readonly INFERENCE_PROGRAM: string;
  /** The name of the tool Lambda. */
  public readonly LAMBDA_FUNCTION_NAME: string;
  /** Memory for the tool Lambda in MB. */
  public readonly LAMBDA_MEMORY_SIZE: number;
  /** Timeout for the tool Lambda in seconds. */
  public readonly LAMBDA_TIMEOUT_SECONDS: number;
  /** Log level passed to the tool Lambda. */
  public readonly LOG_LEVEL: string;
  /** Namespace of the tool Lambda's custom metrics. */
  public readonly METRICS_NAMESPACE: string;
  /** SSM parameters that receive the tool Lambda ARN. */
  public readonly LAMBDA_ARN_PARAMETER_NAMES: string[];

  /**
   * Creates an instance of VEPEndpointConfig.
   *
   * @param config - The configuration object for the VEP endpoint
   * @throws Error if the resolved configuration is invalid
   */
  constructor(config: ConfigType = {}) {
    super(config);
    this.INSTANCE_TYPE = this.readString("INSTANCE_TYPE", "ml.g6.2xlarge");
    this.MODEL_ID = this.readString("MODEL_ID", "chandar-lab/AMPLIFY_350M");
    this.ENDPOINT_NAME = this.readString(
      "ENDPOINT_NAME",
      "amplify-vep-endpoint"
    );
    this.VARIANT_NAME = this.readString("VARIANT_NAME", "primary");
    this.MIN_CAPACITY = this.readNumber("MIN_CAPACITY", 1);
    this.MAX_CAPACITY = this.readNumber("MAX_CAPACITY", 2);
    this.MAX_CONCURRENT_INVOCATIONS = this.readNumber(
      "MAX_CONCURRENT_INVOCATIONS",
      4
    );
    this.ENABLE_AUTOSCALING = this.readBoolean("ENABLE_AUTOSCALING", true);
    this.SCALING_COOLDOWN_SECONDS = this.readNumber(
      "SCALING_COOLDOWN_SECONDS",
      300
    );
    this.BUCKET_NAME = this.readOptionalString("BUCKET_NAME");
    this.INPUT_PREFIX = this.readString("INPUT_PREFIX", "async-inference-input");
    this.OUTPUT_PREFIX = this.readString(
      "OUTPUT_PREFIX",
      "async-inference-output"
    );
    this.FAILURE_PREFIX = this.readString(
      "FAILURE_PREFIX",
      "async-inference-failures"
    );
    this.MODEL_PREFIX = this.readString("MODEL_PREFIX", "model-artifacts");
    this.CONTAINER_IMAGE_URI = this.readOptionalString("CONTAINER_IMAGE_URI");
    this.MODEL_DATA_URL = this.readOptionalString("MODEL_DATA_URL");
    this.INFERENCE_PROGRAM = this.readString("INFERENCE_PROGRAM", "inference.py");
    this.LAMBDA_FUNCTION_NAME = this.readString(
      "LAMBDA_FUNCTION_NAME",
      "vep-tools"
    );
    this.LAMBDA_MEMORY_SIZE = this.readNumber("LAMBDA_MEMORY_SIZE", 256);
    this.LAMBDA_TIMEOUT_SECONDS = this.readNumber("LAMBDA_TIMEOUT_SECONDS", 300);
    this.LOG_LEVEL = this.readString("LOG_LEVEL", "INFO");
    this.METRICS_NAMESPACE = this.readString(
      "METRICS_NAMESPACE",
      "SageMaker/AsyncEndpoint/Lambda"
    );
    this.LAMBDA_ARN_PARAMETER_NAMES = this.readStringArray(
      "LAMBDA_ARN_PARAMETER_NAMES",
      ["/sagemaker-async/lambda-function-arn", "/protein-agent/lambda-function-arn"]
    );
    this.validateConfig();
  }

  protected collectErrors(): string[] {
    const errors: string[] = [];

    if (!GPU_INSTANCE_TYPES.includes(this.INSTANCE_TYPE)) {
      errors.push(
        `Instance type must be GPU-enabled. Got: ${this.INSTANCE_TYPE}`
      );
    }

    if (this.MIN_CAPACITY < 0) {
      errors.push("Minimum capacity cannot be negative");
    }
    if (this.MAX_CAPACITY < 1) {
      errors.push("Maximum capacity must be at least 1");
    }
    if (this.MIN_CAPACITY > this.MAX_CAPACITY) {
      errors.push(
        `Minimum capacity (${this.MIN_CAPACITY}) cannot exceed maximum capacity (${this.MAX_CAPACITY})`
      );
    }

    if (
      this.MAX_CONCURRENT_INVOCATIONS < 1 ||
      this.MAX_CONCURRENT_INVOCATIONS > 1000
    ) {
      errors.push("Max concurrent invocations must be between 1 and 1000");
    }

    if (this.MODEL_ID.trim() === "") {
      errors.push("Model ID cannot be empty");
    }
    if (this.ENDPOINT_NAME.trim() === "") {
      errors.push("Endpoint name cannot be empty");
    }

    if (this.BUCKET_NAME !== undefined) {
      errors.push(...bucketNameErrors(this.BUCKET_NAME));
    }
    errors.push(
      ...prefixErrors("INPUT_PREFIX", this.INPUT_PREFIX),
      ...prefixErrors("OUTPUT_PREFIX", this.OUTPUT_PREFIX),
      ...prefixErrors("FAILURE_PREFIX", this.FAILURE_PREFIX),
      ...prefixErrors("MODEL_PREFIX", this.MODEL_PREFIX)
    );

    if (
      this.MODEL_DATA_URL !== undefined &&
      !this.MODEL_DATA_URL.startsWith("s3://")
    ) {
      errors.push("Model data URL must be an s3:// URL");
    }

    if (this.LAMBDA_MEMORY_SIZE < 128 || this.LAMBDA_MEMORY_SIZE > 10240) {
      errors.push("Lambda memory size must be between 128 and 10240 MB");
    }
    if (this.LAMBDA_TIMEOUT_SECONDS < 1 || this.LAMBDA_TIMEOUT_SECONDS > 900) {
      errors.push("Lambda timeout must be between 1 and 900 seconds");
    }

    if (this.LAMBDA_ARN_PARAMETER_NAMES.length === 0) {
      errors.push("At least one Lambda ARN parameter name is required");
    }

    return errors;
  }
}

/**
 * Checks an object key prefix. The endpoint and the tool Lambda join
 * prefixes with "/" themselves, so a prefix must be non-empty and carry no
 * leading or trailing slash.
 *
 * @param field - The configuration field name
 * @param prefix - The prefix value
 * @returns One message per broken rule
 */
export function prefixErrors(field: string, prefix: string): string[] {
  const errors: string[] = [];
  if (prefix.trim() === "") {
    errors.push(`${field} cannot be empty`);
  } else if (prefix.startsWith("/") || prefix.endsWith("/")) {
    errors.push(`${field} must not start or end with '/'. Got: ${prefix}`);
  }
  return errors;
}

/**
 * Checks an S3 bucket name against the naming rules.
 *
 * @param name - The bucket name
 * @returns One message per broken rule
 */
export function bucketNameErrors(name: string): string[] {
  const errors: string[] = [];
  if (name.length < 3 || name.length > 63) {
    errors.push("Bucket name must be between 3 and 63 characters");
  }
  if (!BUCKET_NAME_PATTERN.test(name)) {
    errors.push(
      "Bucket name must contain only lowercase letters, numbers and hyphens, and start and end with a letter or number"
    );
  }
  if (name.includes("--")) {
    errors.push("Bucket name cannot contain consecutive hyphens");
  }
  return errors;
}
