/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

import { Stack } from "aws-cdk-lib";
import { IRole } from "aws-cdk-lib/aws-iam";
import { IBucket } from "aws-cdk-lib/aws-s3";
import {
  CfnEndpoint,
  CfnEndpointConfig,
  CfnModel
} from "aws-cdk-lib/aws-sagemaker";
import { Construct } from "constructs";

import { DLC_REGISTRY_ACCOUNT } from "./sagemaker-role";
import { VEPEndpointConfig } from "./vep-endpoint-config";

/** Hugging Face PyTorch inference image used when no image is configured. */
export const DEFAULT_IMAGE_REPOSITORY = "huggingface-pytorch-inference";
export const DEFAULT_IMAGE_TAG =
  "2.1.0-transformers4.37.0-gpu-py310-cu118-ubuntu20.04";

/** Seconds the container may take to pass its first health check. */
const STARTUP_HEALTH_CHECK_TIMEOUT_SECONDS = 600;
/** Seconds allowed to download model artifacts onto an instance. */
const MODEL_DATA_DOWNLOAD_TIMEOUT_SECONDS = 900;

/**
 * Properties for creating the async inference endpoint.
 */
export interface AsyncInferenceEndpointProps {
  /** The VEP endpoint configuration. */
  readonly config: VEPEndpointConfig;
  /** The role SageMaker assumes for the model. */
  readonly executionRole: IRole;
  /** The async inference bucket. */
  readonly bucket: IBucket;
}

/**
 * SageMaker model, endpoint configuration and endpoint serving protein
 * language model predictions asynchronously.
 */
export class AsyncInferenceEndpoint extends Construct {
  /** The SageMaker model. */
  public readonly model: CfnModel;
  /** The SageMaker endpoint configuration. */
  public readonly endpointConfig: CfnEndpointConfig;
  /** The SageMaker endpoint. */
  public readonly endpoint: CfnEndpoint;
  /** The name of the endpoint. */
  public readonly endpointName: string;
  /** The s3:// prefix results are written under. */
  public readonly outputPath: string;
  /** The s3:// prefix failures are written under. */
  public readonly failurePath: string;

  /**
   * Creates a new AsyncInferenceEndpoint construct.
   *
   * @param scope - The scope/stack in which to define this construct
   * @param id - The id of this construct within the current scope
   * @param props - The properties for configuring this construct
   */
  constructor(
    scope: Construct,
    id: string,
    props: AsyncInferenceEndpointProps
  ) {
    super(scope, id);

    const { config, bucket } = props;
    this.endpointName = config.ENDPOINT_NAME;
    this.outputPath = `s3://${bucket.bucketName}/${config.OUTPUT_PREFIX}/`;
    this.failurePath = `s3://${bucket.bucketName}/${config.FAILURE_PREFIX}/`;

    this.model = this.createModel(props);
    this.endpointConfig = this.createEndpointConfig(config);
    this.endpoint = new CfnEndpoint(this, "Endpoint", {
      endpointName: this.endpointName,
      endpointConfigName: this.endpointConfig.attrEndpointConfigName
    });
  }

  /**
   * Resolves the serving image for the configured or default container.
   */
  private imageUri(config: VEPEndpointConfig): string {
    if (config.CONTAINER_IMAGE_URI) {
      return config.CONTAINER_IMAGE_URI;
    }
    const stack = Stack.of(this);
    return `${DLC_REGISTRY_ACCOUNT}.dkr.ecr.${stack.region}.${stack.urlSuffix}/${DEFAULT_IMAGE_REPOSITORY}:${DEFAULT_IMAGE_TAG}`;
  }

  private createModel(props: AsyncInferenceEndpointProps): CfnModel {
    const { config } = props;
    const environment: Record<string, string> = {
      HF_MODEL_ID: config.MODEL_ID,
      MODEL_ID: config.MODEL_ID,
      HF_TASK: "fill-mask",
      HF_MODEL_TRUST_REMOTE_CODE: "true",
      SAGEMAKER_CONTAINER_LOG_LEVEL: "20",
      SAGEMAKER_REGION: Stack.of(this).region,
      SAGEMAKER_MODEL_SERVER_TIMEOUT: "3600"
    };
    if (config.MODEL_DATA_URL) {
      environment.SAGEMAKER_PROGRAM = config.INFERENCE_PROGRAM;
      environment.SAGEMAKER_SUBMIT_DIRECTORY = "/opt/ml/model/code";
    }

    const model = new CfnModel(this, "Model", {
      executionRoleArn: props.executionRole.roleArn,
      primaryContainer: {
        image: this.imageUri(config),
        modelDataUrl: config.MODEL_DATA_URL,
        environment
      }
    });
    model.node.addDependency(props.executionRole);
    return model;
  }

  private createEndpointConfig(config: VEPEndpointConfig): CfnEndpointConfig {
    return new CfnEndpointConfig(this, "EndpointConfig", {
      productionVariants: [
        {
          variantName: config.VARIANT_NAME,
          modelName: this.model.attrModelName,
          instanceType: config.INSTANCE_TYPE,
          initialInstanceCount: Math.max(1, config.MIN_CAPACITY),
          initialVariantWeight: 1,
          containerStartupHealthCheckTimeoutInSeconds:
            STARTUP_HEALTH_CHECK_TIMEOUT_SECONDS,
          modelDataDownloadTimeoutInSeconds: MODEL_DATA_DOWNLOAD_TIMEOUT_SECONDS
        }
      ],
      asyncInferenceConfig: {
        outputConfig: {
          s3OutputPath: this.outputPath,
          s3FailurePath: this.failurePath
        },
        clientConfig: {
          maxConcurrentInvocationsPerInstance: config.MAX_CONCURRENT_INVOCATIONS
        }
      }
    });
  }
}
