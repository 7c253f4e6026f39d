/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

import { Construct } from "constructs";

import { ProjectAccount } from "../types";
import { AsyncInferenceEndpoint } from "./async-inference-endpoint";
import { AsyncInferenceStorage } from "./async-inference-storage";
import { EndpointAutoscaling } from "./endpoint-autoscaling";
import { SageMakerRole } from "./sagemaker-role";
import { ToolFunction } from "./tool-function";
import { VEPEndpointConfig } from "./vep-endpoint-config";

/**
 * Properties for creating the VEP endpoint.
 */
export interface VEPEndpointProps {
  /** The target account. */
  readonly account: ProjectAccount;
  /** Optional configuration; defaults apply when omitted. */
  readonly config?: VEPEndpointConfig;
}

/**
 * The protein variant-effect prediction service: an async SageMaker
 * endpoint, its bucket and scaling, and the tool Lambda in front of it.
 */
export class VEPEndpoint extends Construct {
  /** The resolved configuration. */
  public readonly config: VEPEndpointConfig;
  /** Async inference bucket and access logs. */
  public readonly storage: AsyncInferenceStorage;
  /** The SageMaker execution role. */
  public readonly sagemakerRole: SageMakerRole;
  /** The SageMaker model, endpoint configuration and endpoint. */
  public readonly inference: AsyncInferenceEndpoint;
  /** Backlog autoscaling, when enabled. */
  public readonly autoscaling?: EndpointAutoscaling;
  /** The tool Lambda. */
  public readonly toolFunction: ToolFunction;

  /**
   * Creates a new VEPEndpoint construct.
   *
   * @param scope - The scope/stack in which to define this construct
   * @param id - The id of this construct within the current scope
   * @param props - The properties for configuring this construct
   */
  constructor(scope: Construct, id: string, props: VEPEndpointProps) {
    super(scope, id);

    this.config = props.config ?? new VEPEndpointConfig();

    this.storage = new AsyncInferenceStorage(this, "Storage", {
      account: props.account,
      config: this.config
    });

    this.sagemakerRole = new SageMakerRole(this, "SageMakerRole", {
      config: this.config,
      bucket: this.storage.bucket
    });

    this.inference = new AsyncInferenceEndpoint(this, "Inference", {
      config: this.config,
      executionRole: this.sagemakerRole.role,
      bucket: this.storage.bucket
    });

    if (this.config.ENABLE_AUTOSCALING) {
      this.autoscaling = new EndpointAutoscaling(this, "Autoscaling", {
        config: this.config,
        endpoint: this.inference.endpoint
      });
    }

    this.toolFunction = new ToolFunction(this, "ToolFunction", {
      account: props.account,
      config: this.config,
      bucket: this.storage.bucket,
      endpoint: this.inference.endpoint
    });
  }
}
