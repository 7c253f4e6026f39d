/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

import { App, CfnOutput, Environment, Stack, StackProps } from "aws-cdk-lib";
import { NagSuppressions } from "cdk-nag";

import { DeploymentConfig } from "../bin/deployment/load-deployment";
import { VEPEndpoint } from "./constructs/vep-endpoint/vep-endpoint";
import { VEPEndpointConfig } from "./constructs/vep-endpoint/vep-endpoint-config";

export interface VEPEndpointStackProps extends StackProps {
  readonly env: Environment;
  readonly deployment: DeploymentConfig;
}

export class VEPEndpointStack extends Stack {
  public readonly resources: VEPEndpoint;

  /**
   * Constructor for the protein VEP endpoint cdk stack
   * @param parent the parent cdk app object
   * @param name the name of the stack to be created in the parent app object.
   * @param props the properties required to create the stack.
   * @returns the created VEPEndpointStack object
   */
  constructor(parent: App, name: string, props: VEPEndpointStackProps) {
    super(parent, name, {
      terminationProtection: props.deployment.account.prodLike,
      description:
        "Asynchronous protein variant-effect prediction endpoint and its agent tool Lambda",
      ...props
    });

    const config = props.deployment.vepEndpointConfig
      ? new VEPEndpointConfig(props.deployment.vepEndpointConfig)
      : undefined;

    this.resources = new VEPEndpoint(this, "VEPEndpoint", {
      account: props.deployment.account,
      config
    });

    this.createOutputs();
    this.addNagSuppressions();
  }

  private createOutputs(): void {
    const { config, storage, inference, toolFunction } = this.resources;

    new CfnOutput(this, "EndpointName", {
      value: inference.endpointName,
      description: "Name of the async SageMaker endpoint"
    });
    new CfnOutput(this, "BucketName", {
      value: storage.bucket.bucketName,
      description: "Bucket holding async inference requests and results"
    });
    new CfnOutput(this, "InputPath", {
      value: `s3://${storage.bucket.bucketName}/${config.INPUT_PREFIX}/`,
      description: "Location of submitted request payloads"
    });
    new CfnOutput(this, "OutputPath", {
      value: inference.outputPath,
      description: "Location of prediction results"
    });
    new CfnOutput(this, "FailurePath", {
      value: inference.failurePath,
      description: "Location of prediction failures"
    });
    new CfnOutput(this, "LambdaFunctionArn", {
      value: toolFunction.function.functionArn,
      description: "ARN of the tool Lambda"
    });
    new CfnOutput(this, "ModelId", { value: config.MODEL_ID });
    new CfnOutput(this, "InstanceType", { value: config.INSTANCE_TYPE });
    new CfnOutput(this, "AutoscalingRange", {
      value: config.ENABLE_AUTOSCALING
        ? `${config.MIN_CAPACITY}-${config.MAX_CAPACITY}`
        : "disabled"
    });
  }

  private addNagSuppressions(): void {
    NagSuppressions.addResourceSuppressions(
      this.resources.storage.accessLogBucket,
      [
        {
          id: "AwsSolutions-S1",
          reason: "This bucket is the server access log destination"
        }
      ]
    );
    NagSuppressions.addResourceSuppressions(
      this.resources.toolFunction.function,
      [
        {
          id: "AwsSolutions-L1",
          reason: "The tool Lambda is pinned to the Node.js 20 runtime it is built and tested on"
        }
      ]
    );
    // Bucket auto-deletion in non prod-like accounts is backed by a
    // CDK-managed provider function and role.
    NagSuppressions.addStackSuppressions(this, [
      {
        id: "AwsSolutions-IAM4",
        reason:
          "The CDK-managed auto-delete provider uses the AWS managed Lambda basic execution policy"
      },
      {
        id: "AwsSolutions-L1",
        reason:
          "The CDK-managed auto-delete provider runtime is controlled by the CDK framework"
      }
    ]);
  }
}
