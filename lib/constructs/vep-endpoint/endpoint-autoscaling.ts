/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

import { Duration, Stack } from "aws-cdk-lib";
import {
  AdjustmentType,
  ScalableTarget,
  ServiceNamespace
} from "aws-cdk-lib/aws-applicationautoscaling";
import { Metric, Stats } from "aws-cdk-lib/aws-cloudwatch";
import { Role } from "aws-cdk-lib/aws-iam";
import { CfnEndpoint } from "aws-cdk-lib/aws-sagemaker";
import { Construct } from "constructs";

import { VEPEndpointConfig } from "./vep-endpoint-config";

/**
 * Properties for creating endpoint autoscaling.
 */
export interface EndpointAutoscalingProps {
  /** The VEP endpoint configuration. */
  readonly config: VEPEndpointConfig;
  /** The endpoint to scale. */
  readonly endpoint: CfnEndpoint;
}

/**
 * Scales the endpoint's variant on its request backlog.
 *
 * Adds an instance while requests are queued with no capacity to serve
 * them and removes one once that backlog has cleared.
 */
export class EndpointAutoscaling extends Construct {
  /** The scalable target registered for the endpoint variant. */
  public readonly scalableTarget: ScalableTarget;

  /**
   * Creates a new EndpointAutoscaling construct.
   *
   * @param scope - The scope/stack in which to define this construct
   * @param id - The id of this construct within the current scope
   * @param props - The properties for configuring this construct
   */
  constructor(scope: Construct, id: string, props: EndpointAutoscalingProps) {
    super(scope, id);

    const { config } = props;
    const stack = Stack.of(this);

    // Application Auto Scaling uses its service-linked role for SageMaker.
    const scalingRole = Role.fromRoleArn(
      this,
      "ScalingRole",
      `arn:${stack.partition}:iam::${stack.account}:role/aws-service-role/sagemaker.application-autoscaling.amazonaws.com/AWSServiceRoleForApplicationAutoScaling_SageMakerEndpoint`,
      { mutable: false }
    );

    this.scalableTarget = new ScalableTarget(this, "ScalableTarget", {
      serviceNamespace: ServiceNamespace.SAGEMAKER,
      resourceId: `endpoint/${config.ENDPOINT_NAME}/variant/${config.VARIANT_NAME}`,
      scalableDimension: "sagemaker:variant:DesiredInstanceCount",
      minCapacity: config.MIN_CAPACITY,
      maxCapacity: config.MAX_CAPACITY,
      role: scalingRole
    });
    this.scalableTarget.node.addDependency(props.endpoint);

    const backlogWithoutCapacity = new Metric({
      namespace: "AWS/SageMaker",
      metricName: "HasBacklogWithoutCapacity",
      dimensionsMap: { EndpointName: config.ENDPOINT_NAME },
      statistic: Stats.AVERAGE,
      period: Duration.minutes(1)
    });

    this.scalableTarget.scaleOnMetric("BacklogScaling", {
      metric: backlogWithoutCapacity,
      adjustmentType: AdjustmentType.CHANGE_IN_CAPACITY,
      scalingSteps: [
        { upper: 0, change: -1 },
        { lower: 1, change: +1 }
      ],
      cooldown: Duration.seconds(config.SCALING_COOLDOWN_SECONDS),
      evaluationPeriods: 2
    });
  }
}
