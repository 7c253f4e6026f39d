/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

import { Stack } from "aws-cdk-lib";
import {
  Effect,
  ManagedPolicy,
  PolicyStatement,
  Role,
  ServicePrincipal
} from "aws-cdk-lib/aws-iam";
import { IBucket } from "aws-cdk-lib/aws-s3";
import { NagSuppressions } from "cdk-nag";
import { Construct } from "constructs";

import { VEPEndpointConfig } from "./vep-endpoint-config";

/** Account that publishes the AWS Deep Learning Containers. */
export const DLC_REGISTRY_ACCOUNT = "763104351884";

/**
 * Properties for creating the SageMaker execution role.
 */
export interface SageMakerRoleProps {
  /** The VEP endpoint configuration. */
  readonly config: VEPEndpointConfig;
  /** The async inference bucket. */
  readonly bucket: IBucket;
}

/**
 * Splits an s3:// URL into its bucket and key.
 *
 * @param url - The s3:// URL
 * @returns The bucket and key, or undefined when the URL has no key
 */
export function parseS3Url(
  url: string
): { bucket: string; key: string } | undefined {
  const match = /^s3:\/\/([^/]+)\/(.+)$/.exec(url);
  return match ? { bucket: match[1], key: match[2] } : undefined;
}

/**
 * Execution role assumed by the SageMaker model.
 *
 * Grants image pulls, endpoint logging and metrics, reads of request
 * payloads and model artifacts, and writes of results and failures.
 */
export class SageMakerRole extends Construct {
  /** The SageMaker execution role. */
  public readonly role: Role;

  /**
   * Creates a new SageMakerRole construct.
   *
   * @param scope - The scope/stack in which to define this construct
   * @param id - The id of this construct within the current scope
   * @param props - The properties for configuring this construct
   */
  constructor(scope: Construct, id: string, props: SageMakerRoleProps) {
    super(scope, id);

    this.role = new Role(this, "Role", {
      assumedBy: new ServicePrincipal("sagemaker.amazonaws.com"),
      description:
        "Allows the protein VEP endpoint to pull its image, read requests and write results"
    });

    const policy = new ManagedPolicy(this, "Policy", {
      statements: this.createStatements(props)
    });
    this.role.addManagedPolicy(policy);

    NagSuppressions.addResourceSuppressions(
      policy,
      [
        {
          id: "AwsSolutions-IAM5",
          reason:
            "ECR authorization tokens and CloudWatch metrics do not support resource scoping; log and object access is limited to the endpoint's log groups and bucket prefixes"
        }
      ],
      true
    );
  }

  private createStatements(props: SageMakerRoleProps): PolicyStatement[] {
    const stack = Stack.of(this);
    const { config, bucket } = props;

    const statements = [
      new PolicyStatement({
        effect: Effect.ALLOW,
        actions: ["ecr:GetAuthorizationToken"],
        resources: ["*"]
      }),
      new PolicyStatement({
        effect: Effect.ALLOW,
        actions: [
          "ecr:BatchCheckLayerAvailability",
          "ecr:GetDownloadUrlForLayer",
          "ecr:BatchGetImage"
        ],
        resources: [
          `arn:${stack.partition}:ecr:${stack.region}:${DLC_REGISTRY_ACCOUNT}:repository/*`,
          `arn:${stack.partition}:ecr:${stack.region}:${stack.account}:repository/*`
        ]
      }),
      new PolicyStatement({
        effect: Effect.ALLOW,
        actions: [
          "logs:CreateLogGroup",
          "logs:CreateLogStream",
          "logs:PutLogEvents",
          "logs:DescribeLogStreams"
        ],
        resources: [
          `arn:${stack.partition}:logs:${stack.region}:${stack.account}:log-group:/aws/sagemaker/*`
        ]
      }),
      new PolicyStatement({
        effect: Effect.ALLOW,
        actions: ["cloudwatch:PutMetricData"],
        resources: ["*"]
      }),
      new PolicyStatement({
        effect: Effect.ALLOW,
        actions: ["s3:GetObject"],
        resources: [
          bucket.arnForObjects(`${config.INPUT_PREFIX}/*`),
          bucket.arnForObjects(`${config.MODEL_PREFIX}/*`)
        ]
      }),
      new PolicyStatement({
        effect: Effect.ALLOW,
        actions: ["s3:PutObject"],
        resources: [
          bucket.arnForObjects(`${config.OUTPUT_PREFIX}/*`),
          bucket.arnForObjects(`${config.FAILURE_PREFIX}/*`)
        ]
      }),
      new PolicyStatement({
        effect: Effect.ALLOW,
        actions: ["s3:ListBucket"],
        resources: [bucket.bucketArn]
      })
    ];

    // Model artifacts may live outside the inference bucket.
    const modelData = config.MODEL_DATA_URL
      ? parseS3Url(config.MODEL_DATA_URL)
      : undefined;
    if (modelData) {
      statements.push(
        new PolicyStatement({
          effect: Effect.ALLOW,
          actions: ["s3:GetObject"],
          resources: [
            `arn:${stack.partition}:s3:::${modelData.bucket}/${modelData.key}`
          ]
        })
      );
    }
    return statements;
  }
}
