/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

import * as path from "path";

import { Duration } from "aws-cdk-lib";
import {
  Effect,
  ManagedPolicy,
  PolicyStatement,
  Role,
  ServicePrincipal
} from "aws-cdk-lib/aws-iam";
import { Runtime } from "aws-cdk-lib/aws-lambda";
import { NodejsFunction } from "aws-cdk-lib/aws-lambda-nodejs";
import { LogGroup, RetentionDays } from "aws-cdk-lib/aws-logs";
import { IBucket } from "aws-cdk-lib/aws-s3";
import { CfnEndpoint } from "aws-cdk-lib/aws-sagemaker";
import { StringParameter } from "aws-cdk-lib/aws-ssm";
import { NagSuppressions } from "cdk-nag";
import { Construct } from "constructs";

import { ProjectAccount, removalPolicyFor } from "../types";
import { VEPEndpointConfig } from "./vep-endpoint-config";

/** Source of the tool Lambda handler. */
export const TOOL_FUNCTION_ENTRY = path.join(
  __dirname,
  "../../../lambda/vep-tools/index.ts"
);

/**
 * Properties for creating the tool function.
 */
export interface ToolFunctionProps {
  /** The target account. */
  readonly account: ProjectAccount;
  /** The VEP endpoint configuration. */
  readonly config: VEPEndpointConfig;
  /** The async inference bucket. */
  readonly bucket: IBucket;
  /** The endpoint the tools submit to. */
  readonly endpoint: CfnEndpoint;
}

/**
 * Lambda serving the `invoke_endpoint` and `get_results` tools, with its
 * role, log group and the SSM parameters that publish its ARN.
 */
export class ToolFunction extends Construct {
  /** The tool Lambda. */
  public readonly function: NodejsFunction;
  /** The role the tool Lambda runs as. */
  public readonly role: Role;
  /** The tool Lambda's log group. */
  public readonly logGroup: LogGroup;
  /** SSM parameters holding the function ARN. */
  public readonly arnParameters: StringParameter[];

  /**
   * Creates a new ToolFunction construct.
   *
   * @param scope - The scope/stack in which to define this construct
   * @param id - The id of this construct within the current scope
   * @param props - The properties for configuring this construct
   */
  constructor(scope: Construct, id: string, props: ToolFunctionProps) {
    super(scope, id);

    const { config } = props;

    this.logGroup = new LogGroup(this, "LogGroup", {
      logGroupName: `/aws/lambda/${config.LAMBDA_FUNCTION_NAME}`,
      retention: RetentionDays.ONE_MONTH,
      removalPolicy: removalPolicyFor(props.account)
    });

    this.role = this.createRole(props);

    this.function = new NodejsFunction(this, "Function", {
      functionName: config.LAMBDA_FUNCTION_NAME,
      description:
        "Submits protein sequences to the async VEP endpoint and retrieves predictions",
      entry: TOOL_FUNCTION_ENTRY,
      handler: "handler",
      runtime: Runtime.NODEJS_20_X,
      memorySize: config.LAMBDA_MEMORY_SIZE,
      timeout: Duration.seconds(config.LAMBDA_TIMEOUT_SECONDS),
      role: this.role,
      logGroup: this.logGroup,
      environment: {
        SAGEMAKER_ENDPOINT_NAME: config.ENDPOINT_NAME,
        S3_BUCKET_NAME: props.bucket.bucketName,
        S3_INPUT_PREFIX: config.INPUT_PREFIX,
        S3_OUTPUT_PREFIX: config.OUTPUT_PREFIX,
        S3_FAILURE_PREFIX: config.FAILURE_PREFIX,
        LOG_LEVEL: config.LOG_LEVEL,
        METRICS_NAMESPACE: config.METRICS_NAMESPACE
      },
      bundling: {
        externalModules: ["@aws-sdk/*"],
        sourceMap: true
      }
    });

    this.arnParameters = config.LAMBDA_ARN_PARAMETER_NAMES.map(
      (parameterName, index) =>
        new StringParameter(this, `FunctionArnParameter${index}`, {
          parameterName,
          stringValue: this.function.functionArn,
          description: "ARN of the protein VEP tool Lambda"
        })
    );
  }

  private createRole(props: ToolFunctionProps): Role {
    const { config, bucket } = props;
    const role = new Role(this, "Role", {
      assumedBy: new ServicePrincipal("lambda.amazonaws.com"),
      description:
        "Allows the protein VEP tools to submit async inference requests and read their results"
    });

    const policy = new ManagedPolicy(this, "Policy", {
      statements: [
        new PolicyStatement({
          effect: Effect.ALLOW,
          actions: ["logs:CreateLogStream", "logs:PutLogEvents"],
          resources: [
            this.logGroup.logGroupArn,
            `${this.logGroup.logGroupArn}:log-stream:*`
          ]
        }),
        new PolicyStatement({
          effect: Effect.ALLOW,
          actions: ["sagemaker:InvokeEndpointAsync"],
          // Ref of an endpoint resolves to its ARN.
          resources: [props.endpoint.ref]
        }),
        new PolicyStatement({
          effect: Effect.ALLOW,
          actions: ["s3:PutObject"],
          resources: [bucket.arnForObjects(`${config.INPUT_PREFIX}/*`)]
        }),
        new PolicyStatement({
          effect: Effect.ALLOW,
          actions: ["s3:GetObject"],
          resources: [
            bucket.arnForObjects(`${config.OUTPUT_PREFIX}/*`),
            bucket.arnForObjects(`${config.FAILURE_PREFIX}/*`)
          ]
        }),
        new PolicyStatement({
          effect: Effect.ALLOW,
          actions: ["s3:ListBucket"],
          resources: [bucket.bucketArn]
        }),
        new PolicyStatement({
          effect: Effect.ALLOW,
          actions: ["cloudwatch:PutMetricData"],
          resources: ["*"],
          conditions: {
            StringEquals: { "cloudwatch:namespace": config.METRICS_NAMESPACE }
          }
        })
      ]
    });
    role.addManagedPolicy(policy);

    NagSuppressions.addResourceSuppressions(
      policy,
      [
        {
          id: "AwsSolutions-IAM5",
          reason:
            "Object access is limited to the request, result and failure prefixes; metric publishing is limited to the tool namespace by condition"
        }
      ],
      true
    );
    return role;
  }
}
