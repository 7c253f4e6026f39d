/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

/**
 * Unit tests for VEPEndpointStack.
 */

import "source-map-support/register";

import { App, Aspects } from "aws-cdk-lib";
import { Annotations, Match, Template } from "aws-cdk-lib/assertions";
import { AwsSolutionsChecks } from "cdk-nag";

import { VEPEndpointStack } from "../lib/vep-endpoint-stack";
import {
  createTestApp,
  createTestDeploymentConfig,
  createTestEnvironment,
  generateNagReport
} from "./test-utils";

describe("VEPEndpointStack", () => {
  let app: App;

  beforeEach(() => {
    app = createTestApp();
  });

  function createStack(
    overrides?: Parameters<typeof createTestDeploymentConfig>[0]
  ): VEPEndpointStack {
    return new VEPEndpointStack(app, "VEPEndpointStack", {
      env: createTestEnvironment(),
      deployment: createTestDeploymentConfig(overrides)
    });
  }

  test("creates the endpoint, roles, function and parameters", () => {
    const stack = createStack({
      account: { id: "123456789012", region: "us-west-2", prodLike: true }
    });
    const template = Template.fromStack(stack);

    template.resourceCountIs("AWS::SageMaker::Model", 1);
    template.resourceCountIs("AWS::SageMaker::EndpointConfig", 1);
    template.resourceCountIs("AWS::SageMaker::Endpoint", 1);
    template.resourceCountIs("AWS::IAM::Role", 2);
    template.resourceCountIs("AWS::Lambda::Function", 1);
    template.resourceCountIs("AWS::SSM::Parameter", 2);
    template.resourceCountIs("AWS::Logs::LogGroup", 1);
    template.resourceCountIs("AWS::S3::Bucket", 2);
  });

  test("configures the endpoint for asynchronous inference", () => {
    const template = Template.fromStack(createStack());

    template.hasResourceProperties("AWS::SageMaker::Endpoint", {
      EndpointName: "amplify-vep-endpoint"
    });
    template.hasResourceProperties("AWS::SageMaker::EndpointConfig", {
      ProductionVariants: [
        Match.objectLike({
          VariantName: "primary",
          InstanceType: "ml.g6.2xlarge",
          InitialInstanceCount: 1,
          ContainerStartupHealthCheckTimeoutInSeconds: 600,
          ModelDataDownloadTimeoutInSeconds: 900
        })
      ],
      AsyncInferenceConfig: {
        ClientConfig: { MaxConcurrentInvocationsPerInstance: 4 },
        OutputConfig: {
          S3OutputPath: Match.anyValue(),
          S3FailurePath: Match.anyValue()
        }
      }
    });
    template.hasResourceProperties("AWS::SageMaker::Model", {
      PrimaryContainer: Match.objectLike({
        Environment: Match.objectLike({
          HF_MODEL_ID: "chandar-lab/AMPLIFY_350M",
          MODEL_ID: "chandar-lab/AMPLIFY_350M",
          SAGEMAKER_REGION: "us-west-2"
        }),
        ModelDataUrl: Match.absent()
      })
    });
  });

  test("uses a configured image and model data", () => {
    const template = Template.fromStack(
      createStack({
        vepEndpointConfig: {
          CONTAINER_IMAGE_URI:
            "123456789012.dkr.ecr.us-west-2.amazonaws.com/vep:latest",
          MODEL_DATA_URL: "s3://test-models/amplify/model.tar.gz"
        }
      })
    );

    template.hasResourceProperties("AWS::SageMaker::Model", {
      PrimaryContainer: {
        Image: "123456789012.dkr.ecr.us-west-2.amazonaws.com/vep:latest",
        ModelDataUrl: "s3://test-models/amplify/model.tar.gz",
        Environment: Match.objectLike({
          SAGEMAKER_PROGRAM: "inference.py",
          SAGEMAKER_SUBMIT_DIRECTORY: "/opt/ml/model/code"
        })
      }
    });
  });

  test("secures the async inference bucket", () => {
    const template = Template.fromStack(createStack());

    template.hasResourceProperties("AWS::S3::Bucket", {
      VersioningConfiguration: { Status: "Enabled" },
      BucketEncryption: {
        ServerSideEncryptionConfiguration: [
          {
            ServerSideEncryptionByDefault: { SSEAlgorithm: "AES256" }
          }
        ]
      },
      PublicAccessBlockConfiguration: {
        BlockPublicAcls: true,
        BlockPublicPolicy: true,
        IgnorePublicAcls: true,
        RestrictPublicBuckets: true
      },
      LoggingConfiguration: Match.objectLike({
        LogFilePrefix: "access-logs/"
      })
    });
  });

  test("retains the bucket in prod-like accounts", () => {
    const template = Template.fromStack(
      createStack({
        account: { id: "123456789012", region: "us-west-2", prodLike: true }
      })
    );

    template.hasResource("AWS::S3::Bucket", {
      DeletionPolicy: "Retain",
      Properties: Match.objectLike({
        VersioningConfiguration: { Status: "Enabled" }
      })
    });
  });

  test("creates the tool function with its environment", () => {
    const template = Template.fromStack(createStack());

    template.hasResourceProperties("AWS::Lambda::Function", {
      FunctionName: "vep-tools",
      Runtime: "nodejs20.x",
      Handler: "index.handler",
      MemorySize: 256,
      Timeout: 300,
      Environment: {
        Variables: Match.objectLike({
          SAGEMAKER_ENDPOINT_NAME: "amplify-vep-endpoint",
          S3_INPUT_PREFIX: "async-inference-input",
          S3_OUTPUT_PREFIX: "async-inference-output",
          S3_FAILURE_PREFIX: "async-inference-failures",
          LOG_LEVEL: "INFO",
          METRICS_NAMESPACE: "SageMaker/AsyncEndpoint/Lambda"
        })
      }
    });
    template.hasResourceProperties("AWS::Logs::LogGroup", {
      LogGroupName: "/aws/lambda/vep-tools",
      RetentionInDays: 30
    });
  });

  test("publishes the function ARN to both parameters", () => {
    const template = Template.fromStack(createStack());

    template.hasResourceProperties("AWS::SSM::Parameter", {
      Name: "/sagemaker-async/lambda-function-arn",
      Type: "String"
    });
    template.hasResourceProperties("AWS::SSM::Parameter", {
      Name: "/protein-agent/lambda-function-arn",
      Type: "String"
    });
  });

  test("scopes the function's metric publishing to its namespace", () => {
    const template = Template.fromStack(createStack());

    template.hasResourceProperties("AWS::IAM::ManagedPolicy", {
      PolicyDocument: {
        Statement: Match.arrayWith([
          Match.objectLike({
            Action: "sagemaker:InvokeEndpointAsync",
            Resource: { Ref: Match.stringLikeRegexp("Endpoint") }
          }),
          Match.objectLike({
            Action: "cloudwatch:PutMetricData",
            Condition: {
              StringEquals: {
                "cloudwatch:namespace": "SageMaker/AsyncEndpoint/Lambda"
              }
            }
          })
        ])
      }
    });
  });

  test("lets SageMaker assume the execution role", () => {
    const template = Template.fromStack(createStack());

    template.hasResourceProperties("AWS::IAM::Role", {
      AssumeRolePolicyDocument: {
        Statement: [
          Match.objectLike({
            Action: "sts:AssumeRole",
            Principal: { Service: "sagemaker.amazonaws.com" }
          })
        ]
      }
    });
  });

  test("scales the variant on backlog without capacity", () => {
    const template = Template.fromStack(createStack());

    template.resourceCountIs("AWS::ApplicationAutoScaling::ScalableTarget", 1);
    template.resourceCountIs("AWS::ApplicationAutoScaling::ScalingPolicy", 2);
    template.resourceCountIs("AWS::CloudWatch::Alarm", 2);
    template.hasResourceProperties(
      "AWS::ApplicationAutoScaling::ScalableTarget",
      {
        ServiceNamespace: "sagemaker",
        ResourceId: "endpoint/amplify-vep-endpoint/variant/primary",
        ScalableDimension: "sagemaker:variant:DesiredInstanceCount",
        MinCapacity: 1,
        MaxCapacity: 2
      }
    );
    template.hasResourceProperties("AWS::CloudWatch::Alarm", {
      Namespace: "AWS/SageMaker",
      MetricName: "HasBacklogWithoutCapacity",
      Dimensions: [{ Name: "EndpointName", Value: "amplify-vep-endpoint" }]
    });
  });

  test("omits autoscaling when disabled", () => {
    const stack = createStack({
      vepEndpointConfig: { ENABLE_AUTOSCALING: false }
    });
    const template = Template.fromStack(stack);

    expect(stack.resources.autoscaling).toBeUndefined();
    template.resourceCountIs("AWS::ApplicationAutoScaling::ScalableTarget", 0);
    template.resourceCountIs("AWS::ApplicationAutoScaling::ScalingPolicy", 0);
    template.resourceCountIs("AWS::CloudWatch::Alarm", 0);
    template.hasOutput("AutoscalingRange", { Value: "disabled" });
  });

  test("exposes the deployment outputs", () => {
    const template = Template.fromStack(createStack());

    template.hasOutput("EndpointName", { Value: "amplify-vep-endpoint" });
    template.hasOutput("ModelId", { Value: "chandar-lab/AMPLIFY_350M" });
    template.hasOutput("InstanceType", { Value: "ml.g6.2xlarge" });
    template.hasOutput("AutoscalingRange", { Value: "1-2" });
    template.hasOutput("LambdaFunctionArn", Match.anyValue());
  });

  test("rejects an invalid endpoint configuration", () => {
    expect(() =>
      createStack({ vepEndpointConfig: { INSTANCE_TYPE: "ml.m5.xlarge" } })
    ).toThrow("Instance type must be GPU-enabled. Got: ml.m5.xlarge");
  });
});

describe("cdk-nag Compliance Checks - VEPEndpointStack", () => {
  let app: App;
  let stack: VEPEndpointStack;

  beforeAll(() => {
    app = createTestApp();

    stack = new VEPEndpointStack(app, "VEPEndpointStack", {
      env: createTestEnvironment(),
      deployment: createTestDeploymentConfig()
    });

    // Add the cdk-nag AwsSolutions Pack with extra verbose logging enabled.
    Aspects.of(stack).add(
      new AwsSolutionsChecks({
        verbose: true
      })
    );

    const errors = Annotations.fromStack(stack).findError(
      "*",
      Match.stringLikeRegexp("AwsSolutions-.*")
    );
    const warnings = Annotations.fromStack(stack).findWarning(
      "*",
      Match.stringLikeRegexp("AwsSolutions-.*")
    );
    generateNagReport(stack, errors, warnings);
  });

  test("No unsuppressed Warnings", () => {
    const warnings = Annotations.fromStack(stack).findWarning(
      "*",
      Match.stringLikeRegexp("AwsSolutions-.*")
    );
    expect(warnings).toHaveLength(0);
  });

  test("No unsuppressed Errors", () => {
    const errors = Annotations.fromStack(stack).findError(
      "*",
      Match.stringLikeRegexp("AwsSolutions-.*")
    );
    expect(errors).toHaveLength(0);
  });
});
