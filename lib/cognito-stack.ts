/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

import { App, CfnOutput, Environment, Stack, StackProps } from "aws-cdk-lib";
import { NagSuppressions } from "cdk-nag";

import { DeploymentConfig } from "../bin/deployment/load-deployment";
import { CognitoAuth } from "./constructs/cognito/cognito-auth";
import {
  CognitoConfig,
  CognitoOutputConfig
} from "./constructs/cognito/cognito-config";

export interface CognitoStackProps extends StackProps {
  readonly env: Environment;
  readonly deployment: DeploymentConfig;
}

export class CognitoStack extends Stack {
  public readonly resources: CognitoAuth;

  /**
   * Constructor for the gateway authentication cdk stack
   * @param parent the parent cdk app object
   * @param name the name of the stack to be created in the parent app object.
   * @param props the properties required to create the stack.
   * @returns the created CognitoStack object
   */
  constructor(parent: App, name: string, props: CognitoStackProps) {
    super(parent, name, {
      terminationProtection: props.deployment.account.prodLike,
      description: "Cognito client-credentials authentication for the agent gateway",
      ...props
    });

    this.resources = new CognitoAuth(this, "CognitoAuth", {
      account: props.deployment.account,
      config: props.deployment.cognitoConfig
        ? new CognitoConfig(props.deployment.cognitoConfig)
        : undefined,
      outputConfig: props.deployment.cognitoOutputConfig
        ? new CognitoOutputConfig(props.deployment.cognitoOutputConfig)
        : undefined
    });

    const { userPool, client, domain, clientSecret } = this.resources;
    new CfnOutput(this, "UserPoolId", { value: userPool.userPoolId });
    new CfnOutput(this, "UserPoolArn", { value: userPool.userPoolArn });
    new CfnOutput(this, "ClientId", { value: client.userPoolClientId });
    new CfnOutput(this, "DomainName", { value: domain.domainName });
    new CfnOutput(this, "DiscoveryUrl", { value: this.resources.discoveryUrl });
    new CfnOutput(this, "TokenEndpoint", {
      value: this.resources.tokenEndpoint
    });
    if (clientSecret) {
      new CfnOutput(this, "ClientSecretArn", { value: clientSecret.secretArn });
    }

    // Reading the generated client secret is backed by a CDK-managed
    // custom resource function.
    NagSuppressions.addStackSuppressions(this, [
      {
        id: "AwsSolutions-IAM4",
        reason:
          "The CDK-managed custom resource function uses the AWS managed Lambda basic execution policy"
      },
      {
        id: "AwsSolutions-IAM5",
        reason:
          "The CDK-managed custom resource policy is generated by the framework for DescribeUserPoolClient"
      },
      {
        id: "AwsSolutions-L1",
        reason:
          "The CDK-managed custom resource runtime is controlled by the CDK framework"
      }
    ]);
  }
}
