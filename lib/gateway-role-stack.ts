/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

import { App, CfnOutput, Environment, Stack, StackProps } from "aws-cdk-lib";

import { DeploymentConfig } from "../bin/deployment/load-deployment";
import { GatewayRole } from "./constructs/gateway/gateway-role";
import { VEPEndpointConfig } from "./constructs/vep-endpoint/vep-endpoint-config";

export interface GatewayRoleStackProps extends StackProps {
  readonly env: Environment;
  readonly deployment: DeploymentConfig;
}

export class GatewayRoleStack extends Stack {
  public readonly resources: GatewayRole;

  /**
   * Constructor for the agent gateway role cdk stack
   * @param parent the parent cdk app object
   * @param name the name of the stack to be created in the parent app object.
   * @param props the properties required to create the stack.
   * @returns the created GatewayRoleStack object
   */
  constructor(parent: App, name: string, props: GatewayRoleStackProps) {
    super(parent, name, {
      terminationProtection: props.deployment.account.prodLike,
      description: "IAM role the agent gateway assumes to call the tool Lambda",
      ...props
    });

    // Resolve the tool Lambda through the first parameter the VEP stack writes.
    const vepConfig = new VEPEndpointConfig(
      props.deployment.vepEndpointConfig ?? {}
    );
    this.resources = new GatewayRole(this, "GatewayRole", {
      lambdaArnParameterName: vepConfig.LAMBDA_ARN_PARAMETER_NAMES[0]
    });

    new CfnOutput(this, "GatewayRoleArn", {
      value: this.resources.role.roleArn,
      description: "ARN of the agent gateway role"
    });
  }
}
