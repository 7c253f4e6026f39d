/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

import { Stack } from "aws-cdk-lib";
import {
  Effect,
  PolicyDocument,
  PolicyStatement,
  Role,
  ServicePrincipal
} from "aws-cdk-lib/aws-iam";
import { StringParameter } from "aws-cdk-lib/aws-ssm";
import { Construct } from "constructs";

/**
 * Properties for creating the gateway role.
 */
export interface GatewayRoleProps {
  /** The name of the role. */
  readonly roleName?: string;
  /** SSM parameter holding the tool Lambda ARN. */
  readonly lambdaArnParameterName?: string;
  /** SSM parameter that receives the role ARN. */
  readonly roleArnParameterName?: string;
}

/**
 * Role the agent gateway assumes to invoke the tool Lambda.
 *
 * Trust is limited to gateways in this account and region.
 */
export class GatewayRole extends Construct {
  public readonly role: Role;
  /** ARN of the tool Lambda the role may invoke. */
  public readonly lambdaArn: string;
  public readonly roleArnParameter: StringParameter;

  /**
   * Creates a new GatewayRole construct.
   *
   * @param scope - The scope/stack in which to define this construct
   * @param id - The id of this construct within the current scope
   * @param props - The properties for configuring this construct
   */
  constructor(scope: Construct, id: string, props: GatewayRoleProps = {}) {
    super(scope, id);

    const stack = Stack.of(this);

    this.lambdaArn = StringParameter.valueForStringParameter(
      this,
      props.lambdaArnParameterName ?? "/sagemaker-async/lambda-function-arn"
    );

    this.role = new Role(this, "Role", {
      roleName: props.roleName ?? "agentcore-gateway-role",
      description: "Allows the agent gateway to invoke the protein VEP tools",
      assumedBy: new ServicePrincipal("bedrock-agentcore.amazonaws.com", {
        conditions: {
          StringEquals: { "aws:SourceAccount": stack.account },
          ArnLike: {
            "aws:SourceArn": `arn:${stack.partition}:bedrock-agentcore:${stack.region}:${stack.account}:*`
          }
        }
      }),
      inlinePolicies: {
        InvokeToolLambda: new PolicyDocument({
          statements: [
            new PolicyStatement({
              effect: Effect.ALLOW,
              actions: ["lambda:InvokeFunction"],
              resources: [this.lambdaArn]
            })
          ]
        })
      }
    });

    this.roleArnParameter = new StringParameter(this, "RoleArnParameter", {
      parameterName:
        props.roleArnParameterName ?? "/agentcore-gateway/role-arn",
      stringValue: this.role.roleArn,
      description: "ARN of the agent gateway role"
    });
  }
}
