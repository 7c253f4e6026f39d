#!/usr/bin/env node

/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

/**
 * @file Entry point for the protein VEP gateway CDK application.
 *
 * This file bootstraps the CDK app, loads deployment configuration,
 * and instantiates the endpoint, authentication and gateway role stacks.
 */

import "source-map-support/register";

import { App, Aspects, Tags } from "aws-cdk-lib";
import { AwsSolutionsChecks } from "cdk-nag";

import { CognitoStack } from "../lib/cognito-stack";
import { GatewayRoleStack } from "../lib/gateway-role-stack";
import { VEPEndpointStack } from "../lib/vep-endpoint-stack";
import { loadDeploymentConfig } from "./deployment/load-deployment";

// -----------------------------------------------------------------------------
// Initialize CDK Application
// -----------------------------------------------------------------------------

const app = new App();

// -----------------------------------------------------------------------------
// Load the user provided deployment configuration.
// -----------------------------------------------------------------------------

const deployment = loadDeploymentConfig();

const env = {
  account: deployment.account.id,
  region: deployment.account.region
};

// -----------------------------------------------------------------------------
// Deploy the VEP endpoint and its tool Lambda.
// -----------------------------------------------------------------------------

const vepEndpointStack = new VEPEndpointStack(
  app,
  `${deployment.projectName}-VEPEndpoint`,
  { env, deployment }
);

// -----------------------------------------------------------------------------
// Deploy the gateway authentication.
// -----------------------------------------------------------------------------

new CognitoStack(app, `${deployment.projectName}-Cognito`, {
  env,
  deployment
});

// -----------------------------------------------------------------------------
// Deploy the gateway role. It reads the tool Lambda ARN the VEP stack
// publishes, so it must deploy after it.
// -----------------------------------------------------------------------------

if (deployment.deployGatewayRole) {
  const gatewayRoleStack = new GatewayRoleStack(
    app,
    `${deployment.projectName}-GatewayRole`,
    { env, deployment }
  );
  gatewayRoleStack.addDependency(vepEndpointStack);
}

for (const [key, value] of Object.entries(deployment.tags)) {
  Tags.of(app).add(key, value);
}

Aspects.of(app).add(new AwsSolutionsChecks({ verbose: true }));
