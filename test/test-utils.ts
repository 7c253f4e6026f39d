/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

/**
 * Shared fixtures for the stack tests: a deployment with placeholder
 * account details, an app that skips Lambda bundling, and a printer for
 * cdk-nag findings.
 */

import { App, Environment, Stack } from "aws-cdk-lib";
import { SynthesisMessage } from "aws-cdk-lib/cx-api";

import { DeploymentConfig } from "../bin/deployment/load-deployment";

/**
 * Builds a deployment for account 123456789012 in us-west-2. Optional
 * construct sections pass through untouched so each stack applies its own
 * defaults.
 *
 * @param overrides - Fields to replace; `account` is merged
 * @returns The deployment
 */
export function createTestDeploymentConfig(
  overrides?: Partial<DeploymentConfig>
): DeploymentConfig {
  return {
    projectName: "test-project",
    account: {
      id: "123456789012",
      region: "us-west-2",
      prodLike: false,
      ...overrides?.account
    },
    vepEndpointConfig: overrides?.vepEndpointConfig,
    cognitoConfig: overrides?.cognitoConfig,
    cognitoOutputConfig: overrides?.cognitoOutputConfig,
    deployGatewayRole: overrides?.deployGatewayRole ?? true,
    tags: overrides?.tags ?? { Project: "test-project", ManagedBy: "CDK" }
  };
}

/**
 * Asset bundling is skipped so the tool Lambda is not built by esbuild
 * during synthesis.
 */
export function createTestApp(): App {
  return new App({
    context: { "aws:cdk:bundling-stacks": [] }
  });
}

/** The stack environment matching {@link createTestDeploymentConfig}. */
export function createTestEnvironment(
  overrides?: Partial<Environment>
): Environment {
  return {
    account: "123456789012",
    region: "us-west-2",
    ...overrides
  };
}

/** One AwsSolutions finding split into its parts. */
export interface NagFinding {
  rule: string;
  resource: string;
  details: string;
}

/**
 * Prints unsuppressed cdk-nag findings so a failing compliance test shows
 * which resource broke which rule.
 */
export function generateNagReport(
  stack: Stack,
  errors: SynthesisMessage[],
  warnings: SynthesisMessage[]
): void {
  const formatFindings = (findings: SynthesisMessage[]): NagFinding[] => {
    const regex = /(AwsSolutions-[A-Za-z0-9]+)\[([^\]]+)]:\s*(.+)/;
    return findings.map((finding): NagFinding => {
      const data =
        typeof finding.entry.data === "string"
          ? finding.entry.data
          : JSON.stringify(finding.entry.data);
      const match = data.match(regex);
      if (!match) {
        return { rule: "unparsed", resource: finding.id, details: data };
      }
      return {
        rule: match[1],
        resource: match[2],
        details: match[3]
      };
    });
  };

  const printSection = (title: string, findings: NagFinding[]): void => {
    if (findings.length === 0) {
      return;
    }
    process.stdout.write(`\n--- ${title} (${findings.length}) ---\n`);
    findings.forEach((finding) => {
      process.stdout.write(
        `${finding.rule} on ${finding.resource}: ${finding.details}\n`
      );
    });
  };

  process.stdout.write(`\ncdk-nag findings for ${stack.stackName}\n`);
  printSection("Errors", formatFindings(errors));
  printSection("Warnings", formatFindings(warnings));
}
