/**
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

/**
 * Utility to load and validate the deployment configuration file.
 *
 * This module provides a strongly typed interface for reading the `deployment.json`
 * configuration, performing required validations, and returning a structured result.
 *
 * Expected structure of `deployment.json`:
 * ```json
 * {
 *   "projectName": "protein-vep",
 *   "account": {
 *     "id": "123456789012",
 *     "region": "us-east-1",
 *     "prodLike": false  // Optional: defaults to false if not specified
 *   },
 *   "vepEndpointConfig": {
 *     "INSTANCE_TYPE": "ml.g6.2xlarge",
 *     "MIN_CAPACITY": 1,
 *     "MAX_CAPACITY": 2
 *   },
 *   "cognitoConfig": {
 *     "MFA": "OPTIONAL",
 *     "DOMAIN_PREFIX": "protein-vep-auth"  // Optional: derived from the stack if not specified
 *   },
 *   "cognitoOutputConfig": {
 *     "CLIENT_SECRET_NAME": "cognito-client-secret"
 *   },
 *   "deployGatewayRole": true,  // Optional: defaults to true
 *   "tags": {
 *     "Project": "protein-vep-agent"  // Optional: defaults to Project and ManagedBy tags
 *   }
 * }
 * ```
 *
 * @packageDocumentation
 */

import { existsSync, readFileSync } from "fs";
import { join } from "path";

import { ConfigType, ProjectAccount } from "../../lib/constructs/types";

/**
 * Represents the structure of the deployment configuration file.
 */
export interface DeploymentConfig {
  /** Logical name of the project, used for the CDK stack IDs. */
  projectName: string;

  /** AWS account configuration. */
  account: ProjectAccount;

  /** Optional VEP endpoint configuration, passed to VEPEndpointConfig. */
  vepEndpointConfig?: ConfigType;

  /** Optional Cognito configuration, passed to CognitoConfig. */
  cognitoConfig?: ConfigType;

  /** Optional Cognito output naming, passed to CognitoOutputConfig. */
  cognitoOutputConfig?: ConfigType;

  /** Whether to deploy the agent gateway role stack. */
  deployGatewayRole: boolean;

  /** Tags applied to every stack. */
  tags: Record<string, string>;
}

/**
 * Validation error class for deployment configuration issues.
 */
export class DeploymentConfigError extends Error {
  /**
   * Creates a new DeploymentConfigError.
   *
   * @param message - The error message
   * @param field - Optional field name that caused the error
   */
  constructor(
    message: string,
    public field?: string
  ) {
    super(message);
    this.name = "DeploymentConfigError";
  }
}

let deploymentLogged = false;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates and trims a string field, checking for required value and whitespace.
 *
 * @param value - The value to validate
 * @param fieldName - The name of the field being validated (for error messages)
 * @returns The trimmed string value
 * @throws {DeploymentConfigError} If validation fails
 */
function validateStringField(value: unknown, fieldName: string): string {
  if (value === undefined || value === null) {
    throw new DeploymentConfigError(
      `Missing required field: ${fieldName}`,
      fieldName
    );
  }

  if (typeof value !== "string") {
    throw new DeploymentConfigError(
      `Field '${fieldName}' must be a string, got ${typeof value}`,
      fieldName
    );
  }

  const trimmed = value.trim();
  if (trimmed === "") {
    throw new DeploymentConfigError(
      `Field '${fieldName}' cannot be empty or contain only whitespace`,
      fieldName
    );
  }

  return trimmed;
}

/**
 * Validates AWS account ID format.
 *
 * @param accountId - The account ID to validate
 * @returns The validated account ID
 * @throws {DeploymentConfigError} If the account ID format is invalid
 */
function validateAccountId(accountId: string): string {
  if (!/^\d{12}$/.test(accountId)) {
    throw new DeploymentConfigError(
      `Invalid AWS account ID format: '${accountId}'. Must be exactly 12 digits.`,
      "account.id"
    );
  }
  return accountId;
}

/**
 * Validates AWS region format using pattern matching.
 *
 * @param region - The region to validate
 * @returns The validated region
 * @throws {DeploymentConfigError} If the region format is invalid
 */
function validateRegion(region: string): string {
  if (!/^[a-z0-9]+-[a-z0-9]+(?:-[a-z0-9]+)*$/.test(region)) {
    throw new DeploymentConfigError(
      `Invalid AWS region format: '${region}'. Must follow pattern like 'us-east-1', 'eu-west-2', etc.`,
      "account.region"
    );
  }
  return region;
}

/**
 * Reads an optional boolean field.
 *
 * @throws {DeploymentConfigError} If the value is present but not a boolean
 */
function optionalBoolean(
  value: unknown,
  fieldName: string,
  fallback: boolean
): boolean {
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== "boolean") {
    throw new DeploymentConfigError(
      `Field '${fieldName}' must be a boolean, got ${typeof value}`,
      fieldName
    );
  }
  return value;
}

/**
 * Reads an optional configuration section.
 *
 * @throws {DeploymentConfigError} If the value is present but not an object
 */
function optionalSection(
  value: unknown,
  fieldName: string
): ConfigType | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new DeploymentConfigError(
      `Field '${fieldName}' must be an object`,
      fieldName
    );
  }
  return value;
}

/**
 * Reads the tag map, falling back to the project defaults.
 *
 * @throws {DeploymentConfigError} If the map or any of its values is malformed
 */
function validateTags(value: unknown): Record<string, string> {
  if (value === undefined || value === null) {
    return { Project: "protein-vep-agent", ManagedBy: "CDK" };
  }
  if (!isRecord(value)) {
    throw new DeploymentConfigError("Field 'tags' must be an object", "tags");
  }
  const tags: Record<string, string> = {};
  for (const [key, tagValue] of Object.entries(value)) {
    if (typeof tagValue !== "string") {
      throw new DeploymentConfigError(
        `Tag '${key}' must be a string, got ${typeof tagValue}`,
        `tags.${key}`
      );
    }
    tags[key] = tagValue;
  }
  return tags;
}

/**
 * Loads and validates the deployment configuration.
 *
 * @param deploymentPath - Path of the file to load; defaults to `deployment.json` beside this module
 * @returns A validated {@link DeploymentConfig} object
 * @throws {DeploymentConfigError} If the file is missing, malformed, or contains invalid values
 */
export function loadDeploymentConfig(
  deploymentPath: string = join(__dirname, "deployment.json")
): DeploymentConfig {
  if (!existsSync(deploymentPath)) {
    throw new DeploymentConfigError(
      `Missing deployment.json file at ${deploymentPath}. Please create it by copying deployment.json.example`
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(deploymentPath, "utf-8"));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new DeploymentConfigError(
        `Invalid JSON format in deployment.json: ${error.message}`
      );
    }
    throw new DeploymentConfigError(
      `Failed to read deployment.json: ${error instanceof Error ? error.message : "Unknown error"}`
    );
  }

  if (!isRecord(parsed)) {
    throw new DeploymentConfigError(
      "deployment.json must contain a valid JSON object"
    );
  }

  const projectName = validateStringField(parsed.projectName, "projectName");

  if (!isRecord(parsed.account)) {
    throw new DeploymentConfigError(
      "Missing or invalid account section in deployment.json",
      "account"
    );
  }
  const accountObj = parsed.account;

  const validatedConfig: DeploymentConfig = {
    projectName,
    account: {
      id: validateAccountId(validateStringField(accountObj.id, "account.id")),
      region: validateRegion(
        validateStringField(accountObj.region, "account.region")
      ),
      prodLike: optionalBoolean(accountObj.prodLike, "account.prodLike", false)
    },
    vepEndpointConfig: optionalSection(
      parsed.vepEndpointConfig,
      "vepEndpointConfig"
    ),
    cognitoConfig: optionalSection(parsed.cognitoConfig, "cognitoConfig"),
    cognitoOutputConfig: optionalSection(
      parsed.cognitoOutputConfig,
      "cognitoOutputConfig"
    ),
    deployGatewayRole: optionalBoolean(
      parsed.deployGatewayRole,
      "deployGatewayRole",
      true
    ),
    tags: validateTags(parsed.tags)
  };

  // Only log non-sensitive configuration details (prevent duplicate logging)
  if (!deploymentLogged) {
    console.log(
      `🚀 Using environment from deployment.json: projectName=${validatedConfig.projectName}, region=${validatedConfig.account.region}`
    );
    deploymentLogged = true;
  }

  return validatedConfig;
}
