/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

import { BaseConfig, ConfigType } from "../types";

/**
 * An OAuth scope offered by the gateway resource server.
 */
export interface ScopeDefinition {
  readonly name: string;
  readonly description: string;
}

export type MfaSetting = "OFF" | "OPTIONAL" | "REQUIRED";

const MFA_SETTINGS: readonly MfaSetting[] = ["OFF", "OPTIONAL", "REQUIRED"];

const DOMAIN_PREFIX_PATTERN = /^[a-z0-9](?:[a-z0-9-]*[a-z0-9])?$/;

function isScopeDefinition(item: unknown): item is ScopeDefinition {
  return (
    typeof item === "object" &&
    item !== null &&
    "name" in item &&
    "description" in item &&
    typeof item.name === "string" &&
    typeof item.description === "string"
  );
}

function isMfaSetting(value: string): value is MfaSetting {
  return MFA_SETTINGS.some((setting) => setting === value);
}

/**
 * Configuration class for the gateway's Cognito authentication.
 */
export class CognitoConfig extends BaseConfig {
  /** The name of the user pool. */
  public readonly USER_POOL_NAME: string;
  /** Identifier of the resource server; prefixes every scope. */
  public readonly RESOURCE_SERVER_IDENTIFIER: string;
  /** Display name of the resource server. */
  public readonly RESOURCE_SERVER_NAME: string;
  /** The name of the client-credentials app client. */
  public readonly CLIENT_NAME: string;
  /** Scopes offered by the resource server. */
  public readonly SCOPES: ScopeDefinition[];
  /** Minimum password length for pool users. */
  public readonly PASSWORD_MIN_LENGTH: number;
  /** Whether passwords need a symbol. */
  public readonly REQUIRE_SYMBOLS: boolean;
  /** Multi-factor authentication setting. */
  public readonly MFA: MfaSetting;
  /** Whether to enforce Cognito threat protection. */
  public readonly ENABLE_THREAT_PROTECTION: boolean;
  /** Whether the user pool is protected from deletion. */
  public readonly DELETION_PROTECTION: boolean;
  /** Whether the app client gets a secret. */
  public readonly GENERATE_SECRET: boolean;
  /** Hosted domain prefix; derived from the stack when unset. */
  public readonly DOMAIN_PREFIX?: string;
  /** Access token lifetime in minutes. */
  public readonly ACCESS_TOKEN_VALIDITY_MINUTES: number;
  /** Refresh token lifetime in days. */
  public readonly REFRESH_TOKEN_VALIDITY_DAYS: number;

  private readonly rawMfa: string;

  /**
   * Creates an instance of CognitoConfig.
   *
   * @param config - The configuration object for Cognito
   * @throws Error if the resolved configuration is invalid
   */
  constructor(config: ConfigType = {}) {
    super(config);
    this.USER_POOL_NAME = this.readString(
      "USER_POOL_NAME",
      "agentcore-gateway-pool"
    );
    this.RESOURCE_SERVER_IDENTIFIER = this.readString(
      "RESOURCE_SERVER_IDENTIFIER",
      "agentcore-gateway"
    );
    this.RESOURCE_SERVER_NAME = this.readString(
      "RESOURCE_SERVER_NAME",
      "AgentCore Gateway API"
    );
    this.CLIENT_NAME = this.readString(
      "CLIENT_NAME",
      "agentcore-gateway-client"
    );
    this.SCOPES = this.readRecords(
      "SCOPES",
      [
        { name: "gateway:read", description: "Read access to gateway tools" },
        { name: "gateway:write", description: "Write access to gateway tools" },
        {
          name: "gateway:admin",
          description: "Administrative access to the gateway"
        }
      ],
      isScopeDefinition
    );
    this.PASSWORD_MIN_LENGTH = this.readNumber("PASSWORD_MIN_LENGTH", 12);
    this.REQUIRE_SYMBOLS = this.readBoolean("REQUIRE_SYMBOLS", true);
    this.rawMfa = this.readString("MFA", "OPTIONAL");
    this.MFA = isMfaSetting(this.rawMfa) ? this.rawMfa : "OPTIONAL";
    this.ENABLE_THREAT_PROTECTION = this.readBoolean(
      "ENABLE_THREAT_PROTECTION",
      true
    );
    this.DELETION_PROTECTION = this.readBoolean("DELETION_PROTECTION", true);
    this.GENERATE_SECRET = this.readBoolean("GENERATE_SECRET", true);
    this.DOMAIN_PREFIX = this.readOptionalString("DOMAIN_PREFIX");
    this.ACCESS_TOKEN_VALIDITY_MINUTES = this.readNumber(
      "ACCESS_TOKEN_VALIDITY_MINUTES",
      60
    );
    this.REFRESH_TOKEN_VALIDITY_DAYS = this.readNumber(
      "REFRESH_TOKEN_VALIDITY_DAYS",
      1
    );
    this.validateConfig();
  }

  protected collectErrors(): string[] {
    const errors: string[] = [];

    if (this.PASSWORD_MIN_LENGTH < 6 || this.PASSWORD_MIN_LENGTH > 128) {
      errors.push("Password minimum length must be between 6 and 128");
    }
    if (this.USER_POOL_NAME.trim() === "") {
      errors.push("User pool name cannot be empty");
    }
    if (this.RESOURCE_SERVER_IDENTIFIER.trim() === "") {
      errors.push("Resource server identifier cannot be empty");
    }
    if (this.RESOURCE_SERVER_NAME.trim() === "") {
      errors.push("Resource server name cannot be empty");
    }
    if (this.CLIENT_NAME.trim() === "") {
      errors.push("Client name cannot be empty");
    }

    if (this.SCOPES.length === 0) {
      errors.push("At least one scope must be defined");
    }
    this.SCOPES.forEach((scope, index) => {
      if (scope.name.trim() === "") {
        errors.push(`Scope ${index} must have a name`);
      }
      if (scope.description.trim() === "") {
        errors.push(`Scope ${index} must have a description`);
      }
    });

    if (!isMfaSetting(this.rawMfa)) {
      errors.push(`MFA must be one of ${MFA_SETTINGS.join(", ")}. Got: ${this.rawMfa}`);
    }

    if (
      this.DOMAIN_PREFIX !== undefined &&
      !DOMAIN_PREFIX_PATTERN.test(this.DOMAIN_PREFIX)
    ) {
      errors.push(
        "Domain prefix must contain only lowercase letters, numbers and hyphens"
      );
    }

    return errors;
  }
}

/**
 * Names under which the Cognito stack publishes its outputs.
 */
export class CognitoOutputConfig extends BaseConfig {
  /** SSM parameter holding the OpenID discovery URL. */
  public readonly DISCOVERY_URL_PARAMETER: string;
  /** SSM parameter holding the app client id. */
  public readonly CLIENT_ID_PARAMETER: string;
  /** SSM parameter holding the user pool id. */
  public readonly USER_POOL_ID_PARAMETER: string;
  /** SSM parameter holding the user pool ARN. */
  public readonly USER_POOL_ARN_PARAMETER: string;
  /** SSM parameter holding the hosted domain. */
  public readonly DOMAIN_PARAMETER: string;
  /** Secrets Manager secret holding the client credentials. */
  public readonly CLIENT_SECRET_NAME: string;

  /**
   * Creates an instance of CognitoOutputConfig.
   *
   * @param config - The configuration object for the Cognito outputs
   * @throws Error if the resolved configuration is invalid
   */
  constructor(config: ConfigType = {}) {
    super(config);
    this.DISCOVERY_URL_PARAMETER = this.readString(
      "DISCOVERY_URL_PARAMETER",
      "/cognito/discovery-url"
    );
    this.CLIENT_ID_PARAMETER = this.readString(
      "CLIENT_ID_PARAMETER",
      "/cognito/client-id"
    );
    this.USER_POOL_ID_PARAMETER = this.readString(
      "USER_POOL_ID_PARAMETER",
      "/cognito/user-pool-id"
    );
    this.USER_POOL_ARN_PARAMETER = this.readString(
      "USER_POOL_ARN_PARAMETER",
      "/cognito/user-pool-arn"
    );
    this.DOMAIN_PARAMETER = this.readString(
      "DOMAIN_PARAMETER",
      "/cognito/domain"
    );
    this.CLIENT_SECRET_NAME = this.readString(
      "CLIENT_SECRET_NAME",
      "cognito-client-secret"
    );
    this.validateConfig();
  }

  protected collectErrors(): string[] {
    return [
      this.DISCOVERY_URL_PARAMETER,
      this.CLIENT_ID_PARAMETER,
      this.USER_POOL_ID_PARAMETER,
      this.USER_POOL_ARN_PARAMETER,
      this.DOMAIN_PARAMETER
    ]
      .filter((name) => !name.startsWith("/"))
      .map((name) => `SSM parameter name must start with '/'. Got: ${name}`);
  }
}
