/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

import { Duration, SecretValue, Stack } from "aws-cdk-lib";
import {
  AccountRecovery,
  AdvancedSecurityMode,
  FeaturePlan,
  Mfa,
  OAuthScope,
  ResourceServerScope,
  UserPool,
  UserPoolClient,
  UserPoolDomain,
  UserPoolResourceServer
} from "aws-cdk-lib/aws-cognito";
import { Secret } from "aws-cdk-lib/aws-secretsmanager";
import { StringParameter } from "aws-cdk-lib/aws-ssm";
import { NagSuppressions } from "cdk-nag";
import { Construct } from "constructs";

import { ProjectAccount, removalPolicyFor } from "../types";
import {
  CognitoConfig,
  CognitoOutputConfig,
  MfaSetting
} from "./cognito-config";

const MFA_MODES: Record<MfaSetting, Mfa> = {
  OFF: Mfa.OFF,
  OPTIONAL: Mfa.OPTIONAL,
  REQUIRED: Mfa.REQUIRED
};

/**
 * Properties for creating the Cognito authentication resources.
 */
export interface CognitoAuthProps {
  /** The target account. */
  readonly account: ProjectAccount;
  /** Optional user pool configuration. */
  readonly config?: CognitoConfig;
  /** Optional output naming configuration. */
  readonly outputConfig?: CognitoOutputConfig;
}

/**
 * Builds the default hosted domain prefix from a construct address.
 *
 * @param address - A stable hexadecimal construct address
 * @returns `agentcore-` followed by the last eight characters of the address
 */
export function defaultDomainPrefix(address: string): string {
  return `agentcore-${address.slice(-8)}`;
}

/**
 * Cognito user pool issuing client-credentials tokens for the gateway.
 */
export class CognitoAuth extends Construct {
  public readonly config: CognitoConfig;
  public readonly outputConfig: CognitoOutputConfig;
  public readonly userPool: UserPool;
  public readonly domain: UserPoolDomain;
  public readonly resourceServer: UserPoolResourceServer;
  public readonly client: UserPoolClient;
  /** OpenID Connect discovery document URL of the pool. */
  public readonly discoveryUrl: string;
  /** OAuth2 token endpoint of the hosted domain. */
  public readonly tokenEndpoint: string;
  /** Client credentials secret, when the client has a secret. */
  public readonly clientSecret?: Secret;
  public readonly parameters: StringParameter[];

  /**
   * Creates a new CognitoAuth construct.
   *
   * @param scope - The scope/stack in which to define this construct
   * @param id - The id of this construct within the current scope
   * @param props - The properties for configuring this construct
   */
  constructor(scope: Construct, id: string, props: CognitoAuthProps) {
    super(scope, id);

    this.config = props.config ?? new CognitoConfig();
    this.outputConfig = props.outputConfig ?? new CognitoOutputConfig();

    const stack = Stack.of(this);

    this.userPool = this.createUserPool(props.account);
    this.domain = this.userPool.addDomain("Domain", {
      cognitoDomain: {
        domainPrefix:
          this.config.DOMAIN_PREFIX ?? defaultDomainPrefix(stack.node.addr)
      }
    });
    const scopes = this.config.SCOPES.map(
      (scope) =>
        new ResourceServerScope({
          scopeName: scope.name,
          scopeDescription: scope.description
        })
    );
    this.resourceServer = this.userPool.addResourceServer("ResourceServer", {
      identifier: this.config.RESOURCE_SERVER_IDENTIFIER,
      userPoolResourceServerName: this.config.RESOURCE_SERVER_NAME,
      scopes
    });
    this.client = this.createClient(scopes);

    this.discoveryUrl = `https://cognito-idp.${stack.region}.amazonaws.com/${this.userPool.userPoolId}/.well-known/openid-configuration`;
    this.tokenEndpoint = `${this.domain.baseUrl()}/oauth2/token`;

    this.parameters = this.createParameters();
    if (this.config.GENERATE_SECRET) {
      this.clientSecret = this.createClientSecret();
    }

    this.addNagSuppressions();
  }

  private createUserPool(account: ProjectAccount): UserPool {
    const { config } = this;
    const mfa = MFA_MODES[config.MFA];

    return new UserPool(this, "UserPool", {
      userPoolName: config.USER_POOL_NAME,
      selfSignUpEnabled: false,
      signInAliases: { email: true },
      autoVerify: { email: true },
      passwordPolicy: {
        minLength: config.PASSWORD_MIN_LENGTH,
        requireLowercase: true,
        requireUppercase: true,
        requireDigits: true,
        requireSymbols: config.REQUIRE_SYMBOLS
      },
      mfa,
      mfaSecondFactor:
        mfa === Mfa.OFF ? undefined : { sms: false, otp: true },
      enableSmsRole: false,
      accountRecovery: AccountRecovery.EMAIL_ONLY,
      featurePlan: config.ENABLE_THREAT_PROTECTION
        ? FeaturePlan.PLUS
        : FeaturePlan.ESSENTIALS,
      advancedSecurityMode: config.ENABLE_THREAT_PROTECTION
        ? AdvancedSecurityMode.ENFORCED
        : undefined,
      deletionProtection: config.DELETION_PROTECTION,
      removalPolicy: removalPolicyFor(account)
    });
  }

  private createClient(scopes: ResourceServerScope[]): UserPoolClient {
    const { config } = this;
    return this.userPool.addClient("Client", {
      userPoolClientName: config.CLIENT_NAME,
      generateSecret: config.GENERATE_SECRET,
      authFlows: {},
      oAuth: {
        flows: { clientCredentials: true },
        scopes: scopes.map((scope) =>
          OAuthScope.resourceServer(this.resourceServer, scope)
        )
      },
      accessTokenValidity: Duration.minutes(
        config.ACCESS_TOKEN_VALIDITY_MINUTES
      ),
      refreshTokenValidity: Duration.days(config.REFRESH_TOKEN_VALIDITY_DAYS),
      preventUserExistenceErrors: true,
      enableTokenRevocation: true
    });
  }

  private createParameters(): StringParameter[] {
    const { outputConfig } = this;
    const values: [string, string, string][] = [
      ["DiscoveryUrl", outputConfig.DISCOVERY_URL_PARAMETER, this.discoveryUrl],
      ["ClientId", outputConfig.CLIENT_ID_PARAMETER, this.client.userPoolClientId],
      ["UserPoolId", outputConfig.USER_POOL_ID_PARAMETER, this.userPool.userPoolId],
      ["UserPoolArn", outputConfig.USER_POOL_ARN_PARAMETER, this.userPool.userPoolArn],
      ["Domain", outputConfig.DOMAIN_PARAMETER, this.domain.domainName]
    ];
    return values.map(
      ([id, parameterName, stringValue]) =>
        new StringParameter(this, `${id}Parameter`, {
          parameterName,
          stringValue
        })
    );
  }

  private createClientSecret(): Secret {
    return new Secret(this, "ClientSecret", {
      secretName: this.outputConfig.CLIENT_SECRET_NAME,
      description: "Client credentials for the gateway app client",
      secretObjectValue: {
        client_id: SecretValue.unsafePlainText(this.client.userPoolClientId),
        client_secret: this.client.userPoolClientSecret,
        user_pool_id: SecretValue.unsafePlainText(this.userPool.userPoolId),
        discovery_url: SecretValue.unsafePlainText(this.discoveryUrl),
        token_endpoint: SecretValue.unsafePlainText(this.tokenEndpoint)
      }
    });
  }

  private addNagSuppressions(): void {
    if (this.config.MFA !== "REQUIRED") {
      NagSuppressions.addResourceSuppressions(this.userPool, [
        {
          id: "AwsSolutions-COG2",
          reason:
            "The pool serves machine-to-machine client credentials; MFA for interactive users is configurable"
        }
      ]);
    }
    if (!this.config.ENABLE_THREAT_PROTECTION) {
      NagSuppressions.addResourceSuppressions(this.userPool, [
        {
          id: "AwsSolutions-COG3",
          reason: "Threat protection is disabled for this deployment by configuration"
        }
      ]);
    }
    if (this.clientSecret) {
      NagSuppressions.addResourceSuppressions(this.clientSecret, [
        {
          id: "AwsSolutions-SMG4",
          reason:
            "The secret mirrors the Cognito app client secret, which Cognito does not rotate"
        }
      ]);
    }
  }
}
