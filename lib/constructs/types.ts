/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

import { RemovalPolicy } from "aws-cdk-lib";

/**
 * Target account configuration interface.
 */
export interface ProjectAccount {
  /** The AWS account ID. */
  readonly id: string;
  /** The AWS region. */
  readonly region: string;
  /** Whether this is a production-like environment. Defaults to false if not specified. */
  readonly prodLike?: boolean;
}

/**
 * Raw configuration values as they appear in deployment.json.
 */
export type ConfigType = Record<string, unknown>;

/**
 * Base configuration class for project constructs.
 *
 * Subclasses read each UPPER_SNAKE field from the raw values through the
 * typed readers below, falling back to their defaults. A value of the wrong
 * type is recorded as an issue and reported by {@link BaseConfig.validateConfig}.
 */
export abstract class BaseConfig {
  private readonly raw: ConfigType;
  private readonly issues: string[] = [];

  /**
   * Constructor for BaseConfig.
   *
   * @param config - The configuration object
   */
  protected constructor(config: ConfigType = {}) {
    this.raw = { ...config };
  }

  /**
   * Validates the resolved configuration.
   *
   * @throws Error listing every violation if validation fails
   */
  public validateConfig(): void {
    const errors = [...this.issues, ...this.collectErrors()];
    if (errors.length > 0) {
      throw new Error(`Configuration validation failed:\n${errors.join("\n")}`);
    }
  }

  /**
   * Returns the rule violations of the resolved values.
   */
  protected abstract collectErrors(): string[];

  protected readString(key: string, fallback: string): string {
    return this.readOptionalString(key) ?? fallback;
  }

  protected readOptionalString(key: string): string | undefined {
    const value = this.raw[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== "string") {
      this.issues.push(`${key} must be a string`);
      return undefined;
    }
    return value;
  }

  protected readNumber(key: string, fallback: number): number {
    const value = this.raw[key];
    if (value === undefined || value === null) {
      return fallback;
    }
    if (typeof value !== "number" || !Number.isFinite(value)) {
      this.issues.push(`${key} must be a number`);
      return fallback;
    }
    return value;
  }

  protected readBoolean(key: string, fallback: boolean): boolean {
    const value = this.raw[key];
    if (value === undefined || value === null) {
      return fallback;
    }
    if (typeof value !== "boolean") {
      this.issues.push(`${key} must be a boolean`);
      return fallback;
    }
    return value;
  }

  protected readStringArray(key: string, fallback: string[]): string[] {
    const value = this.raw[key];
    if (value === undefined || value === null) {
      return [...fallback];
    }
    if (
      !Array.isArray(value) ||
      !value.every((item): item is string => typeof item === "string")
    ) {
      this.issues.push(`${key} must be an array of strings`);
      return [...fallback];
    }
    return value;
  }

  /**
   * Reads an array of records, keeping the entries the guard accepts.
   */
  protected readRecords<T>(
    key: string,
    fallback: T[],
    guard: (item: unknown) => item is T
  ): T[] {
    const value = this.raw[key];
    if (value === undefined || value === null) {
      return [...fallback];
    }
    if (!Array.isArray(value)) {
      this.issues.push(`${key} must be an array`);
      return [...fallback];
    }
    const accepted: T[] = value.filter(guard);
    if (accepted.length !== value.length) {
      this.issues.push(`${key} contains malformed entries`);
    }
    return accepted;
  }
}

/**
 * Resolves the removal policy for stateful resources in an account.
 *
 * @param account - The target account
 * @returns RETAIN for prod-like accounts, DESTROY otherwise
 */
export function removalPolicyFor(account: ProjectAccount): RemovalPolicy {
  return account.prodLike ? RemovalPolicy.RETAIN : RemovalPolicy.DESTROY;
}
