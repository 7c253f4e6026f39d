/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

import {
  BlockPublicAccess,
  Bucket,
  BucketEncryption,
  ObjectOwnership
} from "aws-cdk-lib/aws-s3";
import { Construct } from "constructs";

import { ProjectAccount, removalPolicyFor } from "../types";
import { VEPEndpointConfig } from "./vep-endpoint-config";

/**
 * Properties for creating the async inference storage.
 */
export interface AsyncInferenceStorageProps {
  /** The target account. */
  readonly account: ProjectAccount;
  /** The VEP endpoint configuration. */
  readonly config: VEPEndpointConfig;
}

/**
 * Bucket holding async inference requests, results and failures, with its
 * server access log bucket.
 */
export class AsyncInferenceStorage extends Construct {
  /** The async inference bucket. */
  public readonly bucket: Bucket;
  /** The bucket receiving server access logs. */
  public readonly accessLogBucket: Bucket;

  /**
   * Creates a new AsyncInferenceStorage construct.
   *
   * @param scope - The scope/stack in which to define this construct
   * @param id - The id of this construct within the current scope
   * @param props - The properties for configuring this construct
   */
  constructor(scope: Construct, id: string, props: AsyncInferenceStorageProps) {
    super(scope, id);

    const removalPolicy = removalPolicyFor(props.account);
    const autoDeleteObjects = !props.account.prodLike;

    this.accessLogBucket = new Bucket(this, "AccessLogBucket", {
      encryption: BucketEncryption.S3_MANAGED,
      blockPublicAccess: BlockPublicAccess.BLOCK_ALL,
      enforceSSL: true,
      objectOwnership: ObjectOwnership.BUCKET_OWNER_PREFERRED,
      removalPolicy,
      autoDeleteObjects
    });

    this.bucket = new Bucket(this, "Bucket", {
      bucketName: props.config.BUCKET_NAME,
      encryption: BucketEncryption.S3_MANAGED,
      blockPublicAccess: BlockPublicAccess.BLOCK_ALL,
      enforceSSL: true,
      versioned: true,
      serverAccessLogsBucket: this.accessLogBucket,
      serverAccessLogsPrefix: "access-logs/",
      removalPolicy,
      autoDeleteObjects
    });
  }
}
