/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

/**
 * Lambda entry point for the protein variant-effect prediction tools.
 *
 * SDK clients are created once per execution environment and bound to the
 * configured bucket and endpoint on each invocation.
 */

import { CloudWatchClient } from "@aws-sdk/client-cloudwatch";
import { S3Client } from "@aws-sdk/client-s3";
import { SageMakerRuntimeClient } from "@aws-sdk/client-sagemaker-runtime";
import { v4 as uuidv4 } from "uuid";

import {
  CloudWatchMetricsSink,
  S3ObjectStore,
  SageMakerAsyncInference
} from "./aws-adapters";
import { ResponseEnvelope } from "./envelope";
import { routeToolInvocation, ToolInvocationContext } from "./router";

const s3Client = new S3Client({});
const sageMakerClient = new SageMakerRuntimeClient({});
const metricsSink = new CloudWatchMetricsSink(new CloudWatchClient({}));

export const handler = async (
  event: unknown,
  context: ToolInvocationContext
): Promise<ResponseEnvelope> =>
  routeToolInvocation(event, context, {
    env: process.env,
    metricsSink,
    generateId: () => uuidv4(),
    createClients: (config) => ({
      store: new S3ObjectStore(s3Client, config.bucketName),
      inference: new SageMakerAsyncInference(
        sageMakerClient,
        config.endpointName
      )
    })
  });
