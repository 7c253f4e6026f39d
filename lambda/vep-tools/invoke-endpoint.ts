/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

import { s3Uri, ToolContext } from "./context";
import { ErrorCode, fail, succeed, ToolFailure, ToolResult } from "./envelope";
import { AsyncInferenceReceipt, InferenceError, StorageError } from "./ports";
import {
  VALID_AMINO_ACIDS,
  validateAminoAcidSequence,
  validateEventStructure,
  validationFailure
} from "./validators";

/** Residues the model processes per minute, used for the completion hint. */
const RESIDUES_PER_MINUTE = 600;

export interface InvokeEndpointData {
  s3_output_path: string;
  output_id: string;
  sequence_length: number;
  estimated_completion_time: string;
  inference_id: string;
  s3_input_path: string;
}

interface InferenceErrorMapping {
  readonly code: ErrorCode;
  readonly label: string;
}

const INFERENCE_ERRORS: Record<string, InferenceErrorMapping> = {
  ValidationError: {
    code: "SAGEMAKER_VALIDATION_ERROR",
    label: "SageMaker validation error"
  },
  ValidationException: {
    code: "SAGEMAKER_VALIDATION_ERROR",
    label: "SageMaker validation error"
  },
  ModelError: { code: "SAGEMAKER_MODEL_ERROR", label: "Model error" },
  ModelNotReadyException: {
    code: "SAGEMAKER_MODEL_ERROR",
    label: "Model error"
  },
  InternalFailure: {
    code: "SAGEMAKER_INTERNAL_ERROR",
    label: "SageMaker internal error"
  },
  InternalDependencyException: {
    code: "SAGEMAKER_INTERNAL_ERROR",
    label: "SageMaker internal error"
  },
  ServiceUnavailable: {
    code: "SAGEMAKER_SERVICE_UNAVAILABLE",
    label: "SageMaker service unavailable"
  }
};

/**
 * Extracts the output id from an async inference output location.
 *
 * @param outputLocation - e.g. `s3://bucket/async-inference-output/abc.out`
 * @returns The file stem, or undefined when the location has no `.out` object
 */
export function parseOutputId(outputLocation: string): string | undefined {
  const match = /\/([^/]+)\.out$/.exec(outputLocation);
  return match?.[1];
}

/**
 * Estimates when a submission will finish. This is a hint for the caller's
 * first poll, not a guarantee.
 *
 * @param submittedAt - When the request was submitted
 * @param sequenceLength - Number of residues
 * @returns The estimated completion instant
 */
export function estimateCompletionTime(
  submittedAt: Date,
  sequenceLength: number
): Date {
  const minutes = Math.floor(sequenceLength / RESIDUES_PER_MINUTE) + 1;
  return new Date(submittedAt.getTime() + minutes * 60_000);
}

function inferenceFailure(
  error: InferenceError,
  endpointName: string
): ToolFailure {
  const details = {
    endpoint_name: endpointName,
    error_code: error.code
  };
  if (error.kind === "connection") {
    return fail(
      "AWS_CONNECTION_ERROR",
      `Failed to connect to SageMaker: ${error.message}`,
      details
    );
  }
  const mapping: InferenceErrorMapping = INFERENCE_ERRORS[error.code] ?? {
    code: "SAGEMAKER_ERROR",
    label: "SageMaker error"
  };
  return fail(mapping.code, `${mapping.label}: ${error.message}`, details);
}

/**
 * Submits a sequence for asynchronous variant-effect prediction.
 *
 * Uploads the cleaned sequence under the input prefix, submits it to the
 * endpoint, and returns the output id the caller polls with `get_results`.
 *
 * @param payload - The tool payload, expected to carry `sequence`
 * @param ctx - Configuration and collaborators for this invocation
 * @returns The submission receipt or a typed failure
 */
export async function invokeEndpoint(
  payload: unknown,
  ctx: ToolContext
): Promise<ToolResult<InvokeEndpointData>> {
  const { config, telemetry } = ctx;
  const startedAt = ctx.now();

  const shape = validateEventStructure(payload, ["sequence"]);
  if (!shape.valid) {
    await telemetry.putMetric("ValidationError", 1);
    telemetry.logEvent("invalid_event", { errors: shape.errors }, "WARN");
    return validationFailure("INVALID_EVENT_STRUCTURE", shape.errors);
  }

  const checked = validateAminoAcidSequence(shape.event.sequence);
  if (!checked.valid) {
    await telemetry.putMetric("ValidationError", 1);
    telemetry.logEvent("invalid_sequence", { errors: checked.errors }, "WARN");
    return validationFailure("VALIDATION_ERROR", checked.errors, {
      invalid_characters: checked.invalidCharacters,
      valid_amino_acids: VALID_AMINO_ACIDS
    });
  }
  const sequence = checked.sequence;

  const jobId = ctx.generateId();
  const inputKey = `${config.inputPrefix}/${jobId}.json`;
  const inputLocation = s3Uri(config.bucketName, inputKey);

  try {
    await ctx.store.put(
      inputKey,
      JSON.stringify({ sequence }),
      "application/json"
    );
  } catch (error) {
    if (!(error instanceof StorageError)) {
      throw error;
    }
    await telemetry.putMetric("S3Error", 1);
    telemetry.logEvent(
      "input_upload_failed",
      { key: inputKey, error_code: error.code, error: error.message },
      "ERROR"
    );
    return fail(
      "S3_UPLOAD_ERROR",
      `Failed to upload input to S3: ${error.message}`,
      { error_code: error.code, bucket: config.bucketName, key: inputKey }
    );
  }

  let receipt: AsyncInferenceReceipt;
  try {
    receipt = await ctx.inference.submit({
      inputLocation,
      inferenceId: jobId,
      customAttributes: JSON.stringify({
        sequence_length: sequence.length,
        job_id: jobId
      })
    });
  } catch (error) {
    if (!(error instanceof InferenceError)) {
      throw error;
    }
    await telemetry.putMetric("SageMakerError", 1);
    telemetry.logEvent(
      "inference_submit_failed",
      { endpoint: config.endpointName, error_code: error.code, error: error.message },
      "ERROR"
    );
    return inferenceFailure(error, config.endpointName);
  }

  const outputLocation = receipt.outputLocation;
  const outputId =
    outputLocation === undefined ? undefined : parseOutputId(outputLocation);
  if (outputLocation === undefined || outputId === undefined) {
    await telemetry.putMetric("SageMakerError", 1);
    return fail(
      "SAGEMAKER_RESPONSE_ERROR",
      "SageMaker response did not include a usable output location",
      {
        endpoint_name: config.endpointName,
        output_location: outputLocation ?? null
      }
    );
  }

  const finishedAt = ctx.now();
  await telemetry.putMetric("InvocationSuccess", 1);
  await telemetry.putMetric(
    "InvocationDuration",
    finishedAt.getTime() - startedAt.getTime(),
    "Milliseconds"
  );
  await telemetry.putMetric("SequenceLength", sequence.length, "None");
  telemetry.logEvent("inference_submitted", {
    job_id: jobId,
    output_id: outputId,
    sequence_length: sequence.length
  });

  return succeed("Async inference request submitted successfully", {
    s3_output_path: outputLocation,
    output_id: outputId,
    sequence_length: sequence.length,
    estimated_completion_time: estimateCompletionTime(
      finishedAt,
      sequence.length
    ).toISOString(),
    inference_id: receipt.inferenceId ?? jobId,
    s3_input_path: inputLocation
  });
}
