/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

import { fail, ToolFailure } from "./envelope";

/** The 20 canonical amino acids accepted by the model. */
export const VALID_AMINO_ACIDS = "ACDEFGHIKLMNPQRSTVWY";

export const MAX_SEQUENCE_LENGTH = 10000;

const PUNCTUATION = ".,;:!?()[]{}";

export type SequenceValidation =
  | { readonly valid: true; readonly sequence: string }
  | {
      readonly valid: false;
      readonly errors: string[];
      readonly invalidCharacters: string[];
    };

export type EventValidation =
  | { readonly valid: true; readonly event: Record<string, unknown> }
  | { readonly valid: false; readonly errors: string[] };

/**
 * Narrows an unknown value to a plain object.
 *
 * @param value - The value to check
 * @returns True when the value is a non-null, non-array object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Trims a sequence and upper-cases its ASCII letters. Other characters are
 * left as they are so the alphabet check sees them. Non-strings become an
 * empty string.
 *
 * @param value - The raw sequence
 * @returns The cleaned sequence
 */
export function cleanSequence(value: unknown): string {
  return typeof value === "string"
    ? value.trim().replace(/[a-z]/g, (char) => char.toUpperCase())
    : "";
}

/**
 * Validates an amino acid sequence.
 *
 * Length and character problems are reported together so a caller can fix
 * them in one pass. Invalid characters are deduplicated and sorted.
 *
 * @param value - The candidate sequence
 * @returns The cleaned sequence, or every reason it was rejected
 */
export function validateAminoAcidSequence(value: unknown): SequenceValidation {
  if (typeof value !== "string") {
    return {
      valid: false,
      errors: ["Amino acid sequence must be a string"],
      invalidCharacters: []
    };
  }

  const sequence = cleanSequence(value);
  if (sequence.length === 0) {
    return {
      valid: false,
      errors: ["Amino acid sequence cannot be empty"],
      invalidCharacters: []
    };
  }

  const errors: string[] = [];
  if (sequence.length > MAX_SEQUENCE_LENGTH) {
    errors.push("Amino acid sequence too long (maximum 10,000 characters)");
  }

  const invalidCharacters = Array.from(new Set(sequence))
    .filter((char) => !VALID_AMINO_ACIDS.includes(char))
    .sort();

  if (invalidCharacters.length > 0) {
    errors.push(
      `Invalid amino acid characters found: ${invalidCharacters.join(", ")}. ` +
        `Only standard 20 amino acids are allowed: ${VALID_AMINO_ACIDS.split("").join(", ")}`
    );
  }
  if (/\d/.test(sequence)) {
    errors.push("Amino acid sequence should not contain numbers");
  }
  if (Array.from(sequence).some((char) => PUNCTUATION.includes(char))) {
    errors.push("Amino acid sequence should not contain punctuation marks");
  }

  if (errors.length > 0) {
    return { valid: false, errors, invalidCharacters };
  }
  return { valid: true, sequence };
}

/**
 * Checks that the event is an object carrying every required field.
 *
 * @param event - The raw tool payload
 * @param requiredFields - Field names that must be present, non-null and non-blank
 * @returns The event as a record, or the list of problems
 */
export function validateEventStructure(
  event: unknown,
  requiredFields: readonly string[]
): EventValidation {
  if (!isRecord(event)) {
    return { valid: false, errors: ["Event must be a JSON object"] };
  }

  const errors: string[] = [];
  for (const field of requiredFields) {
    const value = event[field];
    if (!(field in event)) {
      errors.push(`Missing required field: '${field}'`);
    } else if (value === null || value === undefined) {
      errors.push(`Required field '${field}' cannot be null`);
    } else if (typeof value === "string" && value.trim() === "") {
      errors.push(`Required field '${field}' cannot be empty`);
    }
  }

  if (errors.length > 0) {
    return { valid: false, errors };
  }
  return { valid: true, event };
}

/**
 * Builds the failure returned for any input validation problem.
 *
 * @param code - INVALID_EVENT_STRUCTURE for shape problems, VALIDATION_ERROR for sequence content
 * @param errors - The individual validation messages
 * @param extra - Additional diagnostic details
 * @returns The validation failure
 */
export function validationFailure(
  code: "INVALID_EVENT_STRUCTURE" | "VALIDATION_ERROR",
  errors: string[],
  extra: Record<string, unknown> = {}
): ToolFailure {
  return fail(code, "Input validation failed", { errors, ...extra });
}
