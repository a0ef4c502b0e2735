import { ZodError } from "zod";
import {
  BaseDatasetSchema,
  CompleteDatasetSchema,
  DatasetInput,
  DatasetVariant,
} from "../interfaces/dataset.interface";
import { ValidationError, ValidationIssue } from "./errors";

const SCHEMAS = {
  base: BaseDatasetSchema,
  complete: CompleteDatasetSchema,
} as const;

function toIssues(err: ZodError): ValidationIssue[] {
  return err.issues.map((i) => ({ path: i.path.join("."), message: i.message }));
}

/**
 * Checks that `input` has the shape of a dataset document and returns it with
 * missing descriptions set to null. Throws ValidationError otherwise.
 */
export function validateDataset(input: unknown, variant: DatasetVariant = "base"): DatasetInput {
  const result = SCHEMAS[variant].safeParse(input);
  if (!result.success) throw new ValidationError(toIssues(result.error));
  return result.data;
}

export function completenessIssues(input: unknown): ValidationIssue[] {
  const result = CompleteDatasetSchema.safeParse(input);
  return result.success ? [] : toIssues(result.error);
}

export function isCompleteDataset(input: unknown): boolean {
  return CompleteDatasetSchema.safeParse(input).success;
}
