/**
 * Patient record as submitted for a match request. Validated once, frozen, and
 * never persisted beyond the request.
 */

import { z } from "zod";
import { ValidationError } from "./errors.js";

const IsoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected a YYYY-MM-DD date");
const RequiredText = z.string().trim().min(1);
const OptionalText = RequiredText.nullish();

export const ConditionSchema = z
  .object({
    name: RequiredText.describe("Condition name, e.g. 'Type 2 Diabetes'"),
    icd10_code: OptionalText.describe("ICD-10 code if available"),
    onset_date: IsoDate.nullish().describe("Date of diagnosis"),
  })
  .readonly();

export const MedicationSchema = z
  .object({
    name: RequiredText,
    dosage: OptionalText.describe("e.g. '500mg'"),
    frequency: OptionalText.describe("e.g. 'twice daily'"),
  })
  .readonly();

export const LabResultSchema = z
  .object({
    test_name: RequiredText.describe("e.g. 'HbA1c'"),
    value: z.number({ invalid_type_error: "lab value must be a number" }).finite(),
    unit: RequiredText.describe("e.g. '%' or 'mg/dL'"),
    date: IsoDate.nullish(),
  })
  .readonly();

export const PatientRecordSchema = z
  .object({
    age: z.number().int().min(0).max(120),
    gender: z.enum(["male", "female", "other"]),
    smoking_status: z.enum(["never", "former", "current"]),
    pregnant: z.boolean().nullish(),
    conditions: z.array(ConditionSchema).readonly().default([]),
    medications: z.array(MedicationSchema).readonly().default([]),
    lab_results: z.array(LabResultSchema).readonly().default([]),
  })
  .superRefine((patient, ctx) => {
    if (patient.gender === "male" && patient.pregnant === true) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["pregnant"],
        message: "pregnancy status is only meaningful for female or other patients",
      });
    }
  })
  .readonly();

export type PatientRecord = z.infer<typeof PatientRecordSchema>;
export type PatientRecordInput = z.input<typeof PatientRecordSchema>;
export type Condition = z.infer<typeof ConditionSchema>;
export type Medication = z.infer<typeof MedicationSchema>;
export type LabResult = z.infer<typeof LabResultSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

/** Throws ValidationError listing every problem with the input. */
export function parsePatientRecord(input: unknown): PatientRecord {
  const parsed = PatientRecordSchema.safeParse(input);
  if (!parsed.success) throw new ValidationError(formatIssues(parsed.error));
  return parsed.data;
}
