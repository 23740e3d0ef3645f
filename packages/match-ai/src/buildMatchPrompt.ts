/**
 * Renders a patient record and one trial's criteria into the matching prompt.
 * Pure and deterministic. Every populated field is rendered; absent optional fields
 * are left out entirely so the backend does not read "unknown" as "no".
 */

import type { Trial } from "@trialmatch/database";
import type { PatientRecord } from "./patient.js";

const INSTRUCTIONS = `Your task:
1. Parse the inclusion and exclusion criteria into individual criteria.
2. Compare each criterion against the patient profile. Judge only facts stated in the profile; a fact that is not listed is unknown, not negative.
3. Decide whether the patient meets ALL inclusion criteria.
4. Decide whether the patient violates ANY exclusion criterion.
5. Give an overall match score from 0.0 to 1.0.
6. Explain the verdict briefly.

Respond with a single JSON object in exactly this shape:
{
  "eligible": true,
  "score": 0.85,
  "explanation": "Brief summary for the patient",
  "reasoning": "Detailed reasoning",
  "inclusion_matches": ["inclusion criterion met"],
  "inclusion_mismatches": ["inclusion criterion not met"],
  "exclusion_violations": ["exclusion criterion violated"],
  "exclusion_passes": ["exclusion criterion passed or not applicable"]
}

Scoring guidance:
- 0.9-1.0 = Strong match: all inclusion criteria met, no exclusion criterion violated
- 0.6-0.8 = Moderate match: some criteria ambiguous
- 0.4-0.5 = Weak match: explicit mismatches
- 0.0-0.3 = Poor match, or an exclusion criterion is violated

If the eligibility criteria are missing or unclear, reason from the trial title and summary.
Return ONLY the JSON object, no other text.`;

export function formatPatient(patient: PatientRecord): string {
  const lines = [
    "Patient Profile:",
    `- Age: ${patient.age} years`,
    `- Gender: ${patient.gender}`,
    `- Smoking Status: ${patient.smoking_status}`,
  ];
  // A male patient can only carry `pregnant: false`, which says nothing.
  if (patient.pregnant != null && patient.gender !== "male") {
    lines.push(`- Pregnancy Status: ${patient.pregnant ? "Pregnant" : "Not pregnant"}`);
  }

  if (patient.conditions.length > 0) {
    lines.push("", "Medical Conditions:");
    for (const c of patient.conditions) {
      let line = `  - ${c.name}`;
      if (c.icd10_code) line += ` (ICD-10: ${c.icd10_code})`;
      if (c.onset_date) line += ` since ${c.onset_date}`;
      lines.push(line);
    }
  }

  if (patient.medications.length > 0) {
    lines.push("", "Current Medications:");
    for (const m of patient.medications) {
      let line = `  - ${m.name}`;
      if (m.dosage) line += ` ${m.dosage}`;
      if (m.frequency) line += `, ${m.frequency}`;
      lines.push(line);
    }
  }

  if (patient.lab_results.length > 0) {
    lines.push("", "Recent Lab Results:");
    for (const lab of patient.lab_results) {
      let line = `  - ${lab.test_name}: ${lab.value} ${lab.unit}`;
      if (lab.date) line += ` (${lab.date})`;
      lines.push(line);
    }
  }

  return lines.join("\n");
}

export function formatTrial(trial: Trial): string {
  const lines: string[] = [];
  if (trial.title) lines.push(`Clinical Trial: ${trial.title}`);
  lines.push(`NCT ID: ${trial.nct_id}`);
  if (trial.phase) lines.push(`Phase: ${trial.phase}`);
  if (trial.conditions.length > 0) lines.push(`Conditions Studied: ${trial.conditions.join("; ")}`);
  if (trial.sex) lines.push(`Eligible Sex: ${trial.sex}`);
  if (trial.minimum_age) lines.push(`Minimum Age: ${trial.minimum_age}`);
  if (trial.maximum_age) lines.push(`Maximum Age: ${trial.maximum_age}`);
  if (trial.brief_summary) lines.push("", "Summary:", trial.brief_summary);
  if (trial.inclusion_criteria) lines.push("", "Inclusion Criteria:", trial.inclusion_criteria);
  if (trial.exclusion_criteria) lines.push("", "Exclusion Criteria:", trial.exclusion_criteria);
  return lines.join("\n");
}

export function buildMatchPrompt(patient: PatientRecord, trial: Trial): string {
  return [
    "You are a clinical trial matching expert. Decide whether the patient below is eligible for the clinical trial below.",
    formatPatient(patient),
    formatTrial(trial),
    INSTRUCTIONS,
  ].join("\n\n");
}
