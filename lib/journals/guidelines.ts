import type { StudyDesign } from "../council/types";

const STROBE =
  "STROBE (Strengthening the Reporting of Observational Studies in Epidemiology)";

const REPORTING_GUIDELINES: Record<StudyDesign, string> = {
  "Auto-detect": STROBE,
  "Retrospective Cohort": STROBE,
  "Prospective Cohort": STROBE,
  "Case-Control": STROBE,
  "Cross-sectional": STROBE,
  RCT: "CONSORT (Consolidated Standards of Reporting Trials)",
  "Case Series": "CARE (Case Report Guidelines)",
  "Prediction Model":
    "TRIPOD (Transparent Reporting of a Multivariable Prediction Model for Individual Prognosis or Diagnosis)",
};

/**
 * Reporting guideline the write-up should follow for a study design.
 */
export function getReportingGuideline(design: StudyDesign): string {
  return REPORTING_GUIDELINES[design];
}
