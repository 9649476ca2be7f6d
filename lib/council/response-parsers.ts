/**
 * Response parsers — pull structure out of free-text model answers.
 *
 * Models are asked for labelled sections but rarely follow the format
 * exactly, so these parsers work on keywords and fall back to the raw text.
 */

import type { Confidence, SeverityCounts } from "./types";

const DISAGREEMENT_MARKERS = ["DISAGREEMENT", "CONFLICT", "DIFFER"];

/**
 * Extract the disagreement section from a council synthesis.
 *
 * Starts at the first line mentioning a disagreement marker and stops at the
 * first blank line once more than three lines have been collected.
 *
 * @returns The section, or null when the synthesis reports no disagreement
 */
export function extractDisagreements(synthesis: string): string | null {
  const upper = synthesis.toUpperCase();
  if (!upper.includes("DISAGREEMENT") && !upper.includes("CONFLICT")) {
    return null;
  }

  const collected: string[] = [];
  let inSection = false;

  for (const line of synthesis.split("\n")) {
    const lineUpper = line.toUpperCase();
    if (DISAGREEMENT_MARKERS.some((marker) => lineUpper.includes(marker))) {
      inSection = true;
    }
    if (!inSection) continue;

    collected.push(line);
    if (line.trim() === "" && collected.length > 3) break;
  }

  const section = collected.join("\n").trimEnd();
  return section ? section : null;
}

/**
 * Extract Python code from a model response.
 *
 * Prefers a ```python fence, then any fence, then the whole response.
 */
export function extractCode(response: string): string {
  const fenced = response.match(/```python[^\n]*\n?([\s\S]*?)```/);
  if (fenced && fenced[1].trim()) return fenced[1].trim();

  const anyFence = response.match(/```[^\n]*\n?([\s\S]*?)```/);
  if (anyFence && anyFence[1].trim()) return anyFence[1].trim();

  return response.trim();
}

/**
 * Whether a code review reports errors or bugs.
 */
export function verificationFlagsProblems(verification: string): boolean {
  const upper = verification.toUpperCase();
  return upper.includes("ERROR") || upper.includes("BUG");
}

/**
 * Prefix code with the first 500 characters of the review as Python comments.
 */
export function annotateWithVerification(code: string, verification: string): string {
  const notes = verification
    .slice(0, 500)
    .split("\n")
    .map((line) => `# ${line}`.trimEnd())
    .join("\n");
  return `# VERIFICATION NOTES:\n${notes}\n\n${code}`;
}

const ISSUE_KEYWORDS = [
  "ERROR",
  "FLAW",
  "INCORRECT",
  "SHOULD",
  "MUST",
  "VIOLATION",
  "MISSING",
];

const MAX_ISSUES = 10;

/**
 * Extract issue lines from an adversarial review (at most 10).
 */
export function extractIssues(review: string): string | null {
  const issues = review
    .split("\n")
    .filter((line) => {
      const upper = line.toUpperCase();
      return ISSUE_KEYWORDS.some((keyword) => upper.includes(keyword));
    })
    .map((line) => line.trim())
    .slice(0, MAX_ISSUES);

  return issues.length > 0 ? issues.join("\n") : null;
}

const CRITICAL_TERMS = ["critical", "severe", "major error", "incorrect", "invalid"];
const WARNING_TERMS = ["caution", "consider", "minor", "suggest", "could"];

/**
 * Overall confidence in the analysis, from the review's wording.
 *
 * Each term counts once no matter how often it appears.
 */
export function determineConfidence(review: string, issues: string | null): Confidence {
  const lower = review.toLowerCase();
  const criticalCount = CRITICAL_TERMS.filter((term) => lower.includes(term)).length;
  const warningCount = WARNING_TERMS.filter((term) => lower.includes(term)).length;
  const issueCount = issues ? issues.split("\n").length : 0;

  if (criticalCount >= 2 || issueCount > 5) return "LOW";
  if (criticalCount >= 1 || warningCount >= 3) return "MEDIUM";
  return "HIGH";
}

/**
 * Count upper-case severity labels the reviewers attached to their findings.
 */
export function extractSeverityCounts(review: string): SeverityCounts {
  const count = (label: string) =>
    (review.match(new RegExp(`\\b${label}\\b`, "g")) ?? []).length;

  return {
    critical: count("CRITICAL"),
    major: count("MAJOR"),
    minor: count("MINOR"),
  };
}
