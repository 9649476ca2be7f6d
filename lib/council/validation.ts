/**
 * Research context validation schema.
 */

import { z } from "zod";
import type { Dataset } from "../data/dataset";
import { hasColumn } from "../data/dataset";
import { DEFAULT_JOURNAL, isKnownJournal } from "../journals/formats";
import { ContextError } from "../errors";
import { STUDY_DESIGNS, type ResearchContext } from "./types";

export const ResearchContextSchema = z.object({
  researchQuestion: z
    .string()
    .trim()
    .min(10, "Research question must be at least 10 characters")
    .max(2000, "Research question must be at most 2,000 characters"),
  hypotheses: z.string().trim().max(5000).default(""),
  outcomeVar: z.string().trim().max(200).default(""),
  exposureVar: z.string().trim().max(200).default(""),
  covariates: z
    .union([z.string(), z.array(z.string())])
    .default([])
    .transform((value) =>
      (typeof value === "string" ? value.split(",") : value)
        .map((c) => c.trim())
        .filter((c) => c.length > 0)
    ),
  additionalContext: z.string().trim().max(5000).default(""),
  journal: z
    .string()
    .default(DEFAULT_JOURNAL)
    .refine(isKnownJournal, { message: "Unknown journal format" }),
  studyDesign: z.enum(STUDY_DESIGNS).default("Auto-detect"),
});

/**
 * Validate raw parameters (e.g. from the command line). Throws ContextError
 * naming each invalid field.
 */
export function parseResearchContext(input: unknown): ResearchContext {
  const parsed = ResearchContextSchema.safeParse(input);
  if (!parsed.success) {
    const problems = Object.entries(parsed.error.flatten().fieldErrors).map(
      ([field, messages]) => `${field}: ${(messages ?? []).join("; ")}`
    );
    throw new ContextError(`Invalid research context:\n  ${problems.join("\n  ")}`);
  }
  return parsed.data;
}

/**
 * Variables named in the context that the dataset does not have.
 */
export function findUnknownVariables(context: ResearchContext, dataset: Dataset): string[] {
  const named = [context.outcomeVar, context.exposureVar, ...context.covariates].filter(
    (name) => name.length > 0
  );
  return named.filter((name) => !hasColumn(dataset, name));
}
