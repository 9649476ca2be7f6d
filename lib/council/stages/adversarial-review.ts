/**
 * Stage 5 — Adversarial Review.
 *
 * Reviewers attack the executed analysis in parallel; their critiques are
 * stitched into one review, then scanned for issue lines, severity labels
 * and an overall confidence rating.
 */

import type { ModelResponse, ReviewOutput } from "../types";
import { queryModelsParallel, singleTurn } from "../openrouter";
import { ADVERSARIAL_SYSTEM, buildAdversarialPrompt } from "../prompts";
import {
  determineConfidence,
  extractIssues,
  extractSeverityCounts,
} from "../response-parsers";
import { getModelDisplayName } from "../models";
import { RemoteCallError } from "../../errors";

export interface AdversarialReviewInput {
  analysisPlan: string;
  code: string;
  results: string;
  assumptions: string;
  reviewers: string[];
  timeoutMs?: number;
}

export function combineReviews(reviews: ModelResponse[]): string {
  return reviews
    .map((r, i) => `## Review ${i + 1} (${getModelDisplayName(r.model)})\n${r.content}`)
    .join("\n\n");
}

export async function runAdversarialReview(input: AdversarialReviewInput): Promise<ReviewOutput> {
  const prompt = buildAdversarialPrompt({
    analysisPlan: input.analysisPlan,
    code: input.code,
    results: input.results,
    assumptions: input.assumptions,
  });

  const results = await queryModelsParallel(
    input.reviewers,
    singleTurn(ADVERSARIAL_SYSTEM, prompt, { temperature: 0.7, timeoutMs: input.timeoutMs })
  );

  const reviews: ModelResponse[] = [];
  const failedModels: string[] = [];
  for (const model of input.reviewers) {
    const result = results.get(model);
    if (!result) {
      failedModels.push(model);
      continue;
    }
    reviews.push({
      model,
      content: result.content,
      responseTimeMs: result.responseTimeMs,
      costUsd: result.costUsd,
    });
  }

  if (reviews.length === 0) {
    throw new RemoteCallError(
      "review",
      input.reviewers.join(", "),
      "Adversarial review failed: no reviewer responded."
    );
  }

  const combinedReview = combineReviews(reviews);
  const issues = extractIssues(combinedReview);

  return {
    reviews,
    failedModels,
    combinedReview,
    issues,
    confidence: determineConfidence(combinedReview, issues),
    severityCounts: extractSeverityCounts(combinedReview),
    costUsd: reviews.reduce((sum, r) => sum + r.costUsd, 0),
  };
}
