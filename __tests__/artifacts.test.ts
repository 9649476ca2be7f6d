/**
 * Tests for the artifacts written at the end of a run.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createPipelineRun, PipelineRunner, type StageExecutors } from "@/lib/council/pipeline";
import type { ExecutionOutput, ResearchContext } from "@/lib/council/types";
import {
  AUDIT_FILE_NAME,
  buildAuditTrail,
  tableFileName,
  uniqueTableFileNames,
  writeArtifacts,
} from "@/lib/export/artifacts";
import { parseDataset } from "@/lib/data/dataset";
import { StageOrderError } from "@/lib/errors";

const DATASET = parseDataset("age,revised\n60,0\n71,1\n", "cohort.csv");

const CONTEXT: ResearchContext = {
  researchQuestion: "Does age predict revision?",
  hypotheses: "",
  outcomeVar: "revised",
  exposureVar: "age",
  covariates: [],
  additionalContext: "",
  journal: "JBJS",
  studyDesign: "Retrospective Cohort",
};

const response = { model: "m/a", content: "ok", responseTimeMs: 1, costUsd: 0 };

const EXECUTION: ExecutionOutput = {
  code: "import pandas as pd\n",
  codeModel: "m/coder",
  verification: "ok",
  verificationFlagged: false,
  results: "OR 1.5",
  figures: [
    { name: "figure_1.png", data: new Uint8Array([137, 80]) },
    { name: "figure_2.png", data: new Uint8Array([1]) },
  ],
  tables: [
    {
      name: "Results Table",
      fileName: "results_table.csv",
      table: parseDataset("term,or\nage,1.5\n", "results_table.csv"),
    },
  ],
  generationCostUsd: 0.5,
  sandboxCostUsd: 0.5,
  costUsd: 1,
};

const EXECUTORS: StageExecutors = {
  data_audit: async () => ({ report: "fine", response, costUsd: 0.125 }),
  planning: async () => ({
    plans: [],
    failedModels: [],
    synthesis: "Logistic regression",
    synthesisModel: "m/lead",
    disagreements: "Covariate set",
    editedByUser: false,
    costUsd: 0.5,
  }),
  assumptions: async () => ({ report: "hold", response, costUsd: 0.25 }),
  execution: async () => EXECUTION,
  review: async () => ({
    reviews: [],
    failedModels: [],
    combinedReview: "",
    issues: "MAJOR: small sample",
    confidence: "MEDIUM",
    severityCounts: { critical: 0, major: 1, minor: 0 },
    costUsd: 0.25,
  }),
  writing: async () => ({
    sections: { methods: "M", results: "R", legends: "L", limitations: "X" },
    journal: "JBJS",
    reportingGuideline: "STROBE",
    costUsd: 2,
  }),
};

async function completedRunner(): Promise<PipelineRunner> {
  const runner = new PipelineRunner(createPipelineRun(DATASET, CONTEXT, { id: "run-1" }), DATASET, EXECUTORS);
  while (!runner.isComplete()) {
    const runnable = runner.nextRunnableStage();
    const current = runner.currentStage();
    if (runnable !== null) {
      await runner.run(runnable);
    } else if (current !== null) {
      runner.approve(current, current === "planning" ? { modifications: "add BMI" } : {});
    }
  }
  return runner;
}

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "stats-council-artifacts-"));
  vi.spyOn(console, "info").mockImplementation(() => {});
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("tableFileName", () => {
  it("lower-cases the name and replaces spaces", () => {
    expect(tableFileName("Results Table")).toBe("results_table.csv");
    expect(tableFileName("Table 1")).toBe("table_1.csv");
  });
});

describe("uniqueTableFileNames", () => {
  it("suffixes repeated names in order", () => {
    expect(uniqueTableFileNames(["Table 1", "Results Table", "Table 1", "Table 1"])).toEqual([
      "table_1.csv",
      "results_table.csv",
      "table_1_2.csv",
      "table_1_3.csv",
    ]);
  });
});

describe("buildAuditTrail", () => {
  it("records costs, context and the review verdict", async () => {
    const runner = await completedRunner();
    const audit = buildAuditTrail(runner.record, new Date("2026-03-04T05:06:07.000Z"));

    expect(audit).toEqual({
      timestamp: "2026-03-04T05:06:07.000Z",
      runId: "run-1",
      dataset: "cohort.csv",
      totalCostUsd: 4.125,
      stageCosts: {
        data_audit: 0.125,
        planning: 0.5,
        assumptions: 0.25,
        execution: 1,
        review: 0.25,
        writing: 2,
      },
      journal: "JBJS",
      studyDesign: "Retrospective Cohort",
      researchQuestion: "Does age predict revision?",
      confidence: "MEDIUM",
      councilDisagreements: "Covariate set",
      reviewIssues: "MAJOR: small sample",
      planEditedByUser: false,
      modifications: "add BMI",
      reviewNotes: "",
    });
  });

  it("leaves review fields empty before the review ran", () => {
    const audit = buildAuditTrail(createPipelineRun(DATASET, CONTEXT, { id: "run-2" }));

    expect(audit.confidence).toBeNull();
    expect(audit.reviewIssues).toBeNull();
    expect(audit.councilDisagreements).toBeNull();
  });
});

describe("writeArtifacts", () => {
  it("writes the document, script, tables, figures and audit trail", async () => {
    const runner = await completedRunner();
    const pack = vi.fn(async () => new Uint8Array([9]));

    const written = await writeArtifacts(runner.record, dir, {
      pack,
      now: new Date("2026-03-04T05:06:07.000Z"),
    });

    expect(written.document).toEqual({ path: join(dir, "methods_results.docx"), format: "docx" });
    expect(written.script).toBe(join(dir, "analysis.py"));
    expect(written.tables).toEqual([join(dir, "results_table.csv")]);
    expect(written.figures).toEqual([join(dir, "figure_1.png"), join(dir, "figure_2.png")]);
    expect(written.audit).toBe(join(dir, AUDIT_FILE_NAME));

    expect((await readdir(dir)).sort()).toEqual([
      "analysis.py",
      "analysis_audit.json",
      "figure_1.png",
      "figure_2.png",
      "methods_results.docx",
      "results_table.csv",
    ]);
    expect(await readFile(written.script, "utf8")).toBe("import pandas as pd\n");
    expect(await readFile(join(dir, "results_table.csv"), "utf8")).toBe("term,or\nage,1.5\n");
    expect([...(await readFile(join(dir, "figure_1.png")))]).toEqual([137, 80]);

    const audit: unknown = JSON.parse(await readFile(written.audit, "utf8"));
    expect(audit).toMatchObject({ runId: "run-1", timestamp: "2026-03-04T05:06:07.000Z" });
  });

  it("writes tables with the same display name to separate files", async () => {
    const tables = [
      { name: "Table 1", fileName: "Table-1.csv", table: parseDataset("a\n1\n", "Table-1.csv") },
      { name: "Table 1", fileName: "table_1.csv", table: parseDataset("b\n2\n", "table_1.csv") },
    ];
    const runner = new PipelineRunner(
      createPipelineRun(DATASET, CONTEXT, { id: "run-3" }),
      DATASET,
      { ...EXECUTORS, execution: async () => ({ ...EXECUTION, tables }) }
    );
    while (!runner.isComplete()) {
      const runnable = runner.nextRunnableStage();
      const current = runner.currentStage();
      if (runnable !== null) await runner.run(runnable);
      else if (current !== null) runner.approve(current);
    }

    const written = await writeArtifacts(runner.record, dir, { pack: async () => new Uint8Array([9]) });

    expect(written.tables).toEqual([join(dir, "table_1.csv"), join(dir, "table_1_2.csv")]);
    expect(await readFile(join(dir, "table_1.csv"), "utf8")).toBe("a\n1\n");
    expect(await readFile(join(dir, "table_1_2.csv"), "utf8")).toBe("b\n2\n");
  });

  it("needs the execution and writing outputs", async () => {
    const record = createPipelineRun(DATASET, CONTEXT);

    await expect(writeArtifacts(record, dir)).rejects.toBeInstanceOf(StageOrderError);
  });
});
