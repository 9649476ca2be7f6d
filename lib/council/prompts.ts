/**
 * Prompt templates for the six-stage analysis pipeline.
 *
 * System prompts are constants; user prompts are template literal functions
 * over the run's accumulated state.
 */

import type { JournalFormat } from "../journals/formats";

// ---------------------------------------------------------------------------
// Stage 1 — Data Audit
// ---------------------------------------------------------------------------

export const DATA_AUDIT_SYSTEM = `You are a senior biostatistician who reviews clinical and orthopedic research datasets before any analysis is run.
Audit the dataset and surface every problem that could compromise the analysis.

Concentrate on:
1. Data quality (missingness patterns, outliers, impossible values)
2. Variable types and any recoding they need
3. Whether the sample size is adequate
4. Likely confounders
5. Distributional shape of key variables

Organize the answer under clear headings and quote concrete numbers and percentages.`;

export interface DataAuditPromptInput {
  dataSummary: string;
  researchQuestion: string;
  outcomeVar: string;
  exposureVar: string;
  additionalContext: string;
}

export function buildDataAuditPrompt(input: DataAuditPromptInput): string {
  const context = input.additionalContext.trim()
    ? `\nADDITIONAL CONTEXT:\n${input.additionalContext}\n`
    : "";

  return `Audit the following dataset ahead of a statistical analysis.

DATASET SUMMARY:
${input.dataSummary}

RESEARCH QUESTION:
${input.researchQuestion}

PRIMARY OUTCOME: ${input.outcomeVar || "Not specified"}
PRIMARY EXPOSURE: ${input.exposureVar || "Not specified"}
${context}
Cover each of the following:

1. DATA QUALITY
   - Missing data patterns and the likely mechanism (MCAR / MAR / MNAR)
   - Outliers and impossible values
   - Whether each data type fits its variable

2. KEY VARIABLES
   - Outcome: distribution, event rate when binary
   - Exposure: distribution and categories
   - Covariates worth including

3. SAMPLE SIZE
   - Adequacy for the likely analyses
   - Events per variable where relevant

4. RISKS
   - Confounders to handle
   - Selection bias
   - How missing data should be handled

5. RECOMMENDATIONS
   - Cleaning steps
   - Transformations
   - Overall feasibility`;
}

// ---------------------------------------------------------------------------
// Stage 2 — Planning Council
// ---------------------------------------------------------------------------

export const PLANNING_SYSTEM = `You sit on a council of biostatisticians reviewing a research proposal.
Independently propose the statistical analysis plan you consider most appropriate.

Take into account:
- What the study design implies
- Which tests or models fit the data
- Assumptions each method requires
- Corrections for multiple comparisons
- Which effect sizes to report
- Sensitivity analyses

Justify every choice of test. When several approaches are defensible, name your preference and say why.`;

export interface PlanningPromptInput {
  dataSummary: string;
  dataAudit: string;
  researchQuestion: string;
  hypotheses: string;
  outcomeVar: string;
  exposureVar: string;
  covariates: string[];
  studyDesign: string;
}

export function buildPlanningPrompt(input: PlanningPromptInput): string {
  return `Propose a statistical analysis plan for this study.

DATASET SUMMARY:
${input.dataSummary}

DATA AUDIT FINDINGS:
${input.dataAudit}

RESEARCH QUESTION:
${input.researchQuestion}

HYPOTHESES:
${input.hypotheses || "None stated"}

PRIMARY OUTCOME: ${input.outcomeVar || "Not specified"}
PRIMARY EXPOSURE: ${input.exposureVar || "Not specified"}
COVARIATES: ${input.covariates.length > 0 ? input.covariates.join(", ") : "None specified"}
STUDY DESIGN: ${input.studyDesign}

Lay out the plan as:

1. PRIMARY ANALYSIS
   - Test or model, with rationale
   - Assumptions to check
   - Effect size to report

2. TABLE 1
   - Variables
   - Stratification
   - Comparison tests

3. SECONDARY ANALYSES
   - Subgroups, if warranted
   - Sensitivity analyses

4. MULTIPLE COMPARISONS
   - Number of planned tests
   - Correction method, if any

5. MISSING DATA
   - Handling approach
   - Sensitivity analysis for missingness

6. MODEL DIAGNOSTICS
   - Checks to run
   - What to do if assumptions fail`;
}

export const SYNTHESIS_SYSTEM = `You are the lead statistician combining proposals from the members of an analysis council.
You must:
1. Identify where the members agree
2. Name each disagreement and settle it
3. Deliver one unified analysis plan

Where members disagree, lay out the tradeoffs and make a reasoned decision.
State plainly any uncertainty that remains.`;

export interface SynthesisPromptInput {
  researchQuestion: string;
  plans: { name: string; plan: string }[];
}

export function buildSynthesisPrompt(input: SynthesisPromptInput): string {
  const plansText = input.plans
    .map(({ name, plan }) => `=== ${name} ===\n${plan}`)
    .join("\n\n");

  return `Combine these independent analysis proposals into one plan.

COUNCIL PROPOSALS:
${plansText}

RESEARCH QUESTION:
${input.researchQuestion}

Structure the answer as:

1. UNIFIED ANALYSIS PLAN
   - Primary analysis
   - Secondary analyses
   - Sensitivity analyses

2. COUNCIL AGREEMENT
   - Points every member agreed on
   - How strong the consensus is

3. DISAGREEMENTS RESOLVED
   - Each point of disagreement
   - How it was resolved and why
   - What remains uncertain

4. FINAL RECOMMENDATIONS
   - Step-by-step plan
   - Critical decision points
   - Quality control checks`;
}

// ---------------------------------------------------------------------------
// Stage 3 — Assumption Verification
// ---------------------------------------------------------------------------

export const ASSUMPTIONS_SYSTEM = `You are a statistical methodologist who verifies that an analysis plan's assumptions hold before it runs.

For every assumption:
1. State it formally
2. Say how to test it
3. Give the threshold that counts as a violation
4. Name the alternative if it is violated`;

export interface AssumptionsPromptInput {
  dataSummary: string;
  analysisPlan: string;
  modifications: string;
}

export function buildAssumptionsPrompt(input: AssumptionsPromptInput): string {
  return `Verify the statistical assumptions behind this analysis plan.

DATASET SUMMARY:
${input.dataSummary}

ANALYSIS PLAN:
${input.analysisPlan}

USER MODIFICATIONS:
${input.modifications || "None"}

For every planned test or model, give:

1. ASSUMPTION CHECKLIST
   For each assumption:
   - [ ] Name
   - Test method
   - Threshold
   - Alternative if violated

2. SPECIFIC CHECKS
   - Normality: Shapiro-Wilk below n=50, otherwise visual inspection plus Kolmogorov-Smirnov
   - Homoscedasticity: Levene's test, residual plots
   - Independence: review of the design
   - Linearity: scatter and residual plots
   - Multicollinearity: VIF
   - Proportional hazards: Schoenfeld residuals for Cox models
   - Cell counts: expected frequencies for chi-square

3. SAMPLE SIZE
   - Events per variable
   - Power
   - Minimum detectable effect

4. CHECKS TO RUN
   - Exact tests or code
   - Rules for deciding whether to proceed`;
}

// ---------------------------------------------------------------------------
// Stage 4 — Code Generation and Verification
// ---------------------------------------------------------------------------

export const CODE_GENERATION_SYSTEM = `You write Python for statistical analyses in medical research.
The code must be clean, documented and ready for publication.

Requirements:
- Use pandas, scipy, statsmodels and scikit-learn as appropriate
- Comment every step
- Produce publication-quality figures with matplotlib or seaborn
- Report every estimate with a confidence interval
- Format output for medical journals
- Fix random seeds
- Catch and report errors instead of crashing

Answer with Python code only; put explanations in comments.`;

export interface CodeGenerationPromptInput {
  dataSummary: string;
  columns: string[];
  analysisPlan: string;
  assumptions: string;
  modifications: string;
  journalFormat: JournalFormat;
}

export function buildCodeGenerationPrompt(input: CodeGenerationPromptInput): string {
  return `Write the Python code for this statistical analysis.

DATASET SUMMARY:
${input.dataSummary}

COLUMNS AVAILABLE:
${JSON.stringify(input.columns)}

ANALYSIS PLAN:
${input.analysisPlan}

ASSUMPTION VERIFICATION:
${input.assumptions}

USER MODIFICATIONS:
${input.modifications || "None"}

TARGET JOURNAL FORMAT:
${JSON.stringify(input.journalFormat, null, 2)}

The script must:

1. SETUP
   - Import every library it uses
   - Fix the random seed
   - Set publication-quality plot defaults

2. DATA
   - Load 'data.csv'
   - Apply the documented cleaning steps
   - Derive any new variables

3. TABLE 1
   - Build the demographics table with the right statistics and comparison p-values
   - Save it as 'table_1.csv'

4. PRIMARY ANALYSIS
   - Run the main test or model
   - Report effect sizes with 95% CI
   - Check assumptions
   - Print formatted results

5. FIGURES
   - Draw every required figure
   - Save each as 'figure_N.png'

6. SECONDARY ANALYSES
   - Subgroup and sensitivity analyses
   - Save model results as 'results_table.csv'

7. SUMMARY
   - Print a complete text summary of every key statistic in the journal's format`;
}

export const CODE_VERIFICATION_SYSTEM = `You review statistical analysis code.
Look for:
1. Statistical mistakes
2. Bugs
3. Analyses missing from the plan
4. Wrong assumptions
5. Output formatting problems

Be specific about every problem you find.`;

export interface CodeVerificationPromptInput {
  code: string;
  analysisPlan: string;
}

export function buildCodeVerificationPrompt(input: CodeVerificationPromptInput): string {
  return `Review this analysis code for correctness.

CODE:
\`\`\`python
${input.code}
\`\`\`

INTENDED ANALYSIS PLAN:
${input.analysisPlan}

Check for:
1. Statistical errors (wrong test, wrong parameters)
2. Coding bugs (syntax or logic)
3. Steps of the plan that are missing
4. Wrong p-value or CI calculations
5. Figure or table formatting problems
6. Missing assumption checks

Report each issue with a line reference and the fix.`;
}

// ---------------------------------------------------------------------------
// Stage 5 — Adversarial Review
// ---------------------------------------------------------------------------

export const ADVERSARIAL_SYSTEM = `You are a hostile peer reviewer for a leading medical journal.
Your only task is to find statistical errors, methodological flaws and conclusions the data do not support.

Assume the authors made mistakes and find them.

Look at:
- Assumption violations
- Multiple comparisons
- Unaddressed confounders
- Inappropriate tests
- Overinterpretation
- Statistical versus clinical significance
- Sample size
- Missing sensitivity analyses`;

export interface AdversarialPromptInput {
  analysisPlan: string;
  code: string;
  results: string;
  assumptions: string;
}

export function buildAdversarialPrompt(input: AdversarialPromptInput): string {
  return `Review this statistical analysis for flaws.

ANALYSIS PLAN:
${input.analysisPlan}

CODE EXECUTED:
\`\`\`python
${input.code}
\`\`\`

RESULTS:
${input.results}

ASSUMPTION VERIFICATION:
${input.assumptions}

As a hostile reviewer, list every problem under:

1. METHODOLOGICAL FLAWS
2. STATISTICAL ERRORS
3. REPORTING ISSUES
4. MISSING ANALYSES
5. OVERSTATEMENTS

Label each issue with its SEVERITY: CRITICAL / MAJOR / MINOR`;
}

// ---------------------------------------------------------------------------
// Stage 6 — Results Writing
// ---------------------------------------------------------------------------

export const WRITING_SYSTEM = `You are a medical writer who turns statistical output into text for peer-reviewed journals.
Write precise, publication-ready prose that follows the journal's conventions exactly.

Rules:
- Past tense for methods and results
- Exact statistics: test statistic, df, p-value, effect size, CI
- Never overstate a finding
- Hedge where the evidence calls for it
- Follow the journal format to the letter
- Cite the statistical software`;

export interface MethodsPromptInput {
  analysisPlan: string;
  studyDesign: string;
  reportingGuideline: string;
  journalFormat: JournalFormat;
  sampleSize: number;
  softwareCitation: string;
}

export function buildMethodsPrompt(input: MethodsPromptInput): string {
  return `Write the Statistical Analysis subsection of the Methods.

ANALYSIS PLAN:
${input.analysisPlan}

STUDY DESIGN: ${input.studyDesign}
REPORTING GUIDELINE: ${input.reportingGuideline}
JOURNAL FORMAT: ${JSON.stringify(input.journalFormat, null, 2)}
SAMPLE SIZE: ${input.sampleSize}
SOFTWARE STATEMENT: ${input.softwareCitation}

Include:
1. Software statement
2. Descriptive statistics
3. Primary analysis
4. Secondary analyses
5. Sensitivity analyses
6. Multiple comparison correction, if any
7. Missing data handling
8. Significance threshold`;
}

export interface ResultsPromptInput {
  executionResults: string;
  tableSummaries: Record<string, string>;
  figureCount: number;
  journalFormat: JournalFormat;
  reportingGuideline: string;
}

export function buildResultsPrompt(input: ResultsPromptInput): string {
  return `Write the Results section from these outputs.

STATISTICAL OUTPUTS:
${input.executionResults}

TABLES:
${JSON.stringify(input.tableSummaries, null, 2)}

NUMBER OF FIGURES: ${input.figureCount}

JOURNAL FORMAT: ${JSON.stringify(input.journalFormat, null, 2)}
REPORTING GUIDELINE: ${input.reportingGuideline}

The Results must:
1. Open with the cohort description
2. Point to Table 1 for demographics
3. Report the primary outcome with full statistics
4. Report secondary analyses
5. Reference each figure
6. Use the exact numbers from the outputs
7. Format statistics as the journal requires`;
}

export interface FigureLegendsPromptInput {
  figureCount: number;
  executionResults: string;
  journalFormat: JournalFormat;
}

export function buildFigureLegendsPrompt(input: FigureLegendsPromptInput): string {
  return `Write legends for ${input.figureCount} figures.

ANALYSIS RESULTS:
${input.executionResults.slice(0, 3000)}

JOURNAL FORMAT:
${JSON.stringify(input.journalFormat, null, 2)}

Each legend should say what the figure shows, expand abbreviations, give sample sizes where relevant and explain statistical annotations.

Format: "Figure N. [Title]. [Description]..."`;
}

export interface LimitationsPromptInput {
  studyDesign: string;
  review: string;
  reviewNotes: string;
  analysisPlan: string;
}

export function buildLimitationsPrompt(input: LimitationsPromptInput): string {
  const notes = input.reviewNotes.trim()
    ? `\nAUTHOR NOTES ON THE REVIEW:\n${input.reviewNotes}\n`
    : "";

  return `Write the Limitations paragraph for this analysis.

STUDY DESIGN: ${input.studyDesign}

ADVERSARIAL REVIEW FINDINGS:
${input.review}
${notes}
ANALYSIS APPROACH:
${input.analysisPlan}

The paragraph should acknowledge the key limitations, answer the review's findings, note any assumption violations, discuss generalizability and unmeasured confounding, and stay self-critical without undermining the findings.

One substantial paragraph of 150-250 words.`;
}
