/**
 * Verification reports and their persisted document form.
 *
 * A report is filled in category by category through
 * {@link VerificationReportBuilder}, then frozen by `build()`. Failing checks
 * are data here, never exceptions.
 *
 * @module verify/report
 */

import { z } from "zod";
import { DEFAULT_MAX_ISSUES_PER_CATEGORY } from "../config/constants.js";

export interface CategoryResult {
  readonly passed: boolean;
  readonly issues: readonly string[];
}

export interface VerificationReport {
  readonly categories: Readonly<Record<string, CategoryResult>>;
  readonly overallPassed: boolean;
}

export interface GraphCounts {
  nodes: number;
  edges: number;
}

export interface VerificationOutcome {
  report: VerificationReport;
  counts: { original: GraphCounts; filtered: GraphCounts };
}

export interface CategoryRecorder {
  fail(issue: string): void;
}

interface CategoryState {
  issues: string[];
  overflow: number;
}

export class VerificationReportBuilder {
  private categories = new Map<string, CategoryState>();
  private readonly maxIssues: number;

  constructor(maxIssuesPerCategory: number = DEFAULT_MAX_ISSUES_PER_CATEGORY) {
    this.maxIssues = Math.max(1, maxIssuesPerCategory);
  }

  category(name: string): CategoryRecorder {
    let state = this.categories.get(name);
    if (!state) {
      state = { issues: [], overflow: 0 };
      this.categories.set(name, state);
    }
    const target = state;
    return {
      fail: (issue: string): void => {
        if (target.issues.length < this.maxIssues) {
          target.issues.push(issue);
        } else {
          target.overflow++;
        }
      },
    };
  }

  /**
   * Runs one check into its category. A check that throws is recorded as a
   * failure of that category and the remaining checks still run.
   */
  run(name: string, check: (recorder: CategoryRecorder) => void): void {
    const recorder = this.category(name);
    try {
      check(recorder);
    } catch (error) {
      recorder.fail(
        `internal error: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  build(): VerificationReport {
    const categories: Record<string, CategoryResult> = {};
    let overallPassed = true;

    for (const [name, state] of this.categories) {
      const issues = [...state.issues];
      if (state.overflow > 0) {
        issues.push(`... and ${state.overflow} more`);
      }
      const passed = issues.length === 0;
      overallPassed = overallPassed && passed;
      categories[name] = Object.freeze({
        passed,
        issues: Object.freeze(issues),
      });
    }

    return Object.freeze({
      categories: Object.freeze(categories),
      overallPassed,
    });
  }
}

export const CategoryResultSchema = z.object({
  passed: z.boolean(),
  issues: z.array(z.string()),
});

export const ReportDocumentSchema = z.object({
  files: z.record(z.string()),
  counts: z.object({
    original_nodes: z.number().int().min(0),
    original_edges: z.number().int().min(0),
    filtered_nodes: z.number().int().min(0),
    filtered_edges: z.number().int().min(0),
  }),
  verification_results: z.record(CategoryResultSchema),
  overall_passed: z.boolean(),
});

export type ReportDocument = z.infer<typeof ReportDocumentSchema>;

export function toReportDocument(
  outcome: VerificationOutcome,
  files: Record<string, string>,
): ReportDocument {
  const verificationResults: ReportDocument["verification_results"] = {};
  for (const [name, result] of Object.entries(outcome.report.categories)) {
    verificationResults[name] = {
      passed: result.passed,
      issues: [...result.issues],
    };
  }

  return {
    files: { ...files },
    counts: {
      original_nodes: outcome.counts.original.nodes,
      original_edges: outcome.counts.original.edges,
      filtered_nodes: outcome.counts.filtered.nodes,
      filtered_edges: outcome.counts.filtered.edges,
    },
    verification_results: verificationResults,
    overall_passed: outcome.report.overallPassed,
  };
}

export function formatReport(title: string, report: VerificationReport): string {
  const lines = [title];
  for (const [name, result] of Object.entries(report.categories)) {
    lines.push(`  ${name}: ${result.passed ? "PASSED" : "FAILED"}`);
    for (const issue of result.issues) {
      lines.push(`    - ${issue}`);
    }
  }
  lines.push(`  overall: ${report.overallPassed ? "PASSED" : "FAILED"}`);
  return lines.join("\n");
}
