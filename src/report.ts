/**
 * Rendering of check reports for the command line.
 */

import type { AssertionResult, CheckReport } from "./evaluate";
import { valueToString } from "./value";

function describe(result: AssertionResult): string {
  return result.message === undefined ? result.source : `${result.message} (${result.source})`;
}

/**
 * Render a report as output lines: one per failing assertion (or per
 * assertion when verbose), then a summary line.
 */
export function formatReport(report: CheckReport, fileName: string, verbose = false): string[] {
  const lines: string[] = [];
  for (const result of report.assertions) {
    if (!result.passed) {
      lines.push(`${fileName}:${result.line}: assertion failed: ${describe(result)}`);
    } else if (verbose) {
      lines.push(`${fileName}:${result.line}: ok: ${describe(result)}`);
    }
  }
  lines.push(`${report.passed} passed, ${report.failed} failed`);
  return lines;
}

export interface JsonReport {
  file: string;
  passed: number;
  failed: number;
  assertions: AssertionResult[];
  bindings: Record<string, string>;
}

/**
 * A JSON-safe view of a report. Bindings are printed with their type,
 * e.g. `<f32>-0`, since bigint and NaN have no JSON form.
 */
export function reportToJson(report: CheckReport, fileName: string): JsonReport {
  const bindings: Record<string, string> = {};
  for (const [name, value] of report.bindings) {
    bindings[name] = valueToString(value);
  }
  return {
    file: fileName,
    passed: report.passed,
    failed: report.failed,
    assertions: report.assertions,
    bindings,
  };
}
