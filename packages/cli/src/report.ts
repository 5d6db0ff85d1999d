import {
  getExitCode,
  type EstimateResult,
  type RunReport,
} from '@hyperenum/core';

export function formatReport(report: RunReport): string {
  const lines: string[] = [];

  lines.push(`processed ${report.processed.length} game(s):`);
  for (const p of report.processed) {
    lines.push(
      `  ${p.entity}: ${p.written} written (${p.generated} generated, ${p.duplicates} duplicate(s), estimate ${p.estimate})`
    );
  }

  if (report.skipped.length > 0) {
    lines.push(`skipped ${report.skipped.length} game(s):`);
    for (const s of report.skipped) {
      const code = s.code ? ` ${s.code}` : '';
      lines.push(`  ${s.entity}: ${s.reason}${code} (${s.message})`);
    }
  }

  return `${lines.join('\n')}\n`;
}

/**
 * 0 when nothing failed; declined expansions carry no error code and do not
 * count as failures.
 */
export function reportExitCode(report: RunReport): number {
  const failed = report.skipped.find((s) => s.code !== undefined);
  return failed?.code ? getExitCode(failed.code) : 0;
}

export function formatEstimate(entity: string, estimate: EstimateResult): string {
  const lines = [`${entity}: ${estimate.total} configuration(s)`];
  for (const { option, factor } of estimate.factors) {
    lines.push(`  ${option}: x${factor}`);
  }
  return `${lines.join('\n')}\n`;
}
