import type { ChangeReport, ChangeWarning, ProgramMetadata } from '../../../shared/src';

/** Tool-count deltas at or above this are flagged as high severity. */
export const SIGNIFICANT_TOOL_DELTA = 2;

/**
 * Compares a newly posted program against the version posted right before
 * it. Project, part, posted time and program number are not compared.
 */
export function compareMetadata(previous: ProgramMetadata, next: ProgramMetadata): ChangeReport {
  const report: ChangeReport = { hasChanges: false, changes: {}, warnings: [] };
  const warn = (warning: ChangeWarning) => report.warnings.push(warning);

  if (previous.toolCount !== next.toolCount) {
    report.changes.toolCount = { old: previous.toolCount, new: next.toolCount };
    if (Math.abs(next.toolCount - previous.toolCount) >= SIGNIFICANT_TOOL_DELTA) {
      warn({
        field: 'toolCount',
        severity: 'high',
        message: `Tool count changed significantly: ${previous.toolCount} → ${next.toolCount}`
      });
    }
  }

  if (previous.operations !== next.operations) {
    report.changes.operations = { old: previous.operations, new: next.operations };
    warn({
      field: 'operations',
      severity: 'info',
      message: `Operation count changed: ${previous.operations} → ${next.operations}`
    });
  }

  if (previous.machine !== next.machine) {
    report.changes.machine = { old: previous.machine, new: next.machine };
    warn({
      field: 'machine',
      severity: 'high',
      message: `MACHINE CHANGED: ${previous.machine} → ${next.machine} - Verify correct machine!`
    });
  }

  // routine between setups; recorded without a warning
  if (previous.setup !== next.setup) {
    report.changes.setup = { old: previous.setup, new: next.setup };
  }

  report.hasChanges = Object.keys(report.changes).length > 0;
  return report;
}

export function warningLines(report: ChangeReport): string[] {
  return report.warnings.map((warning) => (warning.severity === 'high' ? `WARNING: ${warning.message}` : warning.message));
}
