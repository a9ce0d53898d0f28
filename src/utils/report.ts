import * as fs from 'fs';
import * as path from 'path';
import type { TestReport } from '../types.js';

export function formatSummary(report: TestReport): string[] {
  const lines = [
    '\n================',
    'Summary',
    '================',
    `Total:  ${report.totalTests}`,
    `Passed: ${report.testsPassed}`,
    `Failed: ${report.failed}`,
    `Time:   ${report.durationMs}ms`,
  ];

  for (const result of report.results) {
    if (result.status === 'failure') {
      lines.push(`  ✗ ${result.testName}: ${result.error}`);
    }
  }

  lines.push(
    report.testsPassed === report.totalTests
      ? '🎉 All tests passed successfully!'
      : '❌ Some tests failed',
  );

  return lines;
}

export function writeReport(outputFile: string, report: TestReport): string {
  const outputPath = path.resolve(outputFile);
  fs.writeFileSync(outputPath, JSON.stringify(report, null, 2));
  return outputPath;
}
