import fs from 'fs';
import path from 'path';
import type { RunReport } from '../types';

export function saveRunReport(outputDir: string, fileName: string, report: RunReport): string {
  if (!fs.existsSync(outputDir)) {
    fs.mkdirSync(outputDir, { recursive: true });
  }
  const reportPath = path.join(outputDir, fileName);
  fs.writeFileSync(reportPath, JSON.stringify(report, null, 2));
  return reportPath;
}
