import { BatchResult } from '../types';

export function formatBatchReport(totalFiles: number, result: BatchResult): string {
  const lines = [
    result.errors.length === 0 ? '✅ Conversion complete!' : '⚠️ Conversion finished with errors',
    '',
    `Total files: ${totalFiles}`,
    `Successful: ${result.successes.size}`,
    `Errors: ${result.errors.length}`
  ];

  if (result.errors.length > 0) {
    lines.push('', ...result.errors.map(error => `❌ ${error}`));
  }

  return lines.join('\n');
}
