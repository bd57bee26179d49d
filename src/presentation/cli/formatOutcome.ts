import { DownloadOutcome } from '../../domain/entities/DownloadOutcome';
import { formatSize } from '../../shared/utils/format';

/**
 * Multi-line summary printed after a run
 */
export function formatOutcome(outcome: DownloadOutcome): string {
    const lines: string[] = [];
    const attempts = `${outcome.attemptsUsed} of ${outcome.attemptsAllowed}`;

    if (outcome.success) {
        lines.push(`✅ Downloaded ${outcome.localPath}`);
        lines.push(`   Size:     ${formatSize(outcome.fileSizeBytes)}`);
        lines.push(`   Attempts: ${attempts}`);
        lines.push(
            `   Time:     ${outcome.downloadTimeSeconds.toFixed(2)}s ` +
            `(${formatSize(Math.round(outcome.averageSpeedBytesPerSecond))}/s)`
        );
        lines.push(`   Resumed:  ${outcome.resumed ? 'yes' : 'no'}`);
        if (outcome.pdfVersion !== undefined) {
            lines.push(`   Version:  PDF ${outcome.pdfVersion}`);
        }
    } else {
        lines.push(`❌ ${outcome.errorMessage}`);
        lines.push(`   Attempts: ${attempts}`);
        lines.push(`   Time:     ${outcome.totalTimeSeconds.toFixed(2)}s`);
    }

    for (const warning of outcome.warnings) {
        lines.push(`   ⚠️  ${warning}`);
    }

    return lines.join('\n');
}
