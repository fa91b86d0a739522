import type { GenerationReport, GenerationResult, OutputFormat } from "./types.js";

function roundMs(value: number): number {
  return Math.round(value * 100) / 100;
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  return `${(bytes / 1024).toFixed(1)} KiB`;
}

export function summarizeGeneration(result: GenerationResult): GenerationReport {
  return {
    module: result.moduleName,
    type: result.moduleType,
    domain: result.domain,
    location: result.modulePath,
    fileCount: result.files.length,
    totalBytes: result.totalBytes,
    elapsedMs: roundMs(result.elapsedMs),
    dryRun: !result.written,
    generatedAt: result.generatedAt,
    files: result.files.map((file) => ({ path: file.path, bytes: file.byteSize }))
  };
}

function formatTextReport(report: GenerationReport): string {
  const pathWidth = Math.max(0, ...report.files.map((file) => file.path.length));
  const heading = report.dryRun
    ? `Dry run: would generate ${report.type} module "${report.module}" (domain: ${report.domain})`
    : `Generated ${report.type} module "${report.module}" (domain: ${report.domain})`;

  const lines = [
    heading,
    `Location: ${report.location}`,
    `Files:    ${report.fileCount} (${formatBytes(report.totalBytes)}) in ${report.elapsedMs.toFixed(1)} ms`,
    ...report.files.map((file) => `  ${file.path.padEnd(pathWidth)}  ${formatBytes(file.bytes)}`)
  ];
  return lines.join("\n");
}

export function formatReport(report: GenerationReport, format: OutputFormat): string {
  if (format === "json") {
    return JSON.stringify(report, null, 2);
  }
  return formatTextReport(report);
}
