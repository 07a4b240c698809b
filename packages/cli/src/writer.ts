import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

export type ReportKind = "metrics" | "team";
export type ReportFormat = "markdown" | "json";

export interface WriteReportOptions {
  cwd: string;
  kind: ReportKind;
  name: string;
  format: ReportFormat;
  content: string;
}

export const OUTPUT_DIR = "pulse";

function sanitizeForFileName(value: string): string {
  return value.replace(/[^a-zA-Z0-9_-]/g, "-");
}

export function reportExtension(format: ReportFormat): string {
  return format === "json" ? "json" : "md";
}

export async function writeReportFiles(
  options: WriteReportOptions
): Promise<{ reportFile: string; latestFile: string }> {
  const outputRoot = path.join(options.cwd, OUTPUT_DIR);
  const kindDir = path.join(outputRoot, options.kind);
  const extension = reportExtension(options.format);
  const reportFile = path.join(kindDir, `${sanitizeForFileName(options.name)}.${extension}`);
  const latestFile = path.join(outputRoot, `latest.${extension}`);

  await mkdir(kindDir, { recursive: true });
  await writeFile(reportFile, options.content, "utf-8");
  await writeFile(latestFile, options.content, "utf-8");

  return { reportFile, latestFile };
}
