import type { WorkflowReport } from "./coordinator";

export const REPORT_TITLE = "FINAL OUTPUT - SOCIAL POST CONTENT";
export const METADATA_HEADER = "WORKFLOW METADATA";
export const VALIDATION_HEADER = "VALIDATION SUMMARY";
export const LINKEDIN_HEADER = "LINKEDIN POSTS";
export const X_HEADER = "X (TWITTER) POSTS";
export const COMPLETED_BANNER = "WORKFLOW COMPLETED SUCCESSFULLY";

export const SECTION_HEADERS: readonly string[] = [
  REPORT_TITLE,
  METADATA_HEADER,
  VALIDATION_HEADER,
  LINKEDIN_HEADER,
  X_HEADER,
  COMPLETED_BANNER,
];

const HEAVY_RULE = "=".repeat(70);
const LIGHT_RULE = "-".repeat(70);

export function renderReport(report: WorkflowReport): string {
  return [
    "",
    HEAVY_RULE,
    REPORT_TITLE,
    HEAVY_RULE,
    "",
    METADATA_HEADER,
    LIGHT_RULE,
    `Status: ${report.status.toUpperCase()}`,
    `Context: ${report.contextExcerpt}`,
    `Agents Involved: ${report.agentsUsed.join(", ")}`,
    `Total LinkedIn Posts: ${report.linkedin.count}`,
    `Total X Posts: ${report.x.count}`,
    "",
    VALIDATION_HEADER,
    LIGHT_RULE,
    report.validationSummary,
    "",
    LINKEDIN_HEADER,
    LIGHT_RULE,
    `Platform: ${report.linkedin.platformName}`,
    `Count: ${report.linkedin.count}`,
    "",
    report.linkedin.body,
    "",
    X_HEADER,
    LIGHT_RULE,
    `Platform: ${report.x.platformName}`,
    `Count: ${report.x.count}`,
    "",
    report.x.body,
    "",
    HEAVY_RULE,
    COMPLETED_BANNER,
    HEAVY_RULE,
  ].join("\n");
}

function isPlatformHeader(line: string): boolean {
  const trimmed = line.trim();
  return trimmed === LINKEDIN_HEADER || trimmed === X_HEADER;
}

/**
 * Drops the validation block from rendered report text: every line from the
 * validation header up to the next platform header.
 */
export function stripValidationSection(text: string): string {
  const kept: string[] = [];
  let skipping = false;

  for (const line of text.split("\n")) {
    if (line.includes(VALIDATION_HEADER)) {
      skipping = true;
      continue;
    }

    if (skipping && isPlatformHeader(line)) {
      skipping = false;
    }

    if (!skipping) {
      kept.push(line);
    }
  }

  return kept.join("\n");
}

export function renderUiReport(report: WorkflowReport): string {
  return stripValidationSection(renderReport(report));
}
