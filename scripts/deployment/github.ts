/**
 * GitHub Actions Integration
 *
 * Step outputs and job summaries. Both are no-ops outside GitHub Actions
 * (summaries are printed to stdout instead).
 */

import { appendFileSync } from 'fs';

// ---------------------------------------------------------------------------
// Step outputs
// ---------------------------------------------------------------------------
export function setOutput(key: string, value: string, env: NodeJS.ProcessEnv = process.env): void {
  const outputFile = env.GITHUB_OUTPUT;
  if (outputFile) {
    appendFileSync(outputFile, `${key}=${value}\n`);
  }
}

// ---------------------------------------------------------------------------
// Job summary
// ---------------------------------------------------------------------------
export function writeSummary(content: string, env: NodeJS.ProcessEnv = process.env): void {
  const summaryFile = env.GITHUB_STEP_SUMMARY;
  if (summaryFile) {
    appendFileSync(summaryFile, content);
  } else {
    // Local mode — print to stdout
    console.log(content);
  }
}

/**
 * Markdown table for a job summary
 */
export function markdownTable(headers: string[], rows: string[][]): string {
  const line = (cells: string[]): string => `| ${cells.join(' | ')} |`;
  return [
    line(headers),
    line(headers.map(() => '---')),
    ...rows.map(line),
  ].join('\n') + '\n';
}

// ---------------------------------------------------------------------------
// Build provenance tags (SLSA-inspired audit metadata)
// ---------------------------------------------------------------------------
export function buildProvenanceTags(env: NodeJS.ProcessEnv = process.env): Record<string, string> {
  return {
    DeployCommit: env.GITHUB_SHA ?? 'local',
    DeployRunId: env.GITHUB_RUN_ID ?? '0',
    DeployActor: env.GITHUB_ACTOR ?? 'local',
    DeployRepo: env.GITHUB_REPOSITORY ?? 'local',
    DeployTimestamp: new Date().toISOString().replace(/\.\d{3}Z$/, 'Z'),
    DeployWorkflow: env.GITHUB_WORKFLOW ?? 'manual',
  };
}
