/**
 * Synth Command
 *
 * Synthesises the five tier templates in-process and saves them as
 * `<stackName>.template.json` (or `.template.yaml`) in the output directory.
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';

import * as yaml from 'yaml';

import { DeploymentConfig } from '../../lib/config/deployment';

import logger from './logger';
import { creationOrder } from './stacks';
import { synthesizeTemplates } from './templates';

export const DEFAULT_SYNTH_OUTDIR = 'cdk.out';

export type TemplateFormat = 'json' | 'yaml';

export interface SynthOptions {
  outdir?: string;
  format?: TemplateFormat;
}

export function isTemplateFormat(value: string): value is TemplateFormat {
  return value === 'json' || value === 'yaml';
}

/**
 * Render a template document in the requested format
 */
export function renderTemplate(template: unknown, format: TemplateFormat): string {
  return format === 'yaml'
    ? yaml.stringify(template, { indent: 2 })
    : `${JSON.stringify(template, null, 2)}\n`;
}

export async function synthCommand(
  config: DeploymentConfig,
  options: SynthOptions = {}
): Promise<string[]> {
  const outputDir = options.outdir ?? DEFAULT_SYNTH_OUTDIR;
  const format = options.format ?? 'json';

  logger.header(`Synthesising ${config.stackPrefix} Stacks`);
  logger.keyValue('Environment', config.environment);
  logger.keyValue('Output Directory', outputDir);
  logger.blank();

  const plans = creationOrder(config);
  const templates = synthesizeTemplates(config, plans);
  await mkdir(outputDir, { recursive: true });

  const files: string[] = [];
  for (const template of templates.values()) {
    const file = join(outputDir, `${template.stackName}.template.${format}`);
    await writeFile(file, renderTemplate(template.template, format));
    logger.success(`${template.stackName} → ${file} (${template.sizeBytes} bytes)`);
    files.push(file);
  }

  return files;
}
