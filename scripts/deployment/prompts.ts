/**
 * Interactive Prompts
 *
 * Inquirer-based confirmations for destructive commands.
 */

import inquirer from 'inquirer';

import { Environment, isProductionEnvironment } from '../../lib/config/environments';

import logger from './logger';

/**
 * Confirm an action
 */
export async function confirmAction(
  message: string,
  defaultValue = false
): Promise<boolean> {
  const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
    {
      type: 'confirm',
      name: 'confirmed',
      message,
      default: defaultValue,
    },
  ]);

  return confirmed;
}

/**
 * Confirm a destructive action (with extra warning)
 */
export async function confirmDestructiveAction(
  action: string,
  resourceName: string,
  environment: Environment
): Promise<boolean> {
  logger.blank();
  logger.yellow(`⚠️  You are about to ${action}:`);
  logger.keyValue('Resource', resourceName);
  logger.keyValue('Environment', environment);
  logger.blank();

  if (isProductionEnvironment(environment)) {
    logger.red('🚨 THIS IS A PRODUCTION ENVIRONMENT 🚨');
    logger.blank();

    // Require typing the environment name for production
    const { confirmation } = await inquirer.prompt<{ confirmation: string }>([
      {
        type: 'input',
        name: 'confirmation',
        message: 'Type "production" to confirm:',
      },
    ]);

    return confirmation === 'production';
  }

  return confirmAction(`Proceed with ${action}?`, false);
}
