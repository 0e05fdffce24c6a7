/**
 * @format
 * Confirmation Prompt Unit Tests
 */

import inquirer from 'inquirer';

import { Environment } from '../../../lib/config/environments';
import { confirmAction, confirmDestructiveAction } from '../../../scripts/deployment/prompts';

describe('Confirmation Prompts', () => {
    let prompt: jest.SpyInstance;

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        prompt = jest.spyOn(inquirer, 'prompt');
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('confirmDestructiveAction', () => {
        it('should confirm production when "production" is typed', async () => {
            prompt.mockResolvedValueOnce({ confirmation: 'production' });

            await expect(
                confirmDestructiveAction('delete 5 stacks', 'test-app-*', Environment.PRODUCTION),
            ).resolves.toBe(true);
            expect(prompt).toHaveBeenCalledWith([
                {
                    type: 'input',
                    name: 'confirmation',
                    message: 'Type "production" to confirm:',
                },
            ]);
        });

        it('should decline production on any other answer', async () => {
            prompt.mockResolvedValueOnce({ confirmation: 'yes' });

            await expect(
                confirmDestructiveAction('delete 5 stacks', 'test-app-*', Environment.PRODUCTION),
            ).resolves.toBe(false);
        });

        it('should ask a yes/no question outside production', async () => {
            prompt.mockResolvedValueOnce({ confirmed: true });

            await expect(
                confirmDestructiveAction('delete 5 stacks', 'test-app-*', Environment.DEVELOPMENT),
            ).resolves.toBe(true);
            expect(prompt).toHaveBeenCalledWith([
                {
                    type: 'confirm',
                    name: 'confirmed',
                    message: 'Proceed with delete 5 stacks?',
                    default: false,
                },
            ]);
        });
    });

    describe('confirmAction', () => {
        it('should return the answer given', async () => {
            prompt.mockResolvedValueOnce({ confirmed: false });

            await expect(confirmAction('Continue?', true)).resolves.toBe(false);
            expect(prompt).toHaveBeenCalledWith([
                { type: 'confirm', name: 'confirmed', message: 'Continue?', default: true },
            ]);
        });
    });
});
