/**
 * @format
 * Cross-Stack Linkage Tests
 *
 * Every import resolves to an output its producer exports, through a
 * parameter the consumer declares.
 */

import {
    STACK_NAME_PARAMETER_TIER,
    StackParameter,
    TIER_OUTPUTS,
    TIER_PARAMETERS,
} from '../../../lib/stacks/contract';
import { Tier, TIERS } from '../../../lib/utilities/naming';
import { collectImports, createThreeTierApp, StackAssertions } from '../../fixtures';

function producerOf(parameter: string): Tier {
    const entry = Object.entries(STACK_NAME_PARAMETER_TIER).find(([key]) => key === parameter);
    if (entry === undefined) {
        throw new Error(`${parameter} is not a stack-name parameter`);
    }
    return entry[1];
}

describe('Cross-stack linkage', () => {
    const { templates } = createThreeTierApp();

    describe.each(TIERS)('%s stack', (tier) => {
        const template = templates[tier];
        const imports = collectImports(template);

        it('should declare exactly its contract parameters', () => {
            const declared = Object.keys(template.toJSON().Parameters ?? {})
                .filter(key => !key.startsWith('SsmParameterValue'));
            expect(declared.sort()).toEqual([...TIER_PARAMETERS[tier]].sort());
        });

        it('should import only through declared stack-name parameters', () => {
            for (const { parameter } of imports) {
                expect(TIER_PARAMETERS[tier]).toContain(parameter);
                expect(parameter).not.toBe(StackParameter.KEY_PAIR_NAME);
            }
        });

        it('should import only outputs the producer exports', () => {
            for (const { parameter, outputKey } of imports) {
                const producer = producerOf(parameter);
                expect(TIER_OUTPUTS[producer]).toContain(outputKey);
                StackAssertions.hasExportedOutput(templates[producer], outputKey);
            }
        });

        it('should export every contract output', () => {
            TIER_OUTPUTS[tier].forEach(key => StackAssertions.hasExportedOutput(template, key));
        });
    });

    it('should give the network stack no imports', () => {
        expect(collectImports(templates.network)).toEqual([]);
    });

    it('should import the database secret only into the app tier', () => {
        const consumers = TIERS.filter(tier =>
            collectImports(templates[tier]).some(ref => ref.outputKey === 'DBSecretArn'));
        expect(consumers).toEqual(['app']);
    });
});
