/**
 * @format
 * GitHub Actions Integration Unit Tests
 */

import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import {
    buildProvenanceTags,
    markdownTable,
    setOutput,
    writeSummary,
} from '../../../scripts/deployment/github';

describe('GitHub Actions integration', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'github-test-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
        jest.restoreAllMocks();
    });

    it('should append step outputs', () => {
        const env = { GITHUB_OUTPUT: join(dir, 'output') };
        setOutput('status', 'success', env);
        setOutput('application_url', 'http://example.com', env);

        expect(readFileSync(env.GITHUB_OUTPUT, 'utf8')).toBe(
            'status=success\napplication_url=http://example.com\n',
        );
    });

    it('should ignore step outputs outside GitHub Actions', () => {
        expect(() => setOutput('status', 'success', {})).not.toThrow();
    });

    it('should append the job summary', () => {
        const env = { GITHUB_STEP_SUMMARY: join(dir, 'summary') };
        writeSummary('## Deploy\n', env);
        expect(readFileSync(env.GITHUB_STEP_SUMMARY, 'utf8')).toBe('## Deploy\n');
    });

    it('should print the summary locally', () => {
        const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        writeSummary('## Deploy\n', {});
        expect(log).toHaveBeenCalledWith('## Deploy\n');
    });

    it('should render a markdown table', () => {
        expect(markdownTable(['Stack', 'Result'], [['test-app-network', 'created']])).toBe(
            '| Stack | Result |\n| --- | --- |\n| test-app-network | created |\n',
        );
    });

    it('should build provenance tags from the workflow environment', () => {
        const tags = buildProvenanceTags({
            GITHUB_SHA: 'abc123',
            GITHUB_RUN_ID: '42',
            GITHUB_ACTOR: 'octocat',
            GITHUB_REPOSITORY: 'example/three-tier',
            GITHUB_WORKFLOW: 'Deploy',
        });

        expect(tags).toEqual({
            DeployCommit: 'abc123',
            DeployRunId: '42',
            DeployActor: 'octocat',
            DeployRepo: 'example/three-tier',
            DeployTimestamp: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/),
            DeployWorkflow: 'Deploy',
        });
    });

    it('should fall back to local provenance', () => {
        expect(buildProvenanceTags({})).toMatchObject({
            DeployCommit: 'local',
            DeployRunId: '0',
            DeployWorkflow: 'manual',
        });
    });
});
