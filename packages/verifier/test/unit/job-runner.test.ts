/**
 * Unit Tests for runJob
 *
 * Runs the linear-network job fixture end to end: YAML job, XML documents
 * from disk, compiled queries and evaluation.
 */

import * as path from 'path';
import { ConfigLoader } from '../../src/config/config-loader';
import { InvalidPatternError } from '../../src/query/pattern-errors';
import { runJob } from '../../src/jobs/job-runner';
import { createLinearNetwork } from '../../src/test-utils/network-fixtures';

const JOB_PATH = path.join(__dirname, '../fixtures/linear-job.yaml');

describe('runJob', () => {
  it('should report a verdict for every query in file order', async () => {
    // Arrange
    const job = ConfigLoader.loadConfig(JOB_PATH, {});

    // Act
    const reports = await runJob(job);

    // Assert
    expect(reports).toEqual([
      {
        name: 'reaches-s3',
        pattern: '*, S1, *, S3, *',
        verdict: { status: 'Satisfied', k: 0, scenariosEvaluated: 1n },
      },
      {
        name: 'survives-s2-s3-failure',
        pattern: '*, S1, *, S3, *',
        verdict: {
          status: 'Violated',
          k: 1,
          scenariosEvaluated: 2n,
          counterexample: {
            scenarioIndex: 1n,
            failedLinks: ['S2.e1--S3.e0'],
            trace: ['S1', 'S2'],
            outcome: 'Unreachable',
          },
        },
      },
    ]);
  });

  it('should reuse a model passed in', async () => {
    // Arrange
    const job = ConfigLoader.loadConfig(JOB_PATH, {});
    job.network = { topology: '/nonexistent/topo.xml', routing: '/nonexistent/routing.xml' };

    // Act
    const reports = await runJob(job, undefined, createLinearNetwork());

    // Assert
    expect(reports.map((report) => report.verdict.status)).toEqual(['Satisfied', 'Violated']);
  });

  it('should stop on an invalid pattern', async () => {
    // Arrange
    const job = ConfigLoader.loadConfig(JOB_PATH, {});
    job.queries[0].pattern = '[open, S1';

    // Act & Assert
    await expect(runJob(job)).rejects.toThrow(InvalidPatternError);
  });
});
