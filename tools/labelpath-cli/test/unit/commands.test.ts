/**
 * Unit tests for commands.ts
 *
 * Commands run against the XML and YAML fixtures of the verifier package.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { EncodedGraph } from '@labelpath/shared';
import { EnumerationOverflowError, InvalidPatternError, createSilentLogger } from '@labelpath/verifier';
import { encodeCommand, runCommand, verifyCommand } from '../../src/commands';

const FIXTURES_DIR = path.join(__dirname, '../../../../packages/verifier/test/fixtures');
const TOPOLOGY = path.join(FIXTURES_DIR, 'linear-topo.xml');
const ROUTING = path.join(FIXTURES_DIR, 'linear-routing.xml');

const ingress = { ingressRouter: 'S1', ingressInterface: 'e1', labels: '10' };

const isEncodedGraph = (value: unknown): value is EncodedGraph =>
  typeof value === 'object' && value !== null && 'nodes' in value && 'edges' in value;

describe('commands', () => {
  const logger = createSilentLogger();

  describe('verifyCommand', () => {
    it('should report the S2-S3 failure as the counterexample', async () => {
      const output = await verifyCommand(
        TOPOLOGY,
        ROUTING,
        '*, S1, *, S3, *',
        '1',
        { ...ingress, failable: ['S2.e1--S3.e0'], concurrency: '2' },
        logger
      );

      expect(output).toBe(
        [
          '*, S1, *, S3, *: Violated (k=1, 2 scenarios)',
          '  failed links: S2.e1--S3.e0',
          '  trace: S1 -> S2',
          '  outcome: Unreachable',
        ].join('\n')
      );
    });

    it('should accept a query line', async () => {
      const output = await verifyCommand(TOPOLOGY, ROUTING, '*, S1, *, S3, * 0', undefined, ingress, logger);

      expect(output).toBe('*, S1, *, S3, *: Satisfied (k=0, 1 scenarios)');
    });

    it('should check the final label stack of a constrained query line', async () => {
      const satisfied = await verifyCommand(TOPOLOGY, ROUTING, '<10> *, S1, *, S3, * <12> 0', undefined, ingress, logger);
      const violated = await verifyCommand(TOPOLOGY, ROUTING, '<10> *, S1, *, S3, * <11> 0', undefined, ingress, logger);

      expect(satisfied).toBe('<10> *, S1, *, S3, * <12>: Satisfied (k=0, 1 scenarios)');
      expect(violated.split('\n')[0]).toBe('<10> *, S1, *, S3, * <11>: Violated (k=0, 1 scenarios)');
    });

    it('should apply the overflow options', async () => {
      await expect(
        verifyCommand(TOPOLOGY, ROUTING, '*', '2', { ...ingress, enumerationLimit: '3' }, logger)
      ).rejects.toThrow(EnumerationOverflowError);

      const output = await verifyCommand(
        TOPOLOGY,
        ROUTING,
        '*',
        '2',
        { ...ingress, enumerationLimit: '3', overflowPolicy: 'sample' },
        logger
      );
      expect(output).toBe('*: Inconclusive (k=2, 3 of 4 scenarios)');
    });

    it('should fail on an invalid pattern before reading the network', async () => {
      await expect(
        verifyCommand('/nonexistent/topo.xml', ROUTING, 'S1, ]', '0', ingress, logger)
      ).rejects.toThrow(InvalidPatternError);
    });
  });

  describe('encodeCommand', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'labelpath-encode-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should print the graph as JSON', async () => {
      const output = await encodeCommand(TOPOLOGY, ROUTING, '*, S1, *, S3, *', '1', ingress, logger);

      const graph: unknown = JSON.parse(output);
      expect(isEncodedGraph(graph)).toBe(true);
      if (isEncodedGraph(graph)) {
        expect(graph.nodes).toHaveLength(22);
        expect(graph.edges).toHaveLength(27);
        expect(graph.y).toBeUndefined();
      }
    });

    it('should write a labelled graph to a file', async () => {
      const outputPath = path.join(tempDir, 'sample.json');

      const output = await encodeCommand(
        TOPOLOGY,
        ROUTING,
        '*, S1, *, S3, *',
        '0',
        { ...ingress, label: true, output: outputPath },
        logger
      );

      expect(output).toBe(`Wrote 22 nodes and 27 edges to ${outputPath}`);
      const graph: unknown = JSON.parse(fs.readFileSync(outputPath, 'utf8'));
      expect(isEncodedGraph(graph) && graph.y).toBe(1);
    });
  });

  describe('runCommand', () => {
    it('should print one verdict per job query', async () => {
      const output = await runCommand(path.join(FIXTURES_DIR, 'linear-job.yaml'), createSilentLogger(), {});

      expect(output).toBe(
        [
          'reaches-s3: Satisfied (k=0, 1 scenarios)',
          'survives-s2-s3-failure: Violated (k=1, 2 scenarios)',
          '  failed links: S2.e1--S3.e0',
          '  trace: S1 -> S2',
          '  outcome: Unreachable',
        ].join('\n')
      );
    });
  });
});
