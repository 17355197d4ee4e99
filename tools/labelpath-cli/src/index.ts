#!/usr/bin/env node

/**
 * labelpath CLI Tool
 * Command-line front end for verifying MPLS path queries under link failures
 */

import { Command } from 'commander';
import pino from 'pino';
import { ExitCode, Logger, exitCodeFor, parseLogLevel } from '@labelpath/verifier';
import { EncodeOptions, VerifyOptions, encodeCommand, runCommand, verifyCommand } from './commands';

const collect = (value: string, previous: string[] = []): string[] => [...previous, value];

/**
 * Pino logger with pino-pretty on stderr, leaving stdout for results
 */
function createCliLogger(level: string): Logger {
  return pino({
    level: parseLogLevel(level),
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
        destination: 2,
      },
    },
  });
}

/**
 * Run a command, print its output and set the exit code
 */
async function execute(logLevel: string, command: (logger: Logger) => Promise<string>): Promise<void> {
  let logger: Logger | undefined;
  try {
    logger = createCliLogger(logLevel);
    const output = await command(logger);
    process.stdout.write(`${output}\n`);
    process.exitCode = ExitCode.Success;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const code = exitCodeFor(error);
    if (logger) {
      logger.error({ error: message, exitCode: code }, 'labelpath failed');
    }
    process.stderr.write(`Error: ${message}\n`);
    process.exitCode = code;
  }
}

/**
 * Main CLI program
 */
const program = new Command();

program
  .name('labelpath')
  .description('Verify path queries over MPLS networks under up to k link failures')
  .version('0.1.0')
  .option('--log-level <level>', 'Log level (debug, info, warn, error)', 'warn');

const addIngressOptions = (command: Command): Command =>
  command
    .requiredOption('--ingress-router <router>', 'Router the packet enters at')
    .requiredOption('--ingress-interface <interface>', 'Interface of the ingress router the packet arrives on')
    .option('--labels <labels>', 'Initial label stack, outermost first, comma-separated (e.g. 10,20)')
    .option('--egress <router>', 'Router at which the packet counts as delivered (repeatable)', collect);

addIngressOptions(
  program
    .command('verify')
    .description('Decide whether a query holds under every failure of up to k links')
    .argument('<topology>', 'Topology XML document')
    .argument('<routing>', 'Routing XML document')
    .argument('<query>', 'Path pattern, or "pattern k" when k is omitted')
    .argument('[k]', 'Maximum number of simultaneously failed links')
)
  .option('--max-hops <n>', 'Per-packet hop cap')
  .option('--enumeration-limit <n>', 'Scenario count above which the overflow policy applies')
  .option('--overflow-policy <policy>', 'abort, proceed or sample')
  .option('--concurrency <n>', 'Cooperative evaluation workers')
  .option('--failable <link>', 'Link allowed to fail, as R.i--R.i (repeatable; default every link)', collect)
  .action(async (topology: string, routing: string, query: string, k: string | undefined, options: VerifyOptions) => {
    await execute(program.opts<{ logLevel: string }>().logLevel, (logger) =>
      verifyCommand(topology, routing, query, k, options, logger)
    );
  });

addIngressOptions(
  program
    .command('encode')
    .description('Encode a network and a query as a feature graph (JSON)')
    .argument('<topology>', 'Topology XML document')
    .argument('<routing>', 'Routing XML document')
    .argument('<query>', 'Path pattern, or "pattern k" when k is omitted')
    .argument('[k]', 'Maximum number of simultaneously failed links')
)
  .option('--label', 'Evaluate the query and store the verdict as ground truth')
  .option('--output <file>', 'Write the graph to a file instead of stdout')
  .option('--pretty', 'Indent the JSON output')
  .action(async (topology: string, routing: string, query: string, k: string | undefined, options: EncodeOptions) => {
    await execute(program.opts<{ logLevel: string }>().logLevel, (logger) =>
      encodeCommand(topology, routing, query, k, options, logger)
    );
  });

program
  .command('run')
  .description('Run every query of a YAML job file')
  .argument('<job>', 'Job file')
  .action(async (job: string) => {
    await execute(program.opts<{ logLevel: string }>().logLevel, (logger) => runCommand(job, logger));
  });

program.addHelpText(
  'after',
  `
Examples:
  # Does traffic entering S1 with label 10 still reach S3 when any one link fails?
  $ labelpath verify topo.xml routing.xml "*, S1, *, S3, *" 1 --ingress-router S1 --ingress-interface e1 --labels 10

  # Same query written as a query line
  $ labelpath verify topo.xml routing.xml "*, S1, *, S3, * 1" --ingress-router S1 --ingress-interface e1 --labels 10

  # Labelled training sample for the learner
  $ labelpath encode topo.xml routing.xml "S1, +, S3" 2 --ingress-router S1 --ingress-interface e1 --label --output sample.json

  # Batch job
  $ labelpath run jobs/backbone.yaml
`
);

program.parseAsync(process.argv).catch((error: unknown) => {
  process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = ExitCode.Failure;
});
