#!/usr/bin/env node
/**
 * governance CLI
 *
 * Usage: governance <command> [options]
 *
 * Command output (JSON, diffs, documents) goes to stdout; diagnostics go to
 * stderr. classify exits with the tier rank so hooks can branch on it.
 */

import 'dotenv/config';
import * as fs from 'fs';
import * as path from 'path';
import { parseArgs } from 'node:util';
import { ProposalNotFoundError, errorMessage, isErrnoError, isProposalState, tierByRank } from './types';
import { makeDiff } from './diff/diff-generator';
import { renderProposalDocument } from './proposals/proposal-document';
import { ProposeResult } from './governance/proposal-service';
import { Pipeline, createPipeline } from './bootstrap';
import { loadGovernanceConfig, resolveRepositoryRoot } from './config/load-config';
import { loadSecrets } from './config/load-secrets';
import { initMetrics, initTelemetry, shutdownTelemetry } from './observability';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 64;

export const USAGE = `Usage: governance <command> [options]

Commands:
  classify <path>                                   Print the tier of a path (exit code = tier rank)
  make-diff --file <path> (--new-file <p> | --stdin)
                                                    Print a unified diff against the current file
  propose --file <path> (--new-file <p> | --stdin) --summary <s> [--proposer <p>] [--type <t>]
                                                    Record a proposal for the change
  import <document.md>                              Record a proposal from a proposal document
  list [--state <state>]                            List proposals, oldest first
  show <id>                                         Print a proposal, its state and audit trail
  approve <id> [--reviewer <name>]                  Promote a proposal, or record a review answer
  reject <id> [--reason <text>]                     Reject a pending proposal
  apply-commits [id] [--dry-run]                    Apply one or every committed proposal
`;

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  readStdin(): Promise<string>;
}

export interface CliContext {
  io: CliIO;
  /** Directory relative paths are resolved against */
  cwd: string;
  /** Recorded as the actor of approvals and rejections */
  actor: string;
  openPipeline(): Promise<Pipeline>;
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

type ParsedArgs = ReturnType<typeof parseCommandArgs>;

const COMMAND_OPTIONS = {
  file: { type: 'string' },
  'new-file': { type: 'string' },
  stdin: { type: 'boolean' },
  summary: { type: 'string' },
  proposer: { type: 'string' },
  type: { type: 'string' },
  state: { type: 'string' },
  reviewer: { type: 'string' },
  reason: { type: 'string' },
  'dry-run': { type: 'boolean' },
} as const;

function parseCommandArgs(args: string[]) {
  try {
    return parseArgs({ args, options: COMMAND_OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

type Command = (args: ParsedArgs, context: CliContext, pipeline: () => Promise<Pipeline>) => Promise<number>;

const COMMANDS: Record<string, Command> = {
  classify: async ({ positionals }, { io }, pipeline) => {
    const filePath = single(positionals, 'classify <path>');
    const classification = (await pipeline()).service.classify(filePath);
    io.stdout(`${JSON.stringify(classification, null, 2)}\n`);
    return classification.tier;
  },

  'make-diff': async ({ values }, context) => {
    const file = required(values.file, '--file');
    const newContent = await readNewContent(values, context);
    const diff = makeDiff(readCurrent(path.resolve(context.cwd, file)), newContent, file);

    if (!diff) {
      context.io.stderr('# No changes detected\n');
      return EXIT_OK;
    }
    context.io.stdout(diff);
    return EXIT_OK;
  },

  propose: async ({ values }, context, pipeline) => {
    const file = required(values.file, '--file');
    const summary = required(values.summary, '--summary');
    const newContent = await readNewContent(values, context);

    const result = await (await pipeline()).service.propose({
      proposer: values.proposer,
      summary,
      changeType: values.type,
      changes: [{ path: path.resolve(context.cwd, file), newContent }],
    });

    if (result.status === 'no_change') {
      context.io.stderr('# No changes detected\n');
    }
    context.io.stdout(`${JSON.stringify(describeResult(result), null, 2)}\n`);
    return EXIT_OK;
  },

  import: async ({ positionals }, context, pipeline) => {
    const file = single(positionals, 'import <document.md>');
    const text = fs.readFileSync(path.resolve(context.cwd, file), 'utf8');
    const result = await (await pipeline()).service.importDocument(text);
    context.io.stdout(`${JSON.stringify(describeResult(result), null, 2)}\n`);
    return EXIT_OK;
  },

  list: async ({ values }, { io }, pipeline) => {
    const { state } = values;
    if (state !== undefined && !isProposalState(state)) {
      throw new UsageError(`Unknown state "${state}"`);
    }

    const proposals = await (await pipeline()).store.list(state);
    if (proposals.length === 0) {
      io.stderr('No proposals\n');
    }
    for (const proposal of proposals) {
      const { label } = tierByRank(proposal.metadata.tier);
      io.stdout(`${proposal.id}\t${proposal.state}\t${label}\t${proposal.metadata.summary}\n`);
    }
    return EXIT_OK;
  },

  show: async ({ positionals }, { io }, pipeline) => {
    const id = single(positionals, 'show <id>');
    const proposal = await (await pipeline()).store.get(id);
    if (!proposal) {
      throw new ProposalNotFoundError(id);
    }

    const lines = [`State: ${proposal.state}`];
    if (proposal.reviewId) {
      lines.push(`Review: ${proposal.reviewId}`);
    }
    lines.push('Audit:');
    for (const entry of proposal.auditTrail) {
      const move = entry.fromState && entry.toState ? ` ${entry.fromState} → ${entry.toState}` : '';
      const detail = entry.detail ? `: ${entry.detail}` : '';
      lines.push(`  ${entry.timestamp} ${entry.event}${move} by ${entry.actor} (${entry.outcome})${detail}`);
    }

    io.stdout(`${lines.join('\n')}\n\n${renderProposalDocument(proposal)}`);
    return EXIT_OK;
  },

  approve: async ({ positionals, values }, { io, actor }, pipeline) => {
    const id = single(positionals, 'approve <id>');
    const { gate } = await pipeline();

    if (!values.reviewer) {
      const outcome = await gate.approve(id, actor);
      if (!outcome.promoted) {
        io.stderr(`Not approved: ${outcome.reason}\n`);
        return EXIT_FAILURE;
      }
      io.stdout(`Approved ${id}: pending → committed\n`);
      return EXIT_OK;
    }

    // Opens the review on the first answer; later answers reuse the stored one
    await gate.requestReview(id, actor);
    const { review, state } = await gate.recordReview(id, values.reviewer, 'approve');
    const approvals = Object.values(review.decisions).filter((d) => d === 'approve').length;
    io.stdout(
      `Review ${review.reviewId}: ${approvals} of ${review.requiredApprovals} required approval(s); ${id} is ${state}\n`
    );
    return state === 'committed' ? EXIT_OK : EXIT_FAILURE;
  },

  reject: async ({ positionals, values }, { io, actor }, pipeline) => {
    const id = single(positionals, 'reject <id>');
    const proposal = await (await pipeline()).gate.reject(id, actor, values.reason || 'Rejected from the command line');
    io.stdout(`Rejected ${proposal.id}\n`);
    return EXIT_OK;
  },

  'apply-commits': async ({ positionals, values }, { io }, pipeline) => {
    if (positionals.length > 1) {
      throw new UsageError('apply-commits takes at most one proposal id');
    }
    const dryRun = values['dry-run'] ?? false;
    const { applier } = await pipeline();

    if (positionals.length === 1) {
      const result = await applier.apply(positionals[0], { dryRun });
      io.stdout(`${JSON.stringify(result, null, 2)}\n`);
      return result.ok ? EXIT_OK : EXIT_FAILURE;
    }

    const batch = await applier.applyAll({ dryRun });
    io.stdout(`${JSON.stringify(batch, null, 2)}\n`);
    return batch.failed === 0 ? EXIT_OK : EXIT_FAILURE;
  },
};

/**
 * Run one CLI invocation and return its exit code
 */
export async function runCli(argv: string[], context: CliContext): Promise<number> {
  const [name, ...rest] = argv;

  if (!name) {
    context.io.stderr(USAGE);
    return EXIT_USAGE;
  }
  if (name === 'help' || name === '--help') {
    context.io.stdout(USAGE);
    return EXIT_OK;
  }

  const command = Object.hasOwn(COMMANDS, name) ? COMMANDS[name] : undefined;
  if (!command) {
    context.io.stderr(`Unknown command: ${name}\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  const opened: { pipeline?: Pipeline } = {};
  const pipeline = async () => {
    opened.pipeline = opened.pipeline ?? (await context.openPipeline());
    return opened.pipeline;
  };

  try {
    return await command(parseCommandArgs(rest), context, pipeline);
  } catch (error) {
    return reportError(error, context.io);
  } finally {
    if (opened.pipeline) {
      await opened.pipeline.close();
    }
  }
}

function reportError(error: unknown, io: CliIO): number {
  if (error instanceof UsageError) {
    io.stderr(`${error.message}\n\n${USAGE}`);
    return EXIT_USAGE;
  }
  // Not found, illegal transitions and bad input all exit 1 without mutating anything
  io.stderr(`Error: ${errorMessage(error)}\n`);
  return EXIT_FAILURE;
}

function single(positionals: string[], usage: string): string {
  if (positionals.length !== 1) {
    throw new UsageError(`Usage: governance ${usage}`);
  }
  return positionals[0];
}

function required(value: string | undefined, flag: string): string {
  if (!value) {
    throw new UsageError(`Missing required option ${flag}`);
  }
  return value;
}

async function readNewContent(values: ParsedArgs['values'], context: CliContext): Promise<string> {
  const newFile = values['new-file'];
  if (Boolean(newFile) === Boolean(values.stdin)) {
    throw new UsageError('Give exactly one of --new-file or --stdin');
  }
  if (newFile) {
    return fs.readFileSync(path.resolve(context.cwd, newFile), 'utf8');
  }
  return context.io.readStdin();
}

function readCurrent(file: string): string | null {
  try {
    return fs.readFileSync(file, 'utf8');
  } catch (error) {
    if (isErrnoError(error, 'ENOENT')) return null;
    throw error;
  }
}

function describeResult(result: ProposeResult) {
  if (result.status !== 'created') {
    return {
      status: result.status,
      tier: result.classification.tier,
      label: result.classification.label,
    };
  }
  return {
    status: result.status,
    id: result.proposal.id,
    tier: result.classification.tier,
    label: result.classification.label,
    state: result.proposal.state,
    autoApproved: result.autoApproved,
  };
}

async function readProcessStdin(): Promise<string> {
  let text = '';
  process.stdin.setEncoding('utf8');
  for await (const chunk of process.stdin) {
    text += chunk;
  }
  return text;
}

async function main(argv: string[]): Promise<number> {
  // stdout carries command output only
  console.log = console.error.bind(console);

  return runCli(argv, {
    io: {
      stdout: (text) => process.stdout.write(text),
      stderr: (text) => process.stderr.write(text),
      readStdin: readProcessStdin,
    },
    cwd: process.cwd(),
    actor: process.env.GOVERNANCE_ACTOR || process.env.USER || 'cli',
    openPipeline: async () => {
      await loadSecrets();
      initTelemetry();
      initMetrics();
      const config = loadGovernanceConfig(resolveRepositoryRoot());
      const pipeline = await createPipeline(config, { databaseUrl: process.env.DATABASE_URL });
      return {
        ...pipeline,
        close: async () => {
          await pipeline.close();
          await shutdownTelemetry();
        },
      };
    },
  });
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error) => {
      console.error('Fatal error:', error);
      process.exitCode = EXIT_FAILURE;
    }
  );
}
