#!/usr/bin/env node
/**
 * Retrieval CLI - operate configurations, executions and the processed-file ledger
 */

import { readFileSync, existsSync } from 'fs';
import { config } from 'dotenv';
import { ConfigManager, createExampleConfig } from './config.js';
import { openDatabase } from './database.js';
import { isEntryPoint } from './entry-point.js';
import { AppError, logger } from './logger.js';
import { MigrationManager, retrievalMigrations } from './migrations.js';
import {
  createRetrievalEngine,
  describeNextRun,
  ExecutionStatus,
  parseConfigurationInput,
  RetrievalEngine,
} from './retrieval/index.js';

config();

export type Output = (line: string) => void;

const STATUSES: readonly ExecutionStatus[] = ['Pending', 'Running', 'Completed', 'Failed'];

export interface ParsedArgs {
  positionals: string[];
  flags: Map<string, string | true>;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Map<string, string | true>();
  const args = [...argv];

  while (args.length > 0) {
    const arg = args.shift() ?? '';
    if (arg.startsWith('--')) {
      const name = arg.slice(2);
      const next = args[0];
      if (next !== undefined && !next.startsWith('--')) {
        flags.set(name, next);
        args.shift();
      } else {
        flags.set(name, true);
      }
    } else {
      positionals.push(arg);
    }
  }

  return { positionals, flags };
}

function stringFlag(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags.get(name);
  return typeof value === 'string' ? value : undefined;
}

function numberFlag(args: ParsedArgs, name: string): number | undefined {
  const value = stringFlag(args, name);
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new AppError(`--${name} must be a positive integer`, 'INVALID_ARGUMENT', 400);
  }
  return parsed;
}

function dateFlag(args: ParsedArgs, name: string): Date | undefined {
  const value = stringFlag(args, name);
  if (value === undefined) return undefined;
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new AppError(`--${name} must be an ISO-8601 date`, 'INVALID_ARGUMENT', 400);
  }
  return parsed;
}

function statusFlag(args: ParsedArgs): ExecutionStatus | undefined {
  const value = stringFlag(args, 'status');
  if (value === undefined) return undefined;
  const status = STATUSES.find((candidate) => candidate.toLowerCase() === value.toLowerCase());
  if (!status) {
    throw new AppError(`--status must be one of ${STATUSES.join(', ')}`, 'INVALID_ARGUMENT', 400);
  }
  return status;
}

function requirePositionals(args: ParsedArgs, count: number, usage: string): string[] {
  const values = args.positionals.slice(1, 1 + count);
  if (values.length < count) {
    throw new AppError(`Usage: retrieval ${usage}`, 'INVALID_ARGUMENT', 400);
  }
  return values;
}

function readJsonArgument(source: string): unknown {
  const text = existsSync(source) ? readFileSync(source, 'utf-8') : source;
  try {
    return JSON.parse(text);
  } catch {
    throw new AppError('Configuration must be a JSON document or a path to one', 'INVALID_ARGUMENT', 400);
  }
}

function printJson(out: Output, value: unknown): void {
  out(JSON.stringify(value, null, 2));
}

export function usage(): string {
  return `
Usage:
  retrieval trigger <tenant> <configuration>
  retrieval executions <tenant> <configuration> [--status S] [--from ISO] [--to ISO] [--limit N] [--token T]
  retrieval execution <tenant> <configuration> <executionId>
  retrieval metrics <tenant> <configuration> [--from ISO] [--to ISO]
  retrieval processed <tenant> <configuration> [--filename NAME] [--execution ID] [--limit N] [--token T]
  retrieval test-connection <tenant> <configuration>
  retrieval configurations list [--tenant T] [--active] [--limit N] [--token T]
  retrieval configurations add <json|file>
  retrieval configurations deactivate <tenant> <configuration> [--by USER] [--version N]
  retrieval config init [path]
  retrieval migrate status
`;
}

/**
 * Run one engine-backed command and return the process exit code
 */
export async function runCommand(argv: string[], engine: RetrievalEngine, out: Output): Promise<number> {
  const args = parseArgs(argv);
  const [command, subcommand] = args.positionals;
  const { service, configurations } = engine;

  switch (command) {
    case 'trigger': {
      const [tenantId, configurationId] = requirePositionals(args, 2, 'trigger <tenant> <configuration>');
      const triggered = service.trigger(tenantId, configurationId);
      out(`Execution ${triggered.executionId} started (correlation ${triggered.correlationId})`);
      const outcome = await triggered.completion;
      if (!outcome) {
        out('Execution did not report an outcome');
        return 1;
      }
      printJson(out, outcome.record);
      return outcome.record.status === 'Completed' ? 0 : 1;
    }

    case 'executions': {
      const [tenantId, configurationId] = requirePositionals(args, 2, 'executions <tenant> <configuration>');
      printJson(
        out,
        service.listExecutions(tenantId, configurationId, {
          status: statusFlag(args),
          from: dateFlag(args, 'from'),
          to: dateFlag(args, 'to'),
          limit: numberFlag(args, 'limit'),
          continuationToken: stringFlag(args, 'token'),
        })
      );
      return 0;
    }

    case 'execution': {
      const [tenantId, configurationId, executionId] = requirePositionals(
        args,
        3,
        'execution <tenant> <configuration> <executionId>'
      );
      printJson(out, service.getExecution(tenantId, configurationId, executionId));
      return 0;
    }

    case 'metrics': {
      const [tenantId, configurationId] = requirePositionals(args, 2, 'metrics <tenant> <configuration>');
      printJson(out, service.getMetrics(tenantId, configurationId, dateFlag(args, 'from'), dateFlag(args, 'to')));
      return 0;
    }

    case 'processed': {
      const [tenantId, configurationId] = requirePositionals(args, 2, 'processed <tenant> <configuration>');
      printJson(
        out,
        service.listProcessedFiles(tenantId, configurationId, {
          filename: stringFlag(args, 'filename'),
          executionId: stringFlag(args, 'execution'),
          limit: numberFlag(args, 'limit'),
          continuationToken: stringFlag(args, 'token'),
        })
      );
      return 0;
    }

    case 'test-connection': {
      const [tenantId, configurationId] = requirePositionals(args, 2, 'test-connection <tenant> <configuration>');
      const check = await service.testConnection(tenantId, configurationId);
      printJson(out, check);
      return check.ok ? 0 : 1;
    }

    case 'configurations': {
      switch (subcommand) {
        case 'list': {
          const page = configurations.list({
            tenantId: stringFlag(args, 'tenant'),
            activeOnly: args.flags.has('active'),
            limit: numberFlag(args, 'limit'),
            continuationToken: stringFlag(args, 'token'),
          });
          for (const item of page.items) {
            const next = item.active ? describeNextRun(item.schedule) : 'inactive';
            out(`${item.tenantId}/${item.id}  ${item.name}  [${item.protocol}]  ${item.schedule.cronExpression} ${item.schedule.timezone}  ${next}`);
          }
          if (page.continuationToken) {
            out(`--token ${page.continuationToken}`);
          }
          return 0;
        }
        case 'add': {
          const [, source] = requirePositionals(args, 2, 'configurations add <json|file>');
          const created = configurations.create(parseConfigurationInput(readJsonArgument(source)));
          out(`Created ${created.tenantId}/${created.id} (next run ${created.nextScheduledRun ?? 'none'})`);
          return 0;
        }
        case 'deactivate': {
          const [, tenantId, configurationId] = requirePositionals(
            args,
            3,
            'configurations deactivate <tenant> <configuration>'
          );
          const updated = configurations.deactivate(
            tenantId,
            configurationId,
            stringFlag(args, 'by') ?? 'cli',
            numberFlag(args, 'version')
          );
          out(`Deactivated ${updated.tenantId}/${updated.id} (version ${updated.version})`);
          return 0;
        }
        default:
          out(usage());
          return 1;
      }
    }

    default:
      out(usage());
      return 1;
  }
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const [command, subcommand] = argv;
  const manager = new ConfigManager(process.env.RETRIEVAL_CONFIG ?? './config.yaml');

  if (command === 'config' && subcommand === 'init') {
    createExampleConfig(argv[2] ?? './config.yaml');
    return 0;
  }
  if (!command || command === '--help' || command === '-h') {
    console.log(usage());
    return command ? 0 : 1;
  }

  const settings = manager.getAll();
  const db = openDatabase(settings.database.path);
  try {
    if (command === 'migrate' && subcommand === 'status') {
      const status = new MigrationManager(db).getStatus(retrievalMigrations);
      console.log(`Schema version ${status.current} of ${status.latest}`);
      for (const migration of status.pending) {
        console.log(`  pending: ${migration.version} ${migration.name}`);
      }
      return 0;
    }

    const engine = createRetrievalEngine(db, settings);
    return await runCommand(argv, engine, (line) => console.log(line));
  } catch (error) {
    if (error instanceof AppError) {
      logger.error(error.message, error, 'CLI', { code: error.code });
      return 1;
    }
    throw error;
  } finally {
    db.close();
  }
}

if (isEntryPoint(import.meta.url)) {
  main()
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
      logger.error('Command failed', error instanceof Error ? error : undefined, 'CLI');
      process.exit(1);
    });
}
