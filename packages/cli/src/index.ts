/**
 * changegate CLI
 *
 * Drives runs of the workflow engine against a local SQLite ledger. Every
 * command opens the ledger, performs one operation and closes it again, so
 * a run can be resumed from any later invocation.
 */

import {
  closeDatabase,
  createLogger,
  initDatabase,
  isWorkflowError,
  loadEngineConfig,
  type Database,
  type EngineConfig,
  type WorkflowError,
} from '@changegate/shared';
import { getFlag, splitCommand } from './flags';
import { startCommand } from './commands/start';
import { scanCommand } from './commands/scan';
import { reconcileCommand } from './commands/reconcile';
import { decideCommand, decideSeverityCommand } from './commands/decide';
import { approvePlanCommand, proposePlanCommand } from './commands/plan';
import { checklistCommand, deliverCommand, verifyCommand } from './commands/implementation';
import { abortCommand, transitionCommand } from './commands/transition';
import { historyCommand, pendingCommand, runsCommand, statusCommand } from './commands/status';
import packageJson from '../package.json';

const log = createLogger({ name: 'changegate:cli' });

const CLI_VERSION = packageJson.version;

export const HELP = `
changegate - human-gated change workflow engine

Usage:
  changegate start <subject> [--references <runId>]
                                   Start a run in doc_discovery
  changegate reconcile <runId> --claims <file.json> --inventory <file.json>
                                   Reconcile documentation claims and register drift
  changegate scan <runId> <file...> [--rules <file.json>] [--concurrency <n>]
                                   Classify files and register findings
  changegate decide <runId> <targetId> <decision> [--reason <text>] [--notes <text>]
                                   Decide a finding, resolve drift, or decide a plan
  changegate decide-severity <runId> [--preset <name>] [--critical|--high|--medium|--low <decision>]
                                   Decide every pending finding of a severity at once
  changegate propose-plan <runId> --plan <file.json>
                                   Propose a new plan version
  changegate approve-plan <runId> <version> [--notes <text>]
                                   Approve the current plan version
  changegate deliver <runId> <component>
                                   Mark a plan component delivered
  changegate verify <runId> <name:pass|fail>...
                                   Record a verification report
  changegate checklist <runId> <name:pass|fail>...
                                   Record the final checklist
  changegate transition <runId> <phase> [--reason <text>]
                                   Move a run to its next phase
  changegate abort <runId> --reason <text>
                                   Abort a run
  changegate status <runId>        Show a run's current state
  changegate history <runId>       Show a run's ledger entries
  changegate pending <runId>       Show the items awaiting a decision
  changegate runs [--status <status>] [--phase <phase>]
                                   List runs
  changegate --help                Show this help
  changegate --version             Show version

Options:
  --db <path>        SQLite ledger file (default: DATABASE_PATH or ./changegate.db)
  --format <type>    Output format: text, json (default: text)
  --actor <name>     Identity recorded on ledger entries (default: CHANGEGATE_ACTOR or system)
`;

export const EXIT_CODE = {
  SUCCESS: 0,
  BLOCKED: 1,
  RUNTIME_ERROR: 2,
} as const;

export class CLIError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = EXIT_CODE.RUNTIME_ERROR
  ) {
    super(message);
    this.name = 'CLIError';
  }
}

/**
 * Workflow rejections exit with BLOCKED; malformed input and ledger
 * corruption are runtime errors.
 */
export function exitCodeFor(err: WorkflowError): number {
  return err.code === 'invalid_input' || !err.recoverable ? EXIT_CODE.RUNTIME_ERROR : EXIT_CODE.BLOCKED;
}

export interface CLIOptions {
  format: 'text' | 'json';
  actor?: string;
  config: EngineConfig;
}

export interface CommandContext extends CLIOptions {
  db: Database;
}

type Command = (ctx: CommandContext, args: string[]) => Promise<number>;

const COMMANDS: Record<string, Command> = {
  start: startCommand,
  scan: scanCommand,
  reconcile: reconcileCommand,
  decide: decideCommand,
  'decide-severity': decideSeverityCommand,
  'propose-plan': proposePlanCommand,
  'approve-plan': approvePlanCommand,
  deliver: deliverCommand,
  verify: verifyCommand,
  checklist: checklistCommand,
  transition: transitionCommand,
  abort: abortCommand,
  status: statusCommand,
  history: historyCommand,
  pending: pendingCommand,
  runs: runsCommand,
};

export async function run(args: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    console.log(HELP);
    return EXIT_CODE.SUCCESS;
  }

  if (args.includes('--version') || args.includes('-v')) {
    console.log(`changegate v${CLI_VERSION}`);
    return EXIT_CODE.SUCCESS;
  }

  const rawFormat = getFlag(args, '--format') ?? 'text';
  if (rawFormat !== 'text' && rawFormat !== 'json') {
    throw new CLIError(`Invalid --format value: ${rawFormat}. Use text or json.`);
  }

  const { command: commandName, rest: restArgs } = splitCommand(args);
  if (commandName === undefined) {
    console.log(HELP);
    return EXIT_CODE.SUCCESS;
  }

  const command = COMMANDS[commandName];
  if (command === undefined) {
    throw new CLIError(`Unknown command: ${commandName}\n${HELP}`);
  }

  let config: EngineConfig;
  try {
    config = loadEngineConfig(env);
  } catch (err) {
    throw new CLIError(err instanceof Error ? err.message : String(err));
  }

  const actorFromEnv = env['CHANGEGATE_ACTOR'];
  const options: CLIOptions = {
    format: rawFormat,
    actor: getFlag(args, '--actor') ?? (actorFromEnv !== undefined && actorFromEnv !== '' ? actorFromEnv : undefined),
    config,
  };

  const dbPath = getFlag(args, '--db') ?? config.databasePath;
  const db = initDatabase({ path: dbPath });
  log.debug({ command: commandName, dbPath }, 'Running command');

  try {
    return await command({ ...options, db }, restArgs);
  } catch (err: unknown) {
    if (isWorkflowError(err)) {
      log.debug({ command: commandName, code: err.code, runId: err.runId }, 'Command rejected');
      throw new CLIError(err.message, exitCodeFor(err));
    }
    throw err;
  } finally {
    closeDatabase(db);
  }
}
