#!/usr/bin/env node
/**
 * Command-line entry point for the funding discovery core.
 *
 * Initializes the subsystems in order:
 * 1. Environment validation
 * 2. Database (run migrations)
 * 3. Registry, scorer and pipeline
 * then dispatches one command and exits.
 *
 *   funding-discovery process <results.json> [--session <id>]
 *   funding-discovery blacklist <domain> --reason <text> --actor <id>
 *   funding-discovery no-funds <domain> [--year <yyyy>] --reason <text>
 *   funding-discovery retry-due
 *   funding-discovery stats
 */

// Loads .env before the logger reads LOG_LEVEL
import 'dotenv/config';
import { parseArgs } from 'node:util';
import { ulid } from 'ulid';
import { createDiscoveryCore, type DiscoveryCore } from './core.js';
import { closeDb, getConnection } from './db/index.js';
import { migrate } from './db/migrate.js';
import { readSearchResultsFile } from './discovery/index.js';
import { coreSettingsFromEnv, loadEnv } from './env.js';
import {
  AppError,
  ConfigurationError,
  ValidationError,
  isOperationalError,
} from './shared/errors.js';
import { getLogger } from './shared/logger.js';

const logger = getLogger('cli');

const USAGE = `Usage:
  funding-discovery process <results.json> [--session <id>]
  funding-discovery blacklist <domain> --reason <text> --actor <id>
  funding-discovery no-funds <domain> [--year <yyyy>] --reason <text>
  funding-discovery retry-due
  funding-discovery stats`;

const EXIT_OK = 0;
const EXIT_FAILURE = 1;
const EXIT_USAGE = 2;

class UsageError extends ValidationError {
  constructor(message: string) {
    super(message, 'argv');
  }
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

type Command = (core: DiscoveryCore, positionals: string[], flags: Flags) => Promise<unknown>;

interface Flags {
  session?: string;
  reason?: string;
  actor?: string;
  year?: string;
}

const commands: Record<string, Command> = {
  async process(core, [file], flags) {
    if (file === undefined) {
      throw new UsageError('process needs a results file');
    }
    const batch = await readSearchResultsFile(file);
    const sessionId = flags.session ?? batch.sessionId ?? ulid();
    return core.processor.process(batch.results, sessionId);
  },

  async blacklist(core, [domain], flags) {
    if (domain === undefined || flags.reason === undefined || flags.actor === undefined) {
      throw new UsageError('blacklist needs <domain>, --reason and --actor');
    }
    return core.registry.blacklistDomain(domain, flags.reason, flags.actor);
  },

  async 'no-funds'(core, [domain], flags) {
    if (domain === undefined || flags.reason === undefined) {
      throw new UsageError('no-funds needs <domain> and --reason');
    }
    const year = flags.year === undefined ? new Date().getUTCFullYear() : Number(flags.year);
    const result = await core.registry.markNoFundsThisYear(domain, year, flags.reason);
    if (!result.success) {
      throw result.error;
    }
    return result.value;
  },

  async 'retry-due'(core) {
    return core.registry.listReadyForRetry();
  },

  async stats(core) {
    return {
      domains: await core.registry.countByStatus(),
      candidates: core.candidates.countByStatus(),
      topDomains: (await core.registry.listHighQuality()).slice(0, 10).map((domain) => ({
        name: domain.name,
        highQualityCount: domain.highQualityCount,
        bestConfidenceScore: domain.bestConfidenceScore,
      })),
    };
  },
};

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(argv: string[]): Promise<number> {
  let parsed: { positionals: string[]; values: Flags };
  try {
    parsed = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        session: { type: 'string' },
        reason: { type: 'string' },
        actor: { type: 'string' },
        year: { type: 'string' },
      },
    });
  } catch (error) {
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n${USAGE}\n`);
    return EXIT_USAGE;
  }

  const [name, ...positionals] = parsed.positionals;
  const command = name === undefined ? undefined : commands[name];
  if (command === undefined) {
    process.stderr.write(`${USAGE}\n`);
    return EXIT_USAGE;
  }

  // 1. Validate environment
  const env = loadEnv();
  logger.debug({ nodeEnv: env.NODE_ENV, command: name }, 'Environment validated');

  // 2. Initialize database (run migrations)
  const connection = getConnection(env.DATABASE_PATH);
  try {
    migrate(connection.sqlite);

    // 3. Wire the core and run the command
    const core = createDiscoveryCore(connection.db, coreSettingsFromEnv(env));
    const output = await command(core, positionals, parsed.values);
    process.stdout.write(`${JSON.stringify(output, null, 2)}\n`);
    return EXIT_OK;
  } finally {
    closeDb();
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof UsageError) {
      process.stderr.write(`${error.message}\n${USAGE}\n`);
      process.exitCode = EXIT_USAGE;
      return;
    }
    if (error instanceof ConfigurationError) {
      logger.fatal({ issues: error.issues }, error.message);
    } else if (error instanceof AppError && isOperationalError(error)) {
      logger.error({ err: error, code: error.code }, error.message);
    } else {
      logger.fatal({ err: error }, 'Unexpected failure');
    }
    process.exitCode = EXIT_FAILURE;
  });
