/**
 * ora-compat-audit command-line interface
 *
 * Credentials may come from flags or from ORA_AUDIT_USER / ORA_AUDIT_PASSWORD
 * (a .env file is honoured). A password of the form `gcp-secret:<name>` is read
 * from Google Secret Manager.
 *
 * @license MIT
 */

import { Command, CommanderError, Option } from 'commander';
import { runAudit as defaultRunAudit, type AuditOptions, type AuditResult } from '../audit/index.js';
import { ConfigurationError, ErrorHandler } from '../errors/index.js';
import { createComponentLogger, LogLevel } from '../observability/logger.js';
import type { OutputFormat } from '../types.js';
import { validateConnectionOptions } from '../validation/index.js';

export const VERSION = '0.1.0';

/**
 * Parsed command-line flags
 */
export type CliFlags = {
  user?: string;
  password?: string;
  host?: string;
  port: string;
  service?: string;
  protocol: string;
  tns?: string;
  tnsPath?: string;
  config?: string;
  format: OutputFormat;
  outputDir?: string;
  cssDir?: string;
  continueOnError?: boolean;
  callTimeout?: string;
  thick?: boolean | string;
  logLevel?: LogLevel;
};

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface CliDependencies {
  runAudit?: (options: AuditOptions) => Promise<AuditResult>;
  io?: CliIO;
  env?: NodeJS.ProcessEnv;
}

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

/**
 * Map flags and environment to audit options
 *
 * Connection flags are validated here, before any password is resolved or
 * connection attempted.
 */
export function buildAuditOptions(flags: CliFlags, env: NodeJS.ProcessEnv): AuditOptions {
  const target = validateConnectionOptions({
    host: flags.host,
    port: flags.port,
    service: flags.service,
    protocol: flags.protocol,
    tns: flags.tns,
    tnsPath: flags.tnsPath,
  });

  const user = flags.user ?? env.ORA_AUDIT_USER;
  if (!user) {
    throw ConfigurationError.missingRequired('user (--user or ORA_AUDIT_USER)');
  }

  const password = flags.password ?? env.ORA_AUDIT_PASSWORD;
  if (!password) {
    throw ConfigurationError.missingRequired('password (--password or ORA_AUDIT_PASSWORD)');
  }

  let callTimeout: number | undefined;
  if (flags.callTimeout !== undefined) {
    callTimeout = Number(flags.callTimeout);
    if (!Number.isInteger(callTimeout) || callTimeout <= 0) {
      throw ConfigurationError.invalidFormat('call-timeout', 'a positive number of milliseconds');
    }
  }

  return {
    target,
    user,
    password,
    format: flags.format,
    mode: flags.continueOnError ? 'continue' : 'fail-fast',
    ...(flags.config ? { configPath: flags.config } : {}),
    ...(flags.outputDir ? { outputDir: flags.outputDir } : {}),
    ...(flags.cssDir ? { cssDir: flags.cssDir } : {}),
    ...(callTimeout ? { callTimeout } : {}),
    ...(flags.thick ? { thickClient: typeof flags.thick === 'string' ? { libDir: flags.thick } : {} } : {}),
  };
}

export function createProgram(io: CliIO): Command {
  return new Command()
    .name('ora-compat-audit')
    .description('Validate an Oracle database against a set of migration compatibility checks')
    .version(VERSION)
    .option('--user <user>', 'Username for the Oracle database')
    .option('--password <password>', 'Password, or gcp-secret:<name> to read it from Google Secret Manager')
    .option('--host <host>', 'Hostname of the Oracle database')
    .option('--port <port>', 'Port number of the Oracle database', '1521')
    .option('--service <service>', 'Service name of the Oracle database')
    .option('--tns <alias>', 'TNS alias (alternative to --host, --port, --service)')
    .option('--tns-path <dir>', 'Directory containing tnsnames.ora')
    .option('--config <path>', 'Path to the YAML check document (default: bundled checks)')
    .addOption(new Option('--protocol <protocol>', 'Network protocol').choices(['tcp', 'tcps']).default('tcp'))
    .addOption(new Option('--format <format>', 'Output format').choices(['text', 'html']).default('text'))
    .option('--output-dir <dir>', 'Directory for the HTML report (default: current directory)')
    .option('--css-dir <dir>', 'Directory of extra .css files to inline into the HTML report')
    .option('--continue-on-error', 'Run remaining checks when one fails and list the failures')
    .option('--call-timeout <ms>', 'Driver round-trip timeout in milliseconds')
    .option('--thick [libDir]', 'Use the Oracle Client libraries (thick mode), optionally from libDir')
    .addOption(new Option('--log-level <level>', 'Log level').choices(Object.values(LogLevel)))
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
    });
}

/**
 * Run the CLI and return the process exit code
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const io = deps.io ?? processIO;
  const env = deps.env ?? process.env;
  const runAudit = deps.runAudit ?? defaultRunAudit;
  const program = createProgram(io);
  let exitCode = 0;

  program.action(async () => {
    const flags = program.opts<CliFlags>();
    const options = buildAuditOptions(flags, env);
    const logger = createComponentLogger('cli', flags.logLevel ? { level: flags.logLevel } : {});

    const result = await runAudit({ ...options, logger });

    if (options.format === 'html' && result.artifactPath) {
      io.stdout(`HTML report generated: ${result.artifactPath}\n`);
    } else {
      io.stdout(result.rendered);
    }

    if (result.failedChecks.length > 0) {
      io.stderr(`Failed checks: ${result.failedChecks.join(', ')}\n`);
      exitCode = 1;
    }
  });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }

    io.stderr(`Error: ${ErrorHandler.getUserMessage(error)}\n`);
    if (process.env.NODE_ENV === 'development' && error instanceof Error) {
      io.stderr(`${error.stack ?? ''}\n`);
    }
    return 1;
  }

  return exitCode;
}
