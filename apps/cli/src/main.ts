#!/usr/bin/env node
import 'reflect-metadata';

import { homedir } from 'node:os';

import { runServer } from '@clipwire/api';
import { createClipboardManager } from '@clipwire/clipboard';
import { PROGRAM_NAME } from '@clipwire/shared-contracts';

import { parseCommandLine, USAGE, type CommandName } from './args.js';
import { copyCommand, pasteCommand } from './commands/clipboard.js';
import type { CliDependencies, CliIO, Command } from './commands/context.js';
import { keyAddCommand, keyGenCommand, keyPrintCommand } from './commands/keys.js';
import { openCommand, quitCommand } from './commands/remote.js';
import { serverCommand } from './commands/server.js';
import { resolveSettings } from './config.js';
import { readEnvFile } from './env.js';
import { UsageError } from './errors.js';
import { createCliLogger } from './logger.js';
import { nodeTransport } from './transport.js';

const COMMAND_HANDLERS: Record<Exclude<CommandName, 'help'>, Command> = {
  server: serverCommand,
  copy: copyCommand,
  paste: pasteCommand,
  open: openCommand,
  quit: quitCommand,
  'key-gen': keyGenCommand,
  'key-add': keyAddCommand,
  'key-print': keyPrintCommand,
};

function defaultDependencies(): CliDependencies {
  return {
    env: process.env,
    home: homedir(),
    cwd: process.cwd(),
    transport: nodeTransport,
    openLocalClipboard: (logger) => createClipboardManager({ logger }),
    runServer,
  };
}

const processIO: CliIO = {
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
};

/**
 * Runs one command and resolves to the exit code. Errors are reported on
 * stderr rather than thrown.
 */
export async function runCli(
  argv: string[],
  io: CliIO = processIO,
  overrides: Partial<CliDependencies> = {},
): Promise<number> {
  const deps: CliDependencies = { ...defaultDependencies(), ...overrides };
  try {
    const { command, args, flags } = parseCommandLine(argv);
    if (command === 'help') {
      io.stdout.write(USAGE);
      return 0;
    }

    const envFile = deps.cwd === null ? null : await readEnvFile(deps.cwd);
    const settings = resolveSettings(flags, deps.env, envFile?.values);
    const logger = createCliLogger(settings.log, PROGRAM_NAME);
    if (envFile) logger.debug?.(`Read settings from ${envFile.path}`);
    await COMMAND_HANDLERS[command]({ settings, args, io, deps, logger });
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`${PROGRAM_NAME}: ${message}\n`);
    if (error instanceof UsageError) {
      io.stderr.write(`Run "${PROGRAM_NAME} --help" for usage.\n`);
    }
    return 1;
  }
}

if (require.main === module) {
  void runCli(process.argv.slice(2)).then((code) => {
    process.exitCode = code;
  });
}
