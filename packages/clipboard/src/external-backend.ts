import { spawn } from 'node:child_process';
import { constants } from 'node:fs';
import { access } from 'node:fs/promises';
import { delimiter, join } from 'node:path';

import type { ClipboardBackend } from './types.js';

type CommandLine = { command: string; args: string[] };

export type ClipboardTool = {
  name: string;
  copy: CommandLine;
  paste: CommandLine;
};

export const CLIPBOARD_TOOLS = {
  wayland: {
    name: 'wl-clipboard',
    copy: { command: 'wl-copy', args: [] },
    paste: { command: 'wl-paste', args: ['--no-newline'] },
  },
  xclip: {
    name: 'xclip',
    copy: { command: 'xclip', args: ['-in', '-selection', 'clipboard'] },
    paste: { command: 'xclip', args: ['-out', '-selection', 'clipboard'] },
  },
  xsel: {
    name: 'xsel',
    copy: { command: 'xsel', args: ['--input', '--clipboard'] },
    paste: { command: 'xsel', args: ['--output', '--clipboard'] },
  },
  termux: {
    name: 'termux-api',
    copy: { command: 'termux-clipboard-set', args: [] },
    paste: { command: 'termux-clipboard-get', args: [] },
  },
} satisfies Record<string, ClipboardTool>;

export type CommandLookup = (command: string) => Promise<boolean>;

/** Resolves `command` against PATH the way a shell would, without running it. */
export function pathLookup(env: NodeJS.ProcessEnv): CommandLookup {
  const dirs = (env.PATH ?? '').split(delimiter).filter((dir) => dir.length > 0);
  return async (command) => {
    for (const dir of dirs) {
      try {
        await access(join(dir, command), constants.X_OK);
        return true;
      } catch {
        continue;
      }
    }
    return false;
  };
}

/**
 * First usable tool: wl-clipboard under Wayland, then xclip, xsel and
 * the Termux helpers.
 */
export async function detectClipboardTool(options: {
  env: NodeJS.ProcessEnv;
  hasCommand?: CommandLookup;
}): Promise<ClipboardTool | null> {
  const hasCommand = options.hasCommand ?? pathLookup(options.env);
  const candidates: ClipboardTool[] = [];
  if (options.env.WAYLAND_DISPLAY) candidates.push(CLIPBOARD_TOOLS.wayland);
  candidates.push(CLIPBOARD_TOOLS.xclip, CLIPBOARD_TOOLS.xsel, CLIPBOARD_TOOLS.termux);

  for (const tool of candidates) {
    if ((await hasCommand(tool.copy.command)) && (await hasCommand(tool.paste.command))) {
      return tool;
    }
  }
  return null;
}

export type CommandRunner = (line: CommandLine, input?: Buffer, signal?: AbortSignal) => Promise<Buffer>;

/**
 * Spawns a command, feeds it `input` and collects stdout. Non-zero exit
 * rejects. Aborting `signal` kills the child.
 */
export const runCommand: CommandRunner = (line, input, signal) =>
  new Promise<Buffer>((resolve, reject) => {
    const child = spawn(line.command, line.args, {
      stdio: ['pipe', 'pipe', 'pipe'],
      signal,
      killSignal: 'SIGKILL',
    });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let failed = false;
    const fail = (error: Error) => {
      if (failed) return;
      failed = true;
      reject(error);
    };

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
    child.stdin.on('error', fail);
    child.once('error', fail);
    child.once('close', (code, signal) => {
      if (failed) return;
      if (code === 0) {
        resolve(Buffer.concat(stdout));
        return;
      }
      const detail = Buffer.concat(stderr).toString('utf8').trim();
      const status = code === null ? `signal ${signal ?? 'unknown'}` : `code ${code}`;
      fail(new Error(`${line.command} exited with ${status}${detail ? `: ${detail}` : ''}`));
    });

    child.stdin.end(input ?? Buffer.alloc(0));
  });

/** Clipboard driven by an external command-line tool. */
export class ExternalToolClipboard implements ClipboardBackend {
  readonly kind = 'external' as const;

  constructor(
    readonly tool: ClipboardTool,
    private readonly run: CommandRunner = runCommand,
  ) {}

  async write(data: Buffer, signal?: AbortSignal): Promise<void> {
    await this.run(this.tool.copy, data, signal);
  }

  async read(signal?: AbortSignal): Promise<Buffer> {
    return this.run(this.tool.paste, undefined, signal);
  }
}
