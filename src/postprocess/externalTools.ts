/**
 * Crop and optimize tools run on rendered artifacts.
 *
 * Tools are plain executables looked up on PATH. A missing executable is a
 * warning: the artifact is left as rendered and processing continues.
 */

import { spawn } from 'node:child_process';
import { extname } from 'node:path';
import { ExternalToolError } from '../errors';

export type ToolRole = 'crop' | 'optimize';

export interface ToolInvocation {
  readonly role: ToolRole;
  readonly command: string;
  readonly args: ReadonlyArray<string>;
}

export interface PostProcessFlags {
  readonly crop?: boolean;
  readonly optimize?: boolean;
}

/**
 * Notice emitted when a tool is not installed. Never thrown.
 */
export interface ExternalToolUnavailable {
  readonly kind: 'external-tool-unavailable';
  readonly tool: string;
  readonly message: string;
}

export type ToolRunResult =
  | { readonly status: 'ok'; readonly tool: string }
  | { readonly status: 'unavailable'; readonly tool: string; readonly warning: ExternalToolUnavailable };

/**
 * The slice of a spawned child process the runner listens to.
 * `ChildProcess` from `node:child_process` satisfies it.
 */
export interface ToolProcess {
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  readonly stderr: { on(event: 'data', listener: (chunk: Buffer | string) => void): unknown } | null;
}

export interface SpawnToolOptions {
  readonly signal?: AbortSignal;
  readonly stdio: ['ignore', 'ignore', 'pipe'];
}

export type SpawnTool = (command: string, args: ReadonlyArray<string>, options: SpawnToolOptions) => ToolProcess;

export type WarningLogger = Pick<Console, 'warn'>;

export interface RunToolOptions {
  readonly signal?: AbortSignal;
  readonly spawnTool?: SpawnTool;
  readonly logger?: WarningLogger;
}

const LOG_PREFIX = '[figstyle/postprocess]';

const defaultSpawnTool: SpawnTool = (command, args, options) =>
  spawn(command, args, { signal: options.signal, stdio: options.stdio });

const isErrnoException = (err: unknown): err is NodeJS.ErrnoException =>
  err instanceof Error && 'code' in err;

/**
 * Lists the tools to run for an artifact, chosen by its extension
 * (case-insensitive). Unknown extensions get no tools.
 */
export function toolsForArtifact(path: string, flags: PostProcessFlags): ReadonlyArray<ToolInvocation> {
  const tools: ToolInvocation[] = [];

  switch (extname(path).toLowerCase()) {
    case '.pdf':
      if (flags.crop) tools.push({ role: 'crop', command: 'pdfcrop', args: ['--pdfversion', 'none', path, path] });
      if (flags.optimize) {
        tools.push({
          role: 'optimize',
          command: 'pdfsizeopt',
          args: ['--quiet', '--do-optimize-images=no', path, path],
        });
      }
      break;
    case '.png':
      if (flags.crop) tools.push({ role: 'crop', command: 'mogrify', args: ['-trim', path] });
      if (flags.optimize) tools.push({ role: 'optimize', command: 'optipng', args: ['-clobber', '-quiet', path] });
      break;
    default:
      break;
  }

  return tools;
}

/**
 * Runs one tool with its output discarded.
 *
 * Resolves with `status: 'unavailable'` (and logs a warning) when the executable
 * is not on PATH. Rejects with {@link ExternalToolError} on a non-zero exit, and
 * with the abort reason when `signal` fires.
 */
export function runExternalTool(invocation: ToolInvocation, options: RunToolOptions = {}): Promise<ToolRunResult> {
  const { signal, spawnTool = defaultSpawnTool, logger = console } = options;
  const tool = invocation.command;

  return new Promise<ToolRunResult>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    let settled = false;
    const settle = (action: () => void): void => {
      if (settled) return;
      settled = true;
      action();
    };

    let child: ToolProcess;
    try {
      child = spawnTool(tool, invocation.args, { signal, stdio: ['ignore', 'ignore', 'pipe'] });
    } catch (err) {
      reject(err);
      return;
    }

    let stderr = '';
    child.stderr?.on('data', (chunk) => {
      stderr += chunk.toString();
    });

    child.on('error', (err) => {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        const warning: ExternalToolUnavailable = {
          kind: 'external-tool-unavailable',
          tool,
          message: `${tool} not in path, skipping`,
        };
        logger.warn(`${LOG_PREFIX} ${warning.message}`);
        settle(() => resolve({ status: 'unavailable', tool, warning }));
        return;
      }
      settle(() => reject(signal?.aborted ? signal.reason : err));
    });

    child.on('close', (code) => {
      if (code === 0) {
        settle(() => resolve({ status: 'ok', tool }));
      } else {
        settle(() => reject(signal?.aborted ? signal.reason : new ExternalToolError(tool, code, stderr)));
      }
    });
  });
}
