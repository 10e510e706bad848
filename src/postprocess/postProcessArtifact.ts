import { stat } from 'node:fs/promises';
import { runExternalTool, toolsForArtifact } from './externalTools';
import type {
  ExternalToolUnavailable,
  PostProcessFlags,
  RunToolOptions,
  ToolRole,
  ToolRunResult,
} from './externalTools';

export interface PostProcessOptions extends PostProcessFlags, RunToolOptions {}

export interface PostProcessStep {
  readonly role: ToolRole;
  readonly result: ToolRunResult;
}

export interface PostProcessReport {
  readonly path: string;
  /** False when `path` did not name a regular file; no tools ran. */
  readonly processed: boolean;
  readonly steps: ReadonlyArray<PostProcessStep>;
  readonly warnings: ReadonlyArray<ExternalToolUnavailable>;
}

// Path shapes that cannot name a file: a missing entry, a file used as a
// directory, a symlink cycle.
const NOT_A_FILE_CODES: ReadonlySet<string> = new Set(['ENOENT', 'ENOTDIR', 'ELOOP']);

async function isRegularFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (err) {
    if (err instanceof Error && 'code' in err && typeof err.code === 'string' && NOT_A_FILE_CODES.has(err.code)) {
      return false;
    }
    throw err;
  }
}

/**
 * Crops and/or optimizes a rendered artifact in place.
 *
 * Tools run one after another (crop before optimize) since both rewrite the
 * same file. Missing tools are reported in `warnings`; a tool that fails
 * rejects the returned promise.
 */
export async function postProcessArtifact(
  path: string,
  options: PostProcessOptions = {}
): Promise<PostProcessReport> {
  if (!(await isRegularFile(path))) {
    return { path, processed: false, steps: [], warnings: [] };
  }

  const steps: PostProcessStep[] = [];
  const warnings: ExternalToolUnavailable[] = [];

  for (const invocation of toolsForArtifact(path, options)) {
    const result = await runExternalTool(invocation, options);
    steps.push({ role: invocation.role, result });
    if (result.status === 'unavailable') warnings.push(result.warning);
  }

  return { path, processed: true, steps, warnings };
}
