import { EventEmitter } from 'node:events';
import { describe, it, expect, vi } from 'vitest';
import { runExternalTool, toolsForArtifact } from '../externalTools';
import type { SpawnToolOptions, ToolInvocation } from '../externalTools';
import { ExternalToolError } from '../../errors';

class FakeToolProcess extends EventEmitter {
  readonly stderr = new EventEmitter();
}

type Script = (proc: FakeToolProcess, options: SpawnToolOptions) => void;

// Runs `script` after the runner has attached its listeners.
const createSpawn = (script: Script) =>
  vi.fn((_command: string, _args: ReadonlyArray<string>, options: SpawnToolOptions) => {
    const proc = new FakeToolProcess();
    queueMicrotask(() => script(proc, options));
    return proc;
  });

const enoent = (command: string): Error =>
  Object.assign(new Error(`spawn ${command} ENOENT`), { code: 'ENOENT' });

const optipng: ToolInvocation = { role: 'optimize', command: 'optipng', args: ['-clobber', '-quiet', 'a.png'] };
const pdfcrop: ToolInvocation = {
  role: 'crop',
  command: 'pdfcrop',
  args: ['--pdfversion', 'none', 'a.pdf', 'a.pdf'],
};

describe('toolsForArtifact', () => {
  it('crops then optimizes PDFs', () => {
    expect(toolsForArtifact('out/fig.PDF', { crop: true, optimize: true })).toEqual([
      { role: 'crop', command: 'pdfcrop', args: ['--pdfversion', 'none', 'out/fig.PDF', 'out/fig.PDF'] },
      {
        role: 'optimize',
        command: 'pdfsizeopt',
        args: ['--quiet', '--do-optimize-images=no', 'out/fig.PDF', 'out/fig.PDF'],
      },
    ]);
  });

  it('uses image tools for PNGs', () => {
    expect(toolsForArtifact('fig.png', { crop: true })).toEqual([
      { role: 'crop', command: 'mogrify', args: ['-trim', 'fig.png'] },
    ]);
    expect(toolsForArtifact('fig.png', { optimize: true })).toEqual([
      { role: 'optimize', command: 'optipng', args: ['-clobber', '-quiet', 'fig.png'] },
    ]);
  });

  it('returns nothing for other formats or when no step is requested', () => {
    expect(toolsForArtifact('fig.svg', { crop: true, optimize: true })).toEqual([]);
    expect(toolsForArtifact('fig.pdf', {})).toEqual([]);
  });
});

describe('runExternalTool', () => {
  it('resolves ok when the tool exits cleanly', async () => {
    const spawnTool = createSpawn((proc) => proc.emit('close', 0, null));
    await expect(runExternalTool(optipng, { spawnTool })).resolves.toEqual({ status: 'ok', tool: 'optipng' });
    expect(spawnTool).toHaveBeenCalledWith('optipng', ['-clobber', '-quiet', 'a.png'], {
      signal: undefined,
      stdio: ['ignore', 'ignore', 'pipe'],
    });
  });

  it('downgrades a missing executable to a warning', async () => {
    const logger = { warn: vi.fn() };
    const spawnTool = createSpawn((proc) => {
      proc.emit('error', enoent('pdfcrop'));
      proc.emit('close', -2, null);
    });

    const result = await runExternalTool(pdfcrop, { spawnTool, logger });

    expect(result).toEqual({
      status: 'unavailable',
      tool: 'pdfcrop',
      warning: { kind: 'external-tool-unavailable', tool: 'pdfcrop', message: 'pdfcrop not in path, skipping' },
    });
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith('[figstyle/postprocess] pdfcrop not in path, skipping');
  });

  it('rejects with ExternalToolError on a non-zero exit', async () => {
    const spawnTool = createSpawn((proc) => {
      proc.stderr.emit('data', Buffer.from('bad pdf\n'));
      proc.emit('close', 2, null);
    });

    const run = runExternalTool(pdfcrop, { spawnTool });
    await expect(run).rejects.toBeInstanceOf(ExternalToolError);
    await expect(run).rejects.toThrow('pdfcrop exited with code 2: bad pdf');
  });

  it('rejects with other spawn errors', async () => {
    const denied = Object.assign(new Error('spawn pdfcrop EACCES'), { code: 'EACCES' });
    const spawnTool = createSpawn((proc) => proc.emit('error', denied));
    await expect(runExternalTool(pdfcrop, { spawnTool })).rejects.toBe(denied);
  });

  it('does not spawn when the signal is already aborted', async () => {
    const controller = new AbortController();
    const reason = new Error('cancelled');
    controller.abort(reason);
    const spawnTool = createSpawn(() => {});

    await expect(runExternalTool(pdfcrop, { spawnTool, signal: controller.signal })).rejects.toBe(reason);
    expect(spawnTool).not.toHaveBeenCalled();
  });

  it('rejects with the abort reason when cancelled mid-run', async () => {
    const controller = new AbortController();
    const reason = new Error('cancelled');
    const spawnTool = createSpawn((proc, options) => {
      options.signal?.addEventListener('abort', () => {
        proc.emit('error', Object.assign(new Error('The operation was aborted'), { code: 'ABORT_ERR' }));
        proc.emit('close', null, 'SIGTERM');
      });
      controller.abort(reason);
    });

    await expect(runExternalTool(pdfcrop, { spawnTool, signal: controller.signal })).rejects.toBe(reason);
  });
});
