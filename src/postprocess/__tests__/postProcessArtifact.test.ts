import { EventEmitter } from 'node:events';
import { mkdtemp, rm, symlink, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { postProcessArtifact } from '../postProcessArtifact';
import { ExternalToolError } from '../../errors';

class FakeToolProcess extends EventEmitter {
  readonly stderr = new EventEmitter();
}

const missing = new Set<string>();
const failing = new Set<string>();

const spawnTool = vi.fn((command: string, _args: ReadonlyArray<string>) => {
  const proc = new FakeToolProcess();
  queueMicrotask(() => {
    if (missing.has(command)) {
      proc.emit('error', Object.assign(new Error(`spawn ${command} ENOENT`), { code: 'ENOENT' }));
    } else {
      proc.emit('close', failing.has(command) ? 1 : 0, null);
    }
  });
  return proc;
});

const logger = { warn: vi.fn() };

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'figstyle-'));
  missing.clear();
  failing.clear();
  spawnTool.mockClear();
  logger.warn.mockClear();
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('postProcessArtifact', () => {
  it('skips paths that were never written', async () => {
    const path = join(dir, 'absent.pdf');
    const report = await postProcessArtifact(path, { crop: true, optimize: true, spawnTool, logger });
    expect(report).toEqual({ path, processed: false, steps: [], warnings: [] });
    expect(spawnTool).not.toHaveBeenCalled();
  });

  it('skips directories', async () => {
    const report = await postProcessArtifact(dir, { crop: true, spawnTool, logger });
    expect(report.processed).toBe(false);
    expect(spawnTool).not.toHaveBeenCalled();
  });

  it('skips paths that run through a regular file', async () => {
    const file = join(dir, 'figure.pdf');
    await writeFile(file, '%PDF-1.4\n');
    const path = join(file, 'nested.pdf');

    const report = await postProcessArtifact(path, { crop: true, spawnTool, logger });
    expect(report).toEqual({ path, processed: false, steps: [], warnings: [] });
    expect(spawnTool).not.toHaveBeenCalled();
  });

  it('skips symlink cycles', async () => {
    const first = join(dir, 'first.pdf');
    const second = join(dir, 'second.pdf');
    await symlink(second, first);
    await symlink(first, second);

    const report = await postProcessArtifact(first, { crop: true, spawnTool, logger });
    expect(report.processed).toBe(false);
    expect(spawnTool).not.toHaveBeenCalled();
  });

  it('crops before optimizing', async () => {
    const path = join(dir, 'figure.pdf');
    await writeFile(path, '%PDF-1.4\n');

    const report = await postProcessArtifact(path, { crop: true, optimize: true, spawnTool, logger });

    expect(spawnTool.mock.calls.map(([command]) => command)).toEqual(['pdfcrop', 'pdfsizeopt']);
    expect(report.steps).toEqual([
      { role: 'crop', result: { status: 'ok', tool: 'pdfcrop' } },
      { role: 'optimize', result: { status: 'ok', tool: 'pdfsizeopt' } },
    ]);
    expect(report.warnings).toEqual([]);
  });

  it('continues past a missing tool and reports it', async () => {
    const path = join(dir, 'figure.png');
    await writeFile(path, 'png');
    missing.add('mogrify');

    const report = await postProcessArtifact(path, { crop: true, optimize: true, spawnTool, logger });

    expect(report.processed).toBe(true);
    expect(report.steps.map((step) => step.result.status)).toEqual(['unavailable', 'ok']);
    expect(report.warnings).toEqual([
      { kind: 'external-tool-unavailable', tool: 'mogrify', message: 'mogrify not in path, skipping' },
    ]);
    expect(logger.warn).toHaveBeenCalledWith('[figstyle/postprocess] mogrify not in path, skipping');
  });

  it('rejects when a tool fails', async () => {
    const path = join(dir, 'figure.pdf');
    await writeFile(path, '%PDF-1.4\n');
    failing.add('pdfcrop');

    await expect(postProcessArtifact(path, { crop: true, optimize: true, spawnTool, logger })).rejects.toBeInstanceOf(
      ExternalToolError
    );
    expect(spawnTool).toHaveBeenCalledTimes(1);
  });

  it('runs nothing for formats without tools', async () => {
    const path = join(dir, 'figure.svg');
    await writeFile(path, '<svg/>');

    const report = await postProcessArtifact(path, { crop: true, optimize: true, spawnTool, logger });
    expect(report).toEqual({ path, processed: true, steps: [], warnings: [] });
  });
});
