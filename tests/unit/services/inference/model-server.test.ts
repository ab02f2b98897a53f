/**
 * Unit tests for the model server launcher
 *
 * child_process.spawn is mocked; no vllm process is started.
 *
 * @module tests/unit/services/inference/model-server
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter } from 'events';

const { spawnMock, spawned } = vi.hoisted(() => ({
  spawnMock: vi.fn(),
  spawned: [] as FakeProcess[],
}));

class FakeProcess extends EventEmitter {
  stdout = new EventEmitter();
  stderr = new EventEmitter();
  pid: number;
  exitCode: number | null = null;
  kill = vi.fn((_signal?: string) => true);

  constructor(pid: number) {
    super();
    this.pid = pid;
  }
}

vi.mock('child_process', () => ({
  spawn: spawnMock,
}));

import { ModelServerLauncher, buildServeArgs } from '../../../../src/services/inference/model-server.js';

const SPEC = { name: 'reasoning', model: 'test/vision-model', port: 8000 };

beforeEach(() => {
  spawned.length = 0;
  spawnMock.mockReset();
  spawnMock.mockImplementation(() => {
    const proc = new FakeProcess(1000 + spawned.length);
    spawned.push(proc);
    return proc;
  });
});

describe('buildServeArgs', () => {
  it('serves the model under its own name on the given port', () => {
    expect(buildServeArgs(SPEC)).toEqual([
      'serve',
      'test/vision-model',
      '--host',
      '0.0.0.0',
      '--port',
      '8000',
      '--served-model-name',
      'test/vision-model',
      '--enforce-eager',
    ]);
  });
});

describe('ModelServerLauncher', () => {
  it('spawns one process per model and reuses it', () => {
    const launcher = new ModelServerLauncher('vllm-test');

    expect(launcher.ensureRunning(SPEC)).toBe('http://127.0.0.1:8000');
    expect(launcher.ensureRunning(SPEC)).toBe('http://127.0.0.1:8000');

    expect(spawnMock).toHaveBeenCalledTimes(1);
    expect(spawnMock.mock.calls[0][0]).toBe('vllm-test');
    expect(launcher.getStatus()).toEqual([
      expect.objectContaining({ name: 'reasoning', model: 'test/vision-model', port: 8000, pid: 1000 }),
    ]);
  });

  it('respawns after the process exits', () => {
    const launcher = new ModelServerLauncher();
    launcher.ensureRunning(SPEC);

    spawned[0].emit('exit', 1);
    expect(launcher.getStatus()).toEqual([]);

    launcher.ensureRunning(SPEC);
    expect(spawnMock).toHaveBeenCalledTimes(2);
  });

  it('forgets a server whose command could not be started', () => {
    const launcher = new ModelServerLauncher('/nonexistent/vllm');
    launcher.ensureRunning(SPEC);

    // spawn reports a missing binary through 'error' alone, never 'exit'
    spawned[0].emit('error', Object.assign(new Error('spawn /nonexistent/vllm ENOENT'), { code: 'ENOENT' }));
    expect(launcher.getStatus()).toEqual([]);

    launcher.ensureRunning(SPEC);
    expect(spawnMock).toHaveBeenCalledTimes(2);
    expect(spawnMock.mock.calls[1][0]).toBe('/nonexistent/vllm');
  });

  it('keeps a replacement registered when the old process reports late', () => {
    const launcher = new ModelServerLauncher();
    launcher.ensureRunning(SPEC);
    spawned[0].emit('exit', 1);
    launcher.ensureRunning(SPEC);

    spawned[0].emit('error', new Error('late error from the first process'));

    expect(launcher.getStatus()).toEqual([expect.objectContaining({ pid: 1001 })]);
  });

  it('kills every server on shutdown and refuses new ones', () => {
    const launcher = new ModelServerLauncher();
    launcher.ensureRunning(SPEC);
    launcher.ensureRunning({ name: 'codegen', model: 'test/code-model', port: 8001 });

    launcher.shutdown();

    expect(spawned[0].kill).toHaveBeenCalledWith('SIGTERM');
    expect(spawned[1].kill).toHaveBeenCalledWith('SIGTERM');
    expect(launcher.getStatus()).toEqual([]);
    expect(() => launcher.ensureRunning(SPEC)).toThrow('Model server launcher is shutting down');
  });
});
