/**
 * Unit tests for configuration loading
 *
 * @module tests/unit/server/config
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ZodError } from 'zod';
import {
  DEFAULT_CODEGEN_MODEL,
  DEFAULT_COLPALI_MODEL,
  DEFAULT_REASONING_MODEL,
  loadTutorConfig,
} from '../../../src/server/config.js';

const ENV_VARS = [
  'REASONING_BASE_URL',
  'REASONING_MODEL',
  'REASONING_PORT',
  'CODEGEN_BASE_URL',
  'CODEGEN_MODEL',
  'CODEGEN_PORT',
  'LAUNCH_MODEL_SERVERS',
  'COLPALI_MODEL',
  'COLPALI_DEVICE',
  'PYTHON_PATH',
  'PDF_BATCH_SIZE',
  'TOP_K_PAGES',
  'PDF_DPI',
  'MAX_TOKENS',
  'TEMPERATURE',
  'GENERATION_TIMEOUT_MS',
  'HEALTH_CHECK_MAX_RETRIES',
  'HEALTH_CHECK_TIMEOUT_MS',
  'HEALTH_CHECK_INTERVAL_MS',
  'CIRCUIT_DPI',
  'DIAGRAM_TIMEOUT_MS',
];

function clearEnv(): void {
  // An empty value counts as unset
  for (const name of ENV_VARS) vi.stubEnv(name, '');
}

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('loadTutorConfig', () => {
  it('applies defaults when nothing is set', () => {
    clearEnv();
    const config = loadTutorConfig();

    expect(config.reasoning).toEqual({
      baseUrl: 'http://127.0.0.1:8000',
      model: DEFAULT_REASONING_MODEL,
      port: 8000,
    });
    expect(config.codegen).toEqual({
      baseUrl: 'http://127.0.0.1:8001',
      model: DEFAULT_CODEGEN_MODEL,
      port: 8001,
    });
    expect(config.launchModelServers).toBe(false);
    expect(config.retrieval).toEqual({
      model: DEFAULT_COLPALI_MODEL,
      pdfBatchSize: 4,
      topKPages: 3,
      pdfDpi: 150,
      workerTimeoutMs: 300_000,
    });
    expect(config.generation).toEqual({ maxTokens: 1024, temperature: 0.1, requestTimeoutMs: 600_000 });
    expect(config.health).toEqual({ maxAttempts: 30, timeoutMs: 30_000, intervalMs: 10_000, path: '/health' });
    expect(config.diagram).toEqual({ dpi: 150, timeoutMs: 5_000 });
  });

  it('reads environment variables', () => {
    clearEnv();
    vi.stubEnv('REASONING_BASE_URL', 'http://gpu-box:9000');
    vi.stubEnv('TOP_K_PAGES', '5');
    vi.stubEnv('TEMPERATURE', '0.7');
    vi.stubEnv('LAUNCH_MODEL_SERVERS', 'yes');
    vi.stubEnv('COLPALI_DEVICE', 'cpu');
    vi.stubEnv('HEALTH_CHECK_MAX_RETRIES', '7');

    const config = loadTutorConfig();

    expect(config.reasoning.baseUrl).toBe('http://gpu-box:9000');
    expect(config.retrieval.topKPages).toBe(5);
    expect(config.retrieval.device).toBe('cpu');
    expect(config.generation.temperature).toBe(0.7);
    expect(config.launchModelServers).toBe(true);
    expect(config.health.maxAttempts).toBe(7);
  });

  it('treats unrecognised boolean values as false', () => {
    clearEnv();
    vi.stubEnv('LAUNCH_MODEL_SERVERS', 'nope');

    expect(loadTutorConfig().launchModelServers).toBe(false);
  });

  it('lets overrides win over the environment per field', () => {
    clearEnv();
    vi.stubEnv('TOP_K_PAGES', '5');
    vi.stubEnv('PDF_DPI', '200');

    const config = loadTutorConfig({ retrieval: { topKPages: 2 }, launchModelServers: true });

    expect(config.retrieval.topKPages).toBe(2);
    expect(config.retrieval.pdfDpi).toBe(200);
    expect(config.launchModelServers).toBe(true);
  });

  it('rejects a non-numeric numeric variable', () => {
    clearEnv();
    vi.stubEnv('PDF_BATCH_SIZE', 'four');

    expect(() => loadTutorConfig()).toThrow('Invalid numeric env var PDF_BATCH_SIZE: "four"');
  });

  it('rejects out-of-range values', () => {
    clearEnv();
    vi.stubEnv('TOP_K_PAGES', '0');

    expect(() => loadTutorConfig()).toThrow(ZodError);
  });

  it('rejects a malformed base URL', () => {
    clearEnv();

    expect(() => loadTutorConfig({ codegen: { baseUrl: 'not a url' } })).toThrow(ZodError);
  });
});
