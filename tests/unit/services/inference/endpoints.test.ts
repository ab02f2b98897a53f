/**
 * Unit tests for model endpoint resolution
 *
 * @module tests/unit/services/inference/endpoints
 */

import { describe, it, expect, vi } from 'vitest';
import { expectedEndpoints, resolveEndpoints } from '../../../../src/services/inference/endpoints.js';
import { ModelServerLauncher } from '../../../../src/services/inference/model-server.js';
import { MCPError } from '../../../../src/server/errors.js';
import { testConfig } from '../../../fixtures/config.js';

describe('resolveEndpoints', () => {
  it('returns the configured URLs without trailing slashes', async () => {
    const config = testConfig({ reasoning: { baseUrl: 'http://a.test:8000/' } });

    await expect(resolveEndpoints(config)).resolves.toEqual({
      reasoning: 'http://a.test:8000',
      codegen: 'http://codegen.test:8001',
    });
  });

  it('rejects a non-http endpoint', async () => {
    const config = testConfig({ codegen: { baseUrl: 'ftp://files.test/' } });

    const error = await resolveEndpoints(config).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MCPError);
    if (!(error instanceof MCPError)) return;
    expect(error.category).toBe('CONFIGURATION_ERROR');
    expect(error.message).toBe('codegen endpoint must be http(s): "ftp://files.test/"');
  });

  it('asks the launcher for both servers when launching', async () => {
    const launcher = new ModelServerLauncher();
    const ensureRunning = vi
      .spyOn(launcher, 'ensureRunning')
      .mockImplementation((spec) => `http://127.0.0.1:${spec.port}`);
    const config = testConfig({ launchModelServers: true, codegen: { port: 9001 } });

    const endpoints = await resolveEndpoints(config, launcher);

    expect(endpoints).toEqual({ reasoning: 'http://127.0.0.1:8000', codegen: 'http://127.0.0.1:9001' });
    expect(ensureRunning).toHaveBeenCalledTimes(2);
    expect(ensureRunning).toHaveBeenCalledWith({
      name: 'codegen',
      model: config.codegen.model,
      port: 9001,
    });
  });

  it('fails when launching without a launcher', async () => {
    const config = testConfig({ launchModelServers: true });

    await expect(resolveEndpoints(config)).rejects.toThrow(
      'LAUNCH_MODEL_SERVERS is set but no model server launcher is available'
    );
  });
});

describe('expectedEndpoints', () => {
  it('points at the local ports when launching', () => {
    expect(expectedEndpoints(testConfig({ launchModelServers: true }))).toEqual({
      reasoning: 'http://127.0.0.1:8000',
      codegen: 'http://127.0.0.1:8001',
    });
  });

  it('returns the configured URLs otherwise', () => {
    expect(expectedEndpoints(testConfig())).toEqual({
      reasoning: 'http://reasoning.test:8000',
      codegen: 'http://codegen.test:8001',
    });
  });
});
