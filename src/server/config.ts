/**
 * Circuit Tutor Configuration
 *
 * Every tunable the pipeline reads: model-serving endpoints, retrieval batch
 * size and top-K, generation limits, readiness probe budget, diagram
 * resolution. Values come from environment variables (loaded from .env by
 * the entry point) and fall back to the defaults below.
 *
 * @module server/config
 */

import { z } from 'zod';

export const DEFAULT_REASONING_MODEL = 'Qwen/Qwen2.5-VL-3B-Instruct';
export const DEFAULT_CODEGEN_MODEL = 'deepseek-ai/deepseek-coder-1.3b-instruct';
export const DEFAULT_COLPALI_MODEL = 'vidore/colpali-v1.3';

const ModelServerSchema = (defaults: { model: string; port: number }) =>
  z
    .object({
      /** Base URL of the OpenAI-compatible server, no trailing /v1 */
      baseUrl: z.string().url().default(`http://127.0.0.1:${defaults.port}`),
      model: z.string().min(1).default(defaults.model),
      /** Port used when this process launches the server itself */
      port: z.number().int().min(1).max(65535).default(defaults.port),
    })
    .default({});

export const TutorConfigSchema = z.object({
  reasoning: ModelServerSchema({ model: DEFAULT_REASONING_MODEL, port: 8000 }),
  codegen: ModelServerSchema({ model: DEFAULT_CODEGEN_MODEL, port: 8001 }),

  // Spawn `vllm serve` for both models instead of using the configured URLs
  launchModelServers: z.boolean().default(false),

  retrieval: z
    .object({
      model: z.string().min(1).default(DEFAULT_COLPALI_MODEL),
      pdfBatchSize: z.number().int().positive().default(4),
      topKPages: z.number().int().positive().default(3),
      pdfDpi: z.number().int().min(36).max(600).default(150),
      device: z.string().optional(),
      pythonPath: z.string().optional(),
      workerTimeoutMs: z.number().int().positive().default(300_000),
    })
    .default({}),

  generation: z
    .object({
      maxTokens: z.number().int().positive().default(1024),
      temperature: z.number().min(0).max(2).default(0.1),
      // Must exceed generation latency; unrelated to the probe timeout
      requestTimeoutMs: z.number().int().positive().default(600_000),
    })
    .default({}),

  health: z
    .object({
      maxAttempts: z.number().int().positive().default(30),
      timeoutMs: z.number().int().positive().default(30_000),
      intervalMs: z.number().int().min(0).default(10_000),
      path: z.string().startsWith('/').default('/health'),
    })
    .default({}),

  diagram: z
    .object({
      dpi: z.number().int().min(36).max(600).default(150),
      timeoutMs: z.number().int().positive().default(5_000),
    })
    .default({}),
});

export type TutorConfig = z.infer<typeof TutorConfigSchema>;
export type TutorConfigInput = z.input<typeof TutorConfigSchema>;

function parseIntEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: "${raw}"`);
  }
  return parsed;
}

function parseFloatEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const parsed = parseFloat(raw);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: "${raw}"`);
  }
  return parsed;
}

function parseBoolEnv(name: string): boolean | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

function optionalEnv(name: string): string | undefined {
  const raw = process.env[name];
  return raw === undefined || raw === '' ? undefined : raw;
}

/**
 * Load configuration from environment variables, then apply overrides.
 *
 * Environment variables:
 *   REASONING_BASE_URL / REASONING_MODEL / REASONING_PORT
 *   CODEGEN_BASE_URL / CODEGEN_MODEL / CODEGEN_PORT
 *   LAUNCH_MODEL_SERVERS
 *   COLPALI_MODEL / COLPALI_DEVICE / PYTHON_PATH / PDF_BATCH_SIZE / TOP_K_PAGES / PDF_DPI
 *   MAX_TOKENS / TEMPERATURE / GENERATION_TIMEOUT_MS
 *   HEALTH_CHECK_MAX_RETRIES / HEALTH_CHECK_TIMEOUT_MS / HEALTH_CHECK_INTERVAL_MS
 *   CIRCUIT_DPI / DIAGRAM_TIMEOUT_MS
 *
 * @throws Error on a non-numeric numeric variable
 * @throws ZodError when a value is out of range
 */
export function loadTutorConfig(overrides?: TutorConfigInput): TutorConfig {
  const env = {
    reasoning: {
      baseUrl: optionalEnv('REASONING_BASE_URL'),
      model: optionalEnv('REASONING_MODEL'),
      port: parseIntEnv('REASONING_PORT'),
    },
    codegen: {
      baseUrl: optionalEnv('CODEGEN_BASE_URL'),
      model: optionalEnv('CODEGEN_MODEL'),
      port: parseIntEnv('CODEGEN_PORT'),
    },
    launchModelServers: parseBoolEnv('LAUNCH_MODEL_SERVERS'),
    retrieval: {
      model: optionalEnv('COLPALI_MODEL'),
      pdfBatchSize: parseIntEnv('PDF_BATCH_SIZE'),
      topKPages: parseIntEnv('TOP_K_PAGES'),
      pdfDpi: parseIntEnv('PDF_DPI'),
      device: optionalEnv('COLPALI_DEVICE'),
      pythonPath: optionalEnv('PYTHON_PATH'),
    },
    generation: {
      maxTokens: parseIntEnv('MAX_TOKENS'),
      temperature: parseFloatEnv('TEMPERATURE'),
      requestTimeoutMs: parseIntEnv('GENERATION_TIMEOUT_MS'),
    },
    health: {
      maxAttempts: parseIntEnv('HEALTH_CHECK_MAX_RETRIES'),
      timeoutMs: parseIntEnv('HEALTH_CHECK_TIMEOUT_MS'),
      intervalMs: parseIntEnv('HEALTH_CHECK_INTERVAL_MS'),
    },
    diagram: {
      dpi: parseIntEnv('CIRCUIT_DPI'),
      timeoutMs: parseIntEnv('DIAGRAM_TIMEOUT_MS'),
    },
  };

  return TutorConfigSchema.parse({
    reasoning: { ...env.reasoning, ...overrides?.reasoning },
    codegen: { ...env.codegen, ...overrides?.codegen },
    launchModelServers: overrides?.launchModelServers ?? env.launchModelServers,
    retrieval: { ...env.retrieval, ...overrides?.retrieval },
    generation: { ...env.generation, ...overrides?.generation },
    health: { ...env.health, ...overrides?.health },
    diagram: { ...env.diagram, ...overrides?.diagram },
  });
}
