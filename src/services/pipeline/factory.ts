/**
 * Production wiring: builds the orchestrator's dependencies from config.
 *
 * The pipeline is a process-wide singleton so the embedding worker (and any
 * launched model servers) are shared across requests.
 *
 * @module services/pipeline/factory
 */

import { loadTutorConfig, type TutorConfig } from '../../server/config.js';
import { CodeGenerationService } from '../codegen/service.js';
import { DiagramCompiler } from '../diagram/compiler.js';
import { resolveEndpoints } from '../inference/endpoints.js';
import { getModelServerLauncher } from '../inference/model-server.js';
import { ReasoningService } from '../reasoning/service.js';
import { ColPaliEmbedder } from '../retrieval/colpali.js';
import { RetrievalEngine } from '../retrieval/engine.js';
import { PopplerRasterizer } from '../retrieval/rasterizer.js';
import type { OrchestratorDeps } from './orchestrator.js';

export interface Pipeline {
  config: TutorConfig;
  deps: OrchestratorDeps;
  embedder: ColPaliEmbedder;
  shutdown(): Promise<void>;
}

export function createPipeline(config: TutorConfig): Pipeline {
  const embedder = new ColPaliEmbedder({
    model: config.retrieval.model,
    device: config.retrieval.device,
    pythonPath: config.retrieval.pythonPath,
    taskTimeoutMs: config.retrieval.workerTimeoutMs,
  });

  const retrieval = new RetrievalEngine(new PopplerRasterizer(), embedder, {
    dpi: config.retrieval.pdfDpi,
    batchSize: config.retrieval.pdfBatchSize,
    topK: config.retrieval.topKPages,
  });

  const launcher = config.launchModelServers ? getModelServerLauncher() : undefined;

  return {
    config,
    embedder,
    deps: {
      config,
      retrieval,
      reasoning: ReasoningService.fromConfig(config),
      codegen: CodeGenerationService.fromConfig(config),
      compiler: new DiagramCompiler(config.diagram),
      resolveEndpoints: () => resolveEndpoints(config, launcher),
    },
    async shutdown() {
      await embedder.shutdown();
      launcher?.shutdown();
    },
  };
}

let _pipeline: Pipeline | null = null;

export function getPipeline(): Pipeline {
  if (!_pipeline) {
    _pipeline = createPipeline(loadTutorConfig());
  }
  return _pipeline;
}

/** Shut down and drop the shared pipeline */
export async function shutdownPipeline(): Promise<void> {
  if (_pipeline) {
    const pipeline = _pipeline;
    _pipeline = null;
    await pipeline.shutdown();
  }
}
