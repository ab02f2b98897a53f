/**
 * Render worker: runs one diagram program in its own process.
 *
 * Started by DiagramCompiler through child_process.fork. Whatever the
 * program does to the schematic library, this process, or its stdout dies
 * with it; the server only sees the result message.
 *
 * @module services/diagram/render-worker
 */

import { RenderJobSchema, type WorkerMessage } from './protocol.js';
import { diagramFailure, runDiagramProgram } from './sandbox.js';

function send(message: WorkerMessage): void {
  process.send?.(message);
}

if (!process.send) {
  console.error('[RenderWorker] No IPC channel; start this module with child_process.fork');
  process.exit(1);
}

process.once('message', (raw: unknown) => {
  const job = RenderJobSchema.safeParse(raw);
  const result = job.success
    ? runDiagramProgram(job.data.code, { dpi: job.data.dpi, timeoutMs: job.data.timeoutMs })
    : diagramFailure(new Error(`invalid render job: ${job.error.message}`), '', '', '');
  send({ type: 'result', result });
});

// The server kills this process once it has the result; exit if it goes away first
process.on('disconnect', () => process.exit(0));

send({ type: 'ready' });
