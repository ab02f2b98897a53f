/**
 * Messages exchanged with the render worker over the IPC channel.
 *
 *   worker → server  { type: 'ready' }            after its modules load
 *   server → worker  { type: 'job', code, ... }   exactly once
 *   worker → server  { type: 'result', result }   then waits to be killed
 *
 * @module services/diagram/protocol
 */

import { z } from 'zod';

export const RenderJobSchema = z.object({
  type: z.literal('job'),
  code: z.string(),
  dpi: z.number().positive(),
  timeoutMs: z.number().int().positive(),
});

export type RenderJob = z.infer<typeof RenderJobSchema>;

const DiagramResultSchema = z.discriminatedUnion('success', [
  z.object({
    success: z.literal(true),
    image_base64: z.string(),
    stdout: z.string(),
    stderr: z.string(),
    diagram_code: z.string(),
  }),
  z.object({
    success: z.literal(false),
    error: z.string(),
    traceback: z.string(),
    stdout: z.string(),
    stderr: z.string(),
    diagram_code: z.string(),
  }),
]);

export const WorkerMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ready') }),
  z.object({ type: z.literal('result'), result: DiagramResultSchema }),
]);

export type WorkerMessage = z.infer<typeof WorkerMessageSchema>;
