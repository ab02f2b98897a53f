/**
 * Circuit Tutor MCP - Zod Validation Schemas
 *
 * Input validation for the MCP tools, plus the path and file checks that
 * run before any bytes reach the pipeline.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import * as path from 'path';
import * as fs from 'fs';
import { homedir, tmpdir } from 'os';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @param schema - Zod schema to validate against
 * @param input - Input value to validate
 * @returns Validated and typed input data
 * @throws ValidationError with descriptive message if validation fails
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const MAX_DOCUMENT_BYTES = 50 * 1024 * 1024;
export const MAX_IMAGE_BYTES = 20 * 1024 * 1024;
export const MAX_USER_IMAGES = 10;

/**
 * Schema for solving a question against a textbook PDF
 */
export const SolveInput = z.object({
  question: z
    .string()
    .trim()
    .min(1, 'Question is required')
    .max(10_000, 'Question must be at most 10000 characters'),
  pdf_path: z.string().min(1, 'PDF path is required'),
  image_paths: z
    .array(z.string().min(1, 'Image path cannot be empty'))
    .max(MAX_USER_IMAGES, `At most ${MAX_USER_IMAGES} images`)
    .default([]),
  top_k: z.number().int().min(1).max(50).optional(),
});

/**
 * Schema for the readiness check
 */
export const HealthCheckInput = z.object({
  timeout_ms: z.number().int().min(100).max(120_000).optional(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// PATH SECURITY
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Default directories input files may live in: home, temp, cwd, plus
 * CIRCUIT_TUTOR_ALLOWED_DIRS (comma-separated).
 */
function getDefaultAllowedBaseDirs(): string[] {
  const dirs = [
    path.resolve(homedir()),
    path.resolve(tmpdir()),
    path.resolve('/tmp'),
    path.resolve(process.cwd()),
  ];

  const extraDirs = process.env.CIRCUIT_TUTOR_ALLOWED_DIRS;
  if (extraDirs) {
    for (const d of extraDirs.split(',')) {
      const trimmed = d.trim();
      if (trimmed) {
        dirs.push(path.resolve(trimmed));
      }
    }
  }

  return dirs;
}

/**
 * Sanitize a file path to prevent directory traversal attacks.
 *
 * - Rejects null bytes
 * - Resolves the path fully via path.resolve() to eliminate '..' segments
 * - Verifies the resolved path starts with one of the allowed base directories
 *
 * @throws ValidationError if the path contains null bytes or escapes allowed directories
 */
export function sanitizePath(filePath: string, allowedBaseDirs?: string[]): string {
  if (filePath.includes('\0')) {
    throw new ValidationError('Path contains null bytes');
  }

  const resolved = path.resolve(filePath);

  const baseDirs =
    allowedBaseDirs && allowedBaseDirs.length > 0 ? allowedBaseDirs : getDefaultAllowedBaseDirs();

  const resolvedBases = baseDirs.map((d) => path.resolve(d));
  const withinAllowed = resolvedBases.some(
    (base) => resolved === base || resolved.startsWith(base + path.sep)
  );
  if (!withinAllowed) {
    throw new ValidationError(
      `Path "${resolved}" is outside allowed directories: ${resolvedBases.join(', ')}. ` +
        `To allow this path, set CIRCUIT_TUTOR_ALLOWED_DIRS (comma-separated list of directories).`
    );
  }

  return resolved;
}

/**
 * Check that `filePath` is an existing regular file no larger than
 * `maxBytes`, and return its resolved path.
 *
 * @throws ValidationError if the file is a directory, empty, or too large
 * @throws NodeJS.ErrnoException (ENOENT) if it does not exist
 */
export function assertReadableFile(
  filePath: string,
  maxBytes: number,
  label: string,
  allowedBaseDirs?: string[]
): string {
  const resolved = sanitizePath(filePath, allowedBaseDirs);
  const stats = fs.statSync(resolved);
  if (!stats.isFile()) {
    throw new ValidationError(`${label} is not a file: ${resolved}`);
  }
  if (stats.size === 0) {
    throw new ValidationError(`${label} is empty: ${resolved}`);
  }
  if (stats.size > maxBytes) {
    throw new ValidationError(
      `${label} is ${(stats.size / 1024 / 1024).toFixed(1)}MB; the limit is ${Math.round(maxBytes / 1024 / 1024)}MB`
    );
  }
  return resolved;
}
