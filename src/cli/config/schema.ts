/* src/cli/config/schema.ts
 * Zod schemas for ctxpack configuration (ctxpack.config.*).
 */
import { z } from 'zod';

// Common coercer for boolean-ish values
const coerceBool = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((v) => {
    if (typeof v === 'boolean') return v;
    if (typeof v === 'number') return v === 1;
    const s = String(v).trim().toLowerCase();
    if (s === '1' || s === 'true') return true;
    if (s === '0' || s === 'false') return false;
    return undefined;
  })
  .optional();

const nonEmpty = (what: string) =>
  z.string().trim().min(1, { message: `${what} must be a non-empty string` });

// Docker --shm-size accepts a byte count with an optional b/k/m/g unit.
const shmSizeSchema = z
  .union([z.string(), z.number()])
  .transform((v) => String(v).trim())
  .refine((s) => /^\d+[bkmg]?$/i.test(s), {
    message: 'shmSize: expected a size such as 500m or 2g',
  });

export const stagingSchema = z.enum(['temp', 'context']);

export const packageSchema = z
  .object({
    exclude: z.array(nonEmpty('exclude entry')).optional(),
    context: nonEmpty('context').optional(),
    archiveName: nonEmpty('archiveName')
      .refine((s) => !/[\\/]/.test(s), {
        message: 'archiveName: must be a file name, not a path',
      })
      .optional(),
    tag: nonEmpty('tag').optional(),
    noCache: coerceBool,
    staging: stagingSchema.optional(),
  })
  .strict()
  .optional();

export const dockerSchema = z
  .object({
    command: nonEmpty('docker.command').optional(),
  })
  .strict()
  .optional();

export const ciMatrixEntrySchema = z
  .object({
    os: z.enum(['linux', 'osx', 'windows']),
    dist: z.string().optional(),
    osxImage: z.string().optional(),
  })
  .strict();

export const ciStepSchema = z
  .object({
    image: nonEmpty('image'),
    command: nonEmpty('command'),
    dockerOnly: coerceBool,
    shmSize: shmSizeSchema.optional(),
  })
  .strict();

export const ciSchema = z
  .object({
    matrix: z.array(ciMatrixEntrySchema).default([]),
    install: z.array(nonEmpty('install command')).default([]),
    steps: z.array(ciStepSchema).default([]),
  })
  .strict();
export type CiConfig = z.infer<typeof ciSchema>;
export type CiStep = z.infer<typeof ciStepSchema>;
export type CiMatrixEntry = z.infer<typeof ciMatrixEntrySchema>;

export const cliDefaultsSchema = z
  .object({
    debug: coerceBool,
    boring: coerceBool,
  })
  .strict()
  .optional();

// Complete config file
export const configSchema = z
  .object({
    package: packageSchema,
    docker: dockerSchema,
    ci: ciSchema.optional(),
    cliDefaults: cliDefaultsSchema,
  })
  .strict();
export type RawConfig = z.infer<typeof configSchema>;
