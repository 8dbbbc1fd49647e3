import { hostname } from 'os';
import { z } from 'zod';
import { defineTask } from '@taskrun/core';

export const HelloParamsSchema = z.object({
  user: z.string().min(1),
});

export const HelloMetadataSchema = z.object({
  hostname: z.string().optional(), // Defaults to the local host name
});

export type HelloParams = z.infer<typeof HelloParamsSchema>;
export type HelloMetadata = z.infer<typeof HelloMetadataSchema>;

/**
 * Greets `user` from the host the task runs on
 */
export const Hello = defineTask<HelloParams, HelloMetadata>({
  path: 'examples.Hello',
  requiredParams: ['user'],
  paramsSchema: HelloParamsSchema,
  metadataSchema: HelloMetadataSchema,
  run: (result, { params, metadata }) => ({
    ...result,
    stdout: `Hello ${params.user} from ${metadata?.hostname ?? hostname()}`,
  }),
});
