import { z } from 'zod';

/** Arguments passed to a capability, keyed by parameter name */
export type CapabilityArgs = Record<string, unknown>;

/**
 * Caller context travelling with a request (user identity, locale, request
 * timestamp...). Only the configured cache-relevant keys reach fingerprints.
 */
export type InvocationContext = Record<string, unknown>;

export const ServerDescriptorSchema = z.object({
  name: z.string().min(1),
  capabilities: z.array(z.string().min(1)).min(1),
  fitness: z.record(z.number()).optional(),
  maxConcurrency: z.number().int().positive().optional(),
}).superRefine((descriptor, ctx) => {
  for (const capability of Object.keys(descriptor.fitness ?? {})) {
    if (!descriptor.capabilities.includes(capability)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['fitness', capability],
        message: `fitness given for capability "${capability}" which the server does not offer`,
      });
    }
  }
});

/** Static description supplied when a server is registered */
export type ServerDescriptor = z.infer<typeof ServerDescriptorSchema>;

/**
 * Anything able to execute capabilities. Transports (in-process, simulated,
 * remote) implement this directly.
 */
export interface CapabilityServer {
  readonly descriptor: ServerDescriptor;
  invoke(capability: string, args: CapabilityArgs, context: InvocationContext): Promise<unknown>;
}

export interface ServerState {
  name: string;
  capabilities: string[];
  fitness: Record<string, number>;
  maxConcurrency?: number;
  load: number;
  totalHandled: number;
}

export const DEFAULT_FITNESS = 1.0;
