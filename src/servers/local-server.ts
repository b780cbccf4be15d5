import type { CapabilityArgs, CapabilityServer, InvocationContext, ServerDescriptor } from '../registry/types.js';

export type CapabilityHandler = (args: CapabilityArgs, context: InvocationContext) => unknown;

export interface LocalServerOptions {
  name: string;
  handlers: Record<string, CapabilityHandler>;
  fitness?: Record<string, number>;
  maxConcurrency?: number;
}

/**
 * In-process capability server: each capability is a plain function.
 */
export class LocalCapabilityServer implements CapabilityServer {
  readonly descriptor: ServerDescriptor;
  private handlers: Map<string, CapabilityHandler>;

  constructor(options: LocalServerOptions) {
    this.handlers = new Map(Object.entries(options.handlers));
    this.descriptor = {
      name: options.name,
      capabilities: [...this.handlers.keys()],
      fitness: options.fitness,
      maxConcurrency: options.maxConcurrency,
    };
  }

  async invoke(capability: string, args: CapabilityArgs, context: InvocationContext): Promise<unknown> {
    const handler = this.handlers.get(capability);
    if (!handler) {
      throw new Error(`Server "${this.descriptor.name}" does not offer capability "${capability}"`);
    }
    return await handler(args, context);
  }
}
