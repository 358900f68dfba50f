// CapabilityRegistry: binds capability descriptors to their implementations

import type { CapabilityDescriptor, Logger } from "./types";
import { DuplicateCapabilityError, UnknownCapabilityError } from "./types";
import { defineCapability, type CapabilityArgs } from "./capability";

export interface CapabilityContext {
  readonly logger: Logger;
  readonly signal?: AbortSignal;
}

export type CapabilityHandler = (args: CapabilityArgs, context: CapabilityContext) => Promise<unknown>;

export interface RegisteredCapability {
  readonly descriptor: CapabilityDescriptor;
  readonly handler: CapabilityHandler;
}

export class CapabilityRegistry {
  private readonly entries = new Map<string, RegisteredCapability>();

  /**
   * Register a capability with its descriptor and handler function.
   * The descriptor is validated and frozen before it is stored.
   */
  register(descriptor: CapabilityDescriptor, handler: CapabilityHandler): void {
    if (this.entries.has(descriptor.name)) {
      throw new DuplicateCapabilityError(descriptor.name);
    }
    this.entries.set(descriptor.name, { descriptor: defineCapability(descriptor), handler });
  }

  /** Descriptors in registration order, exactly as offered to the model. */
  catalog(): CapabilityDescriptor[] {
    return Array.from(this.entries.values(), (entry) => entry.descriptor);
  }

  /**
   * Look up a capability by name. A miss means the model asked for something
   * it was never offered.
   */
  resolve(name: string): RegisteredCapability {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new UnknownCapabilityError(name, Array.from(this.entries.keys()));
    }
    return entry;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get size(): number {
    return this.entries.size;
  }
}
