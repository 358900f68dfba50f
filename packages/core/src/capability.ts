// Capability descriptors: validation, wire schema, and argument parsing

import { z } from "zod";
import type { CapabilityDescriptor, ParameterType } from "./types";
import { ArgumentShapeError, InvalidDescriptorError } from "./types";

/**
 * Validate a descriptor and return a frozen copy.
 * Throws InvalidDescriptorError when `required` names a parameter that
 * is not declared, lists one twice, or the name is blank.
 */
export function defineCapability(descriptor: CapabilityDescriptor): CapabilityDescriptor {
  if (!descriptor.name.trim()) {
    throw new InvalidDescriptorError("Capability name must not be empty");
  }

  const seen = new Set<string>();
  for (const param of descriptor.required) {
    if (!Object.hasOwn(descriptor.parameters, param)) {
      throw new InvalidDescriptorError(
        `Capability "${descriptor.name}" requires undeclared parameter "${param}"`,
      );
    }
    if (seen.has(param)) {
      throw new InvalidDescriptorError(
        `Capability "${descriptor.name}" lists required parameter "${param}" twice`,
      );
    }
    seen.add(param);
  }

  return Object.freeze({
    name: descriptor.name,
    description: descriptor.description,
    parameters: Object.freeze({ ...descriptor.parameters }),
    required: Object.freeze([...descriptor.required]),
  });
}

/** JSON Schema object for the descriptor's parameters, as the model expects it. */
export function toJsonSchema(descriptor: CapabilityDescriptor): Record<string, unknown> {
  const properties: Record<string, { type: ParameterType; description: string }> = {};
  for (const [name, spec] of Object.entries(descriptor.parameters)) {
    properties[name] = { type: spec.type, description: spec.description };
  }
  return { type: "object", properties, required: [...descriptor.required] };
}

function valueSchema(type: ParameterType): z.ZodTypeAny {
  switch (type) {
    case "string":
      return z.string();
    case "number":
      return z.number();
    case "integer":
      return z.number().int();
    case "boolean":
      return z.boolean();
    case "array":
      return z.array(z.unknown());
    case "object":
      return z.record(z.unknown());
  }
}

/** Build the zod schema matching a descriptor. Undeclared keys pass through untouched. */
export function argumentSchema(descriptor: CapabilityDescriptor) {
  const required = new Set(descriptor.required);
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [name, spec] of Object.entries(descriptor.parameters)) {
    const schema = valueSchema(spec.type);
    shape[name] = required.has(name) ? schema : schema.optional();
  }
  return z.object(shape).passthrough();
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    if (!path) return `arguments: ${issue.message}`;
    if (issue.code === z.ZodIssueCode.invalid_type && issue.received === "undefined") {
      return `missing required parameter "${path}"`;
    }
    return `parameter "${path}": ${issue.message}`;
  });
}

/**
 * Parse a raw payload against the descriptor.
 * Throws ArgumentShapeError listing every mismatch.
 */
export function parseArguments(descriptor: CapabilityDescriptor, payload: unknown): CapabilityArgs {
  const parsed = argumentSchema(descriptor).safeParse(payload);
  if (!parsed.success) {
    throw new ArgumentShapeError(descriptor.name, describeIssues(parsed.error));
  }
  const values: Record<string, unknown> = { ...parsed.data };
  return new CapabilityArgs(descriptor.name, values);
}

/** Validated arguments handed to a capability handler, with typed accessors. */
export class CapabilityArgs {
  constructor(
    readonly capability: string,
    private readonly values: Readonly<Record<string, unknown>>,
  ) {}

  has(name: string): boolean {
    return this.values[name] !== undefined;
  }

  string(name: string): string {
    const value = this.values[name];
    if (typeof value !== "string") throw this.mismatch(name, "string");
    return value;
  }

  number(name: string): number {
    const value = this.values[name];
    if (typeof value !== "number") throw this.mismatch(name, "number");
    return value;
  }

  boolean(name: string): boolean {
    const value = this.values[name];
    if (typeof value !== "boolean") throw this.mismatch(name, "boolean");
    return value;
  }

  /** Raw value of a parameter the model may have left out. */
  optional(name: string): unknown {
    return this.values[name];
  }

  toJSON(): Record<string, unknown> {
    return { ...this.values };
  }

  private mismatch(name: string, expected: string): ArgumentShapeError {
    return new ArgumentShapeError(this.capability, [`parameter "${name}" is not a ${expected}`]);
  }
}
