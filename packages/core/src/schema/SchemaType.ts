/**
 * SchemaType — Declarative Document Schema Metadata
 *
 * A statically declared record describing a document schema: its type
 * name, the module namespace it lives in, and an optional annotation
 * naming the target namespace and root element. A schema without its
 * own annotation acts as a container whose `nestedTypes` each describe
 * one root.
 *
 * @example
 * ```typescript
 * import { defineSchemaType } from '@pipeline-harness/core';
 *
 * // Single-root schema
 * const Order = defineSchemaType({
 *     name: 'OrderSchema',
 *     namespace: 'Acme.Schemas',
 *     schema: { targetNamespace: 'urn:acme:orders', rootElement: 'Order' },
 * });
 *
 * // Multi-root container
 * const Envelopes = defineSchemaType({
 *     name: 'Envelopes',
 *     namespace: 'Acme.Schemas',
 *     nestedTypes: [
 *         { name: 'Header', schema: { rootElement: 'Header' } },
 *         { name: 'Body', schema: { rootElement: 'Body' } },
 *     ],
 * });
 * ```
 *
 * @module
 */
import { z } from 'zod';
import { InvalidArgumentError } from '../errors.js';

/** Target namespace and root element of one schema root. */
export interface SchemaAnnotation {
    /** XML target namespace; empty or absent for no-namespace schemas */
    readonly targetNamespace?: string;
    readonly rootElement: string;
}

export interface SchemaType {
    /** Simple type name, e.g. `OrderSchema` */
    readonly name: string;
    /** Module namespace the type is declared in, e.g. `Acme.Schemas` */
    readonly namespace?: string;
    /** Root annotation; absent on container types */
    readonly schema?: SchemaAnnotation;
    /** Root definitions of a container type */
    readonly nestedTypes?: readonly SchemaType[];
}

export const SchemaAnnotationSchema = z.object({
    targetNamespace: z.string().optional(),
    rootElement: z.string().min(1),
});

const NestedSchemaTypeSchema = z.object({
    name: z.string().min(1),
    namespace: z.string().optional(),
    schema: SchemaAnnotationSchema.optional(),
});

/**
 * Checks a record and its direct nested types only. Root discovery
 * never reads deeper, so deeper levels (including cycles) are ignored.
 */
export const SchemaTypeSchema = NestedSchemaTypeSchema.extend({
    nestedTypes: z.array(NestedSchemaTypeSchema).optional(),
});

/** Identity helper that gives literal schema records their type. */
export function defineSchemaType(type: SchemaType): SchemaType {
    return type;
}

/**
 * Returns the namespace-qualified type name, or the simple name when
 * the type has no namespace.
 *
 * @example
 * ```typescript
 * getSchemaTypeFullName({ name: 'OrderSchema', namespace: 'Acme.Schemas' });
 * // "Acme.Schemas.OrderSchema"
 * ```
 */
export function getSchemaTypeFullName(type: SchemaType): string {
    return type.namespace ? `${type.namespace}.${type.name}` : type.name;
}

/**
 * Validate a schema record, throwing {@link InvalidArgumentError} when
 * it is absent or malformed. Returns the caller's own object.
 */
export function assertSchemaType(
    type: SchemaType | null | undefined,
    argument = 'schemaType',
): SchemaType {
    if (type === null || type === undefined) {
        throw new InvalidArgumentError(argument, 'a schema type is required');
    }
    const result = SchemaTypeSchema.safeParse(type);
    if (!result.success) {
        throw new InvalidArgumentError(argument, `malformed schema type "${type.name}"`, result.error);
    }
    return type;
}
