import { type SchemaType } from './SchemaType.js';

/** A schema type paired with the root name it describes. */
export interface SchemaRoot {
    readonly type: SchemaType;
    readonly rootName: string;
}

/**
 * Returns the root name of an annotated schema type:
 * `targetNamespace#rootElement`, or the bare `rootElement` when the
 * target namespace is empty. Returns `undefined` for container types.
 *
 * @example
 * ```typescript
 * getSchemaRoot({ name: 'Order', schema: { targetNamespace: 'urn:x', rootElement: 'Order' } });
 * // "urn:x#Order"
 * getSchemaRoot({ name: 'Ping', schema: { rootElement: 'Ping' } });
 * // "Ping"
 * ```
 */
export function getSchemaRoot(type: SchemaType): string | undefined {
    const annotation = type.schema;
    if (annotation === undefined) return undefined;
    if (!annotation.targetNamespace) return annotation.rootElement;
    return `${annotation.targetNamespace}#${annotation.rootElement}`;
}

/**
 * Resolves every root a schema type represents.
 *
 * An annotated type is its own single root. Otherwise the nested types
 * that carry an annotation are returned in declaration order; nested
 * types are not searched any deeper, and a container with no annotated
 * nested type yields an empty list.
 */
export function resolveSchemaRoots(type: SchemaType): SchemaRoot[] {
    const own = getSchemaRoot(type);
    if (own !== undefined) return [{ type, rootName: own }];

    const roots: SchemaRoot[] = [];
    for (const nested of type.nestedTypes ?? []) {
        const rootName = getSchemaRoot(nested);
        if (rootName !== undefined) roots.push({ type: nested, rootName });
    }
    return roots;
}

/** The types of {@link resolveSchemaRoots}, without their root names. */
export function getSchemaRoots(type: SchemaType): SchemaType[] {
    return resolveSchemaRoots(type).map(root => root.type);
}
