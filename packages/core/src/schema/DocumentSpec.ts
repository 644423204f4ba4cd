/**
 * DocumentSpec — Loaded Schema Metadata
 *
 * The object a {@link PipelineContext} hands to disassembler and
 * assembler components when they resolve a document type by name or
 * by root. A {@link DocSpecLoader} turns a {@link SchemaType} record
 * into one.
 *
 * @module
 */
import { type SchemaType, getSchemaTypeFullName } from './SchemaType.js';
import { getSchemaRoot } from './SchemaRoots.js';
import { InvalidArgumentError } from '../errors.js';

export interface DocumentSpec {
    /** Root name, `namespace#rootElement` or `rootElement` */
    readonly docType: string;
    /** Namespace-qualified type name of the schema */
    readonly docSpecName: string;
    /** Empty string for no-namespace schemas */
    readonly targetNamespace: string;
    readonly rootElement: string;
    /** The record this document spec was loaded from */
    readonly schemaType: SchemaType;
}

/**
 * Turns a schema record into a {@link DocumentSpec}.
 *
 * Swap in a custom loader through the wrapper options to return
 * compiled schema objects or test doubles instead.
 */
export interface DocSpecLoader {
    loadDocSpec(type: SchemaType): DocumentSpec;
}

/**
 * Create the default loader, which builds a spec straight from the
 * type's annotation. Every call to `loadDocSpec` returns a new object.
 *
 * @example
 * ```typescript
 * const loader = createDocSpecLoader();
 * const spec = loader.loadDocSpec(OrderSchema);
 * spec.docType; // "urn:acme:orders#Order"
 * ```
 */
export function createDocSpecLoader(): DocSpecLoader {
    return {
        loadDocSpec(type: SchemaType): DocumentSpec {
            const docType = getSchemaRoot(type);
            if (docType === undefined || type.schema === undefined) {
                throw new InvalidArgumentError('type', `schema type "${type.name}" has no root annotation`);
            }
            return {
                docType,
                docSpecName: getSchemaTypeFullName(type),
                targetNamespace: type.schema.targetNamespace ?? '',
                rootElement: type.schema.rootElement,
                schemaType: type,
            };
        },
    };
}
