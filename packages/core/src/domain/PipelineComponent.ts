import { ComponentCategory } from './ComponentCategory.js';

/**
 * An opaque unit of processing logic attached to a {@link Stage}.
 *
 * The harness only stores and enumerates components; it never calls
 * into them. Any object satisfying this shape can be attached, so real
 * component implementations can be passed through unchanged.
 *
 * @example
 * ```typescript
 * import { createComponent, ComponentCategory } from '@pipeline-harness/core';
 *
 * const decoder = createComponent({
 *     name: 'MimeDecoder',
 *     version: '1.0',
 *     category: ComponentCategory.DECODER,
 * });
 * ```
 *
 * @see {@link createComponent} for the factory function
 */
export interface PipelineComponent {
    /** Display name of the component */
    readonly name: string;
    /** Component version string */
    readonly version?: string;
    /** What the component does */
    readonly description?: string;
    /** Capability tag */
    readonly category?: ComponentCategory;
}

/**
 * Create a PipelineComponent from partial properties.
 *
 * `category` defaults to {@link ComponentCategory.ANY}. Each call
 * returns a new object, so two components with the same name are
 * still distinct by reference.
 *
 * @example
 * ```typescript
 * const validator = createComponent({ name: 'XmlValidator' });
 * validator.category; // ComponentCategory.ANY
 * ```
 */
export function createComponent(props: PipelineComponent): PipelineComponent {
    return { category: ComponentCategory.ANY, ...props };
}
