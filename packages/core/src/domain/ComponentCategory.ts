/**
 * Capability tags a pipeline component can advertise.
 *
 * Used in {@link PipelineComponent} to describe which stages a
 * component is meant for. The harness never inspects the tag; it is
 * carried for test assertions.
 *
 * @example
 * ```typescript
 * import { ComponentCategory, createComponent } from '@pipeline-harness/core';
 *
 * const xmlDasm = createComponent({
 *     name: 'XmlDisassembler',
 *     category: ComponentCategory.DISASSEMBLER,
 * });
 * ```
 */
export enum ComponentCategory {
    DECODER = "DECODER",
    DISASSEMBLER = "DISASSEMBLER",
    VALIDATOR = "VALIDATOR",
    PARTY_RESOLVER = "PARTY_RESOLVER",
    ASSEMBLER = "ASSEMBLER",
    ENCODER = "ENCODER",
    /** Usable in any stage */
    ANY = "ANY"
}
