/**
 * How the host runs the components attached to a stage.
 *
 * @example
 * ```typescript
 * import { ExecutionMethod } from '@pipeline-harness/core';
 *
 * const stage = new Stage('Disassemble', ExecutionMethod.FIRST_MATCH, id, pipeline);
 * ```
 */
export enum ExecutionMethod {
    /** Every component runs, in order */
    ALL = "ALL",
    /** Components are probed in order; the first that recognizes the document runs */
    FIRST_MATCH = "FIRST_MATCH",
    /** The stage is a placeholder and runs nothing */
    NONE = "NONE"
}
