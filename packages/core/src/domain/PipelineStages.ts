import { ExecutionMethod } from './ExecutionMethod.js';
import { type StageDescriptor } from './StageDescriptor.js';

/**
 * Well-known stage descriptors of the standard receive and send
 * pipeline templates.
 *
 * Ids are the category identifiers the host assigns to each stage, so
 * components added through these descriptors land in the same stage a
 * pipeline definition would have created.
 *
 * @example
 * ```typescript
 * wrapper.addComponent(xmlDasm, PipelineStages.DISASSEMBLE);
 * wrapper.addComponent(validator, PipelineStages.VALIDATE);
 * ```
 */
export const PipelineStages = {
    // ── Receive ──
    DECODE: {
        id: '9d0e4103-4cce-4536-83fa-4a5040674ad6',
        name: 'Decode',
        executionMethod: ExecutionMethod.ALL,
        isReceiveStage: true,
    },
    DISASSEMBLE: {
        id: '9d0e4105-4cce-4536-83fa-4a5040674ad6',
        name: 'Disassemble',
        executionMethod: ExecutionMethod.FIRST_MATCH,
        isReceiveStage: true,
    },
    VALIDATE: {
        id: '9d0e410d-4cce-4536-83fa-4a5040674ad6',
        name: 'Validate',
        executionMethod: ExecutionMethod.ALL,
        isReceiveStage: true,
    },
    RESOLVE_PARTY: {
        id: '9d0e410e-4cce-4536-83fa-4a5040674ad6',
        name: 'ResolveParty',
        executionMethod: ExecutionMethod.ALL,
        isReceiveStage: true,
    },

    // ── Send ──
    PRE_ASSEMBLE: {
        id: '9d0e4101-4cce-4536-83fa-4a5040674ad6',
        name: 'Pre-Assemble',
        executionMethod: ExecutionMethod.ALL,
        isReceiveStage: false,
    },
    ASSEMBLE: {
        id: '9d0e4107-4cce-4536-83fa-4a5040674ad6',
        name: 'Assemble',
        executionMethod: ExecutionMethod.ALL,
        isReceiveStage: false,
    },
    ENCODE: {
        id: '9d0e4108-4cce-4536-83fa-4a5040674ad6',
        name: 'Encode',
        executionMethod: ExecutionMethod.ALL,
        isReceiveStage: false,
    },
} as const satisfies Record<string, StageDescriptor>;

/** Receive-side descriptors in template order. */
export const RECEIVE_STAGES: readonly StageDescriptor[] = [
    PipelineStages.DECODE,
    PipelineStages.DISASSEMBLE,
    PipelineStages.VALIDATE,
    PipelineStages.RESOLVE_PARTY,
];

/** Send-side descriptors in template order. */
export const SEND_STAGES: readonly StageDescriptor[] = [
    PipelineStages.PRE_ASSEMBLE,
    PipelineStages.ASSEMBLE,
    PipelineStages.ENCODE,
];
