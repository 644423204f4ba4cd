/**
 * Pipeline Harness Core — Root Barrel Export
 *
 * In-memory object model of a stage-based document pipeline.
 *
 * Architecture:
 *   src/
 *   ├── domain/        ← Pipeline, Stage, Component, Stage Descriptors
 *   ├── schema/        ← Schema Records, Root Names, Document Specs
 *   ├── context/       ← Pipeline Context, Transaction Control
 *   ├── observability/ ← Debug Observer
 *   └── errors.ts      ← Error Taxonomy
 */

// ── Domain Models ────────────────────────────────────────
/** @category Domain Models */
export { type PipelineDirection, directionOf } from './domain/PipelineDirection.js';
/** @category Domain Models */
export { ExecutionMethod } from './domain/ExecutionMethod.js';
/** @category Domain Models */
export { ComponentCategory } from './domain/ComponentCategory.js';
/** @category Domain Models */
export { type PipelineComponent, createComponent } from './domain/PipelineComponent.js';
/** @category Domain Models */
export { type StageDescriptor, StageDescriptorSchema, assertStageDescriptor } from './domain/StageDescriptor.js';
/** @category Domain Models */
export { PipelineStages, RECEIVE_STAGES, SEND_STAGES } from './domain/PipelineStages.js';
/** @category Domain Models */
export { type StageView, Stage } from './domain/Stage.js';
/** @category Domain Models */
export { Pipeline } from './domain/Pipeline.js';
/** @category Domain Models */
export {
    type PipelineFactoryOptions,
    createPipeline, createReceivePipeline, createSendPipeline,
} from './PipelineFactory.js';

// ── Schema ───────────────────────────────────────────────
/** @category Schema */
export {
    type SchemaAnnotation, type SchemaType,
    SchemaAnnotationSchema, SchemaTypeSchema,
    defineSchemaType, getSchemaTypeFullName, assertSchemaType,
} from './schema/SchemaType.js';
/** @category Schema */
export {
    type SchemaRoot,
    getSchemaRoot, getSchemaRoots, resolveSchemaRoots,
} from './schema/SchemaRoots.js';
/** @category Schema */
export { type DocumentSpec, type DocSpecLoader, createDocSpecLoader } from './schema/DocumentSpec.js';

// ── Context ──────────────────────────────────────────────
/** @category Context */
export { PipelineContext } from './context/PipelineContext.js';
/** @category Context */
export { TransactionControl, type TransactionStatus } from './context/TransactionControl.js';

// ── Observability ────────────────────────────────────────
/** @category Observability */
export { createDebugObserver } from './observability/DebugObserver.js';
/** @category Observability */
export type {
    DebugEvent, DebugObserverFn,
    StageEvent, ComponentEvent, DocSpecEvent, TransactionEvent, ErrorEvent,
} from './observability/DebugObserver.js';

// ── Errors ───────────────────────────────────────────────
/** @category Errors */
export {
    type PipelineHarnessErrorCode, type DocumentSpecKeyKind,
    PipelineHarnessError, InvalidArgumentError, DirectionMismatchError,
    DocumentSpecNotFoundError, InvalidStateError,
} from './errors.js';
