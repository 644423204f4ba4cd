import { describe, it, expect } from 'vitest';
import { assertStageDescriptor, type StageDescriptor } from '../../src/domain/StageDescriptor.js';
import { PipelineStages, RECEIVE_STAGES, SEND_STAGES } from '../../src/domain/PipelineStages.js';
import { ExecutionMethod } from '../../src/domain/ExecutionMethod.js';
import { InvalidArgumentError } from '../../src/errors.js';

describe('assertStageDescriptor', () => {
    const valid: StageDescriptor = {
        id: 'custom-stage',
        name: 'Custom',
        executionMethod: ExecutionMethod.ALL,
        isReceiveStage: true,
    };

    it('should return the same object for a valid descriptor', () => {
        expect(assertStageDescriptor(valid)).toBe(valid);
    });

    it('should reject null', () => {
        expect(() => assertStageDescriptor(null)).toThrow(InvalidArgumentError);
    });

    it('should reject undefined with the given argument name', () => {
        try {
            assertStageDescriptor(undefined, 'descriptor');
            expect.unreachable();
        } catch (e) {
            expect(e).toBeInstanceOf(InvalidArgumentError);
            if (e instanceof InvalidArgumentError) {
                expect(e.argument).toBe('descriptor');
                expect(e.code).toBe('INVALID_ARGUMENT');
            }
        }
    });

    it('should reject an empty id and report the field', () => {
        expect(() => assertStageDescriptor({ ...valid, id: '' })).toThrow(/'id'/);
    });

    it('should keep the zod error as cause', () => {
        try {
            assertStageDescriptor({ ...valid, name: '' });
            expect.unreachable();
        } catch (e) {
            expect(e).toBeInstanceOf(InvalidArgumentError);
            if (e instanceof Error) {
                expect(e.cause).toBeDefined();
            }
        }
    });
});

describe('PipelineStages', () => {
    it('should list receive stages in template order', () => {
        expect(RECEIVE_STAGES.map(s => s.name)).toEqual(['Decode', 'Disassemble', 'Validate', 'ResolveParty']);
        expect(RECEIVE_STAGES.every(s => s.isReceiveStage)).toBe(true);
    });

    it('should list send stages in template order', () => {
        expect(SEND_STAGES.map(s => s.name)).toEqual(['Pre-Assemble', 'Assemble', 'Encode']);
        expect(SEND_STAGES.every(s => !s.isReceiveStage)).toBe(true);
    });

    it('should run disassemblers first-match', () => {
        expect(PipelineStages.DISASSEMBLE.executionMethod).toBe(ExecutionMethod.FIRST_MATCH);
    });

    it('should use unique ids', () => {
        const ids = [...RECEIVE_STAGES, ...SEND_STAGES].map(s => s.id);
        expect(new Set(ids).size).toBe(ids.length);
    });

    it('should pass descriptor validation', () => {
        for (const stage of [...RECEIVE_STAGES, ...SEND_STAGES]) {
            expect(assertStageDescriptor(stage)).toBe(stage);
        }
    });
});
