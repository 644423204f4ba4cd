import { describe, it, expect } from 'vitest';
import { Pipeline } from '../../src/domain/Pipeline.js';
import { Stage } from '../../src/domain/Stage.js';
import { ExecutionMethod } from '../../src/domain/ExecutionMethod.js';
import { ComponentCategory } from '../../src/domain/ComponentCategory.js';
import { createComponent } from '../../src/domain/PipelineComponent.js';
import { InvalidArgumentError } from '../../src/errors.js';

describe('Pipeline', () => {
    describe('basic properties', () => {
        it('should create with direction and name', () => {
            const pipeline = new Pipeline('receive', 'OrdersIn');
            expect(pipeline.direction).toBe('receive');
            expect(pipeline.name).toBe('OrdersIn');
            expect(pipeline.isReceive).toBe(true);
        });

        it('should leave name undefined when omitted', () => {
            const pipeline = new Pipeline('send');
            expect(pipeline.name).toBeUndefined();
            expect(pipeline.isReceive).toBe(false);
        });

        it('should start with no stages', () => {
            expect(new Pipeline('receive').stages).toHaveLength(0);
        });
    });

    describe('stages', () => {
        it('should keep stages in insertion order', () => {
            const pipeline = new Pipeline('receive');
            const decode = new Stage('Decode', ExecutionMethod.ALL, 'decode', pipeline);
            const validate = new Stage('Validate', ExecutionMethod.ALL, 'validate', pipeline);
            pipeline.addStage(decode);
            pipeline.addStage(validate);
            expect(pipeline.stages).toEqual([decode, validate]);
        });

        it('should find a stage by id', () => {
            const pipeline = new Pipeline('receive');
            const decode = new Stage('Decode', ExecutionMethod.ALL, 'decode', pipeline);
            pipeline.addStage(decode);
            expect(pipeline.findStage('decode')).toBe(decode);
        });

        it('should return undefined for an unknown id', () => {
            expect(new Pipeline('receive').findStage('missing')).toBeUndefined();
        });

        it('should reject a duplicate stage id', () => {
            const pipeline = new Pipeline('receive');
            pipeline.addStage(new Stage('Decode', ExecutionMethod.ALL, 'decode', pipeline));
            const duplicate = new Stage('Decode again', ExecutionMethod.ALL, 'decode', pipeline);

            expect(() => pipeline.addStage(duplicate)).toThrow(InvalidArgumentError);
            expect(pipeline.stages).toHaveLength(1);
        });

        it('should reject a stage owned by another pipeline', () => {
            const pipeline = new Pipeline('receive');
            const other = new Pipeline('receive');
            const foreign = new Stage('Decode', ExecutionMethod.ALL, 'decode', other);

            expect(() => pipeline.addStage(foreign)).toThrow(/belongs to another pipeline/);
        });
    });
});

describe('Stage', () => {
    it('should carry its constructor arguments', () => {
        const pipeline = new Pipeline('receive');
        const stage = new Stage('Disassemble', ExecutionMethod.FIRST_MATCH, 'dasm', pipeline);
        expect(stage.name).toBe('Disassemble');
        expect(stage.executionMethod).toBe(ExecutionMethod.FIRST_MATCH);
        expect(stage.id).toBe('dasm');
        expect(stage.pipeline).toBe(pipeline);
    });

    it('should keep components in the order they were added', () => {
        const stage = new Stage('Decode', ExecutionMethod.ALL, 'decode', new Pipeline('receive'));
        const first = createComponent({ name: 'first' });
        const second = createComponent({ name: 'second' });
        stage.addComponent(first);
        stage.addComponent(second);
        expect(stage.components).toEqual([first, second]);
    });

    it('should allow the same component twice', () => {
        const stage = new Stage('Decode', ExecutionMethod.ALL, 'decode', new Pipeline('receive'));
        const component = createComponent({ name: 'twice' });
        stage.addComponent(component);
        stage.addComponent(component);
        expect(stage.components).toHaveLength(2);
    });

    it('should be iterable', () => {
        const stage = new Stage('Decode', ExecutionMethod.ALL, 'decode', new Pipeline('receive'));
        stage.addComponent(createComponent({ name: 'a' }));
        stage.addComponent(createComponent({ name: 'b' }));
        expect([...stage].map(c => c.name)).toEqual(['a', 'b']);
    });
});

describe('createComponent', () => {
    it('should default the category to ANY', () => {
        const component = createComponent({ name: 'MimeDecoder' });
        expect(component).toEqual({ name: 'MimeDecoder', category: ComponentCategory.ANY });
    });

    it('should keep an explicit category', () => {
        const component = createComponent({
            name: 'XmlDisassembler',
            version: '2.1',
            category: ComponentCategory.DISASSEMBLER,
        });
        expect(component.category).toBe(ComponentCategory.DISASSEMBLER);
        expect(component.version).toBe('2.1');
    });

    it('should return distinct objects for identical props', () => {
        expect(createComponent({ name: 'x' })).not.toBe(createComponent({ name: 'x' }));
    });
});
