import { describe, expect, test } from 'vitest';
import { body, ControllerStatus, controller } from '../src';
import { createTestWorld, disableForces } from './helpers';

describe('SimulationController', () => {
    test('starts running by default', () => {
        const c = controller.create();

        expect(c.state).toEqual({ status: ControllerStatus.RUNNING });
        expect(c.maxTimeStep).toBe(1 / 30);
        expect(controller.shouldStep(c)).toBe(true);
        expect(controller.shouldStep(c)).toBe(true);
    });

    test('can start paused', () => {
        const c = controller.create({ paused: true });

        expect(controller.isPaused(c)).toBe(true);
        expect(controller.shouldStep(c)).toBe(false);
    });

    test('rejects a non-positive max time step', () => {
        expect(() => controller.create({ maxTimeStep: 0 })).toThrow('maxTimeStep must be > 0, got 0');
    });

    test('pause, resume and toggle', () => {
        const c = controller.create();

        controller.pause(c);
        expect(controller.shouldStep(c)).toBe(false);

        controller.resume(c);
        expect(controller.shouldStep(c)).toBe(true);

        controller.toggle(c);
        expect(controller.isPaused(c)).toBe(true);

        controller.toggle(c);
        expect(c.state.status).toBe(ControllerStatus.RUNNING);
    });

    test('step forward runs the given number of frames, then pauses', () => {
        const c = controller.create({ paused: true });

        controller.stepForward(c, 2);
        expect(c.state).toEqual({ status: ControllerStatus.STEPPING_FORWARD, framesRemaining: 2 });

        expect(controller.shouldStep(c)).toBe(true);
        expect(c.state).toEqual({ status: ControllerStatus.STEPPING_FORWARD, framesRemaining: 1 });

        expect(controller.shouldStep(c)).toBe(true);
        expect(controller.isPaused(c)).toBe(true);

        expect(controller.shouldStep(c)).toBe(false);
    });

    test('step forward while stepping adds frames', () => {
        const c = controller.create({ paused: true });

        controller.stepForward(c);
        controller.stepForward(c, 3);

        expect(c.state).toEqual({ status: ControllerStatus.STEPPING_FORWARD, framesRemaining: 4 });
    });

    test('step forward rejects non-positive frame counts', () => {
        const c = controller.create();

        expect(() => controller.stepForward(c, 0)).toThrow('frames must be a positive integer, got 0');
        expect(() => controller.stepForward(c, 1.5)).toThrow('frames must be a positive integer');
    });

    test('toggle while stepping resumes', () => {
        const c = controller.create({ paused: true });
        controller.stepForward(c, 5);

        controller.toggle(c);

        expect(c.state).toEqual({ status: ControllerStatus.RUNNING });
    });

    test('advance updates the world only when allowed', () => {
        const world = createTestWorld(disableForces);
        const b = body.create(world, { velocity: [3, 0, 0] });
        const c = controller.create({ paused: true });

        expect(controller.advance(c, world, undefined, 1 / 60)).toEqual([]);
        expect(world.stats.ticks).toBe(0);
        expect(b.position[0]).toBe(0);

        controller.stepForward(c);
        controller.advance(c, world, undefined, 0.02);

        expect(world.stats.ticks).toBe(1);
        expect(b.position[0]).toBeCloseTo(3 * 0.02, 10);

        // paused again after the single frame
        controller.advance(c, world, undefined, 0.02);
        expect(world.stats.ticks).toBe(1);
    });

    test('advance clamps long frames', () => {
        const world = createTestWorld(disableForces);
        const b = body.create(world, { velocity: [3, 0, 0] });
        const c = controller.create();

        controller.advance(c, world, undefined, 1);

        expect(b.position[0]).toBeCloseTo(3 / 30, 10);
    });

    test('advance returns despawned body ids', () => {
        const world = createTestWorld();
        const b = body.create(world, { position: [60, 0, 0] });
        const c = controller.create();

        expect(controller.advance(c, world, undefined, 1 / 60)).toEqual([b.id]);
    });
});
