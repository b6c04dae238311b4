import { describe, expect, test } from 'vitest';
import { Axis, type Body, body, boundary, type Listener, WallSide } from '../src';
import { createTestWorld } from './helpers';

describe('isOutsideUniverse', () => {
    // universe is 200x200 render units, scale 2, radius 10
    test.each<[[number, number, number], boolean]>([
        [[52, 0, 0], false],
        [[53, 0, 0], true],
        [[-53, 0, 0], true],
        [[0, 53, 0], true],
        [[0, -53, 0], true],
        [[-52, -52, 0], false],
    ])('position %j outside: %s', (position, outside) => {
        const world = createTestWorld();
        const b = body.create(world, { position });

        boundary.updateTranslation(b, world.settings);

        expect(boundary.isOutsideUniverse(b, world.settings)).toBe(outside);
    });
});

describe('bounceOffWindow', () => {
    const createBounceWorld = () =>
        createTestWorld((settings) => {
            settings.units.scale = 1;
            settings.universe.width = 2000;
            settings.universe.height = 2000;
        });

    test('body moving left past the left edge bounces', () => {
        const world = createBounceWorld();
        const b = body.create(world, { position: [-398, 0, 0], velocity: [-3, 0.5, 0] });

        expect(boundary.bounceOffWindow(b, world.settings, undefined)).toBe(1);
        expect(b.velocity).toEqual([3, 0.5, 0]);
        // clamped to the edge, offset by half the radius
        expect(b.position).toEqual([-395, 0, 0]);
    });

    test('body moving right is not affected by the left edge', () => {
        const world = createBounceWorld();
        const b = body.create(world, { position: [-398, 0, 0], velocity: [3, 0, 0] });

        expect(boundary.bounceOffWindow(b, world.settings, undefined)).toBe(0);
        expect(b.velocity).toEqual([3, 0, 0]);
        expect(b.position).toEqual([-398, 0, 0]);
    });

    test('right and top edges', () => {
        const world = createBounceWorld();
        const b = body.create(world, { position: [398, 198, 0], velocity: [2, 4, 0] });

        expect(boundary.bounceOffWindow(b, world.settings, undefined)).toBe(2);
        expect(b.velocity).toEqual([-2, -4, 0]);
        expect(b.position).toEqual([395, 195, 0]);
    });

    test('bottom edge', () => {
        const world = createBounceWorld();
        const b = body.create(world, { position: [0, -198, 0], velocity: [0, -2, 0] });

        expect(boundary.bounceOffWindow(b, world.settings, undefined)).toBe(1);
        expect(b.velocity).toEqual([0, 2, 0]);
        expect(b.position).toEqual([0, -195, 0]);
    });

    test('edges are tested against the translation', () => {
        const world = createBounceWorld();
        world.settings.units.scale = 2;
        // translation x = -398, edge at -400
        const b = body.create(world, { position: [-199, 0, 0], velocity: [-1, 0, 0] });
        boundary.updateTranslation(b, world.settings);

        expect(boundary.bounceOffWindow(b, world.settings, undefined)).toBe(1);
        expect(b.velocity[0]).toBe(1);
        expect(b.position[0]).toBe(-395);
    });

    test('listener is told which edge was hit', () => {
        const world = createBounceWorld();
        const b = body.create(world, { position: [-398, -198, 0], velocity: [-1, -1, 0] });

        const bounces: Array<[Body, Axis, WallSide]> = [];
        const listener: Listener = {
            onWallBounce: (bounced, axis, side) => {
                bounces.push([bounced, axis, side]);
            },
        };

        boundary.bounceOffWindow(b, world.settings, listener);

        expect(bounces).toEqual([
            [b, Axis.X, WallSide.MIN],
            [b, Axis.Y, WallSide.MIN],
        ]);
    });
});
