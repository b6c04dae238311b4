import { describe, expect, test } from 'vitest';
import { spawnRandomBodies } from '../src';
import { createTestWorld } from './helpers';

const sequence = (values: number[]) => {
    let i = 0;
    return () => values[i++ % values.length];
};

describe('spawnRandomBodies', () => {
    test('maps random numbers to positions, velocities and masses', () => {
        const world = createTestWorld();

        const [b] = spawnRandomBodies(world, { count: 1 }, sequence([0.5, 0.75, 0.25, 0.5, 0.5]));

        // (0.75 - 0.5) * 200, (0.25 - 0.5) * 2, 0.5 * 1.5 + 0.5
        expect(b.position).toEqual([0, 50, 0]);
        expect(b.velocity).toEqual([-0.5, 0, 0]);
        expect(b.mass).toBe(1.25);
        expect(b.radius).toBe(10);
        expect(b.externalAcceleration).toEqual([0, 0, 0]);
    });

    test('same random source gives the same scene', () => {
        const values = [0.1, 0.9, 0.3, 0.7, 0.2, 0.6, 0.4];

        const a = spawnRandomBodies(createTestWorld(), { count: 5 }, sequence(values));
        const b = spawnRandomBodies(createTestWorld(), { count: 5 }, sequence(values));

        expect(a.map((x) => [x.position, x.velocity, x.mass])).toEqual(b.map((x) => [x.position, x.velocity, x.mass]));
    });

    test('defaults spawn 100 bodies inside the universe box', () => {
        const world = createTestWorld();

        const bodies = spawnRandomBodies(world);

        expect(bodies.length).toBe(100);
        expect(world.bodies.list.length).toBe(100);

        for (const b of bodies) {
            expect(Math.abs(b.position[0])).toBeLessThanOrEqual(100);
            expect(Math.abs(b.position[1])).toBeLessThanOrEqual(100);
            expect(Math.abs(b.velocity[0])).toBeLessThanOrEqual(1);
            expect(Math.abs(b.velocity[1])).toBeLessThanOrEqual(1);
            expect(b.mass).toBeGreaterThanOrEqual(0.5);
            expect(b.mass).toBeLessThan(2);
        }
    });
});
