import * as body from './body/body';
import type { Body } from './body/body';
import type { World } from './world';

/** options for spawnRandomBodies */
export type RandomSceneOptions = {
    /** number of bodies @see DEFAULT_RANDOM_SCENE_OPTIONS */
    count?: number;
    /** velocity components are drawn from (-maxSpeed, maxSpeed) @see DEFAULT_RANDOM_SCENE_OPTIONS */
    maxSpeed?: number;
    /** smallest mass @see DEFAULT_RANDOM_SCENE_OPTIONS */
    minMass?: number;
    /** masses are drawn from [minMass, minMass + massRange) @see DEFAULT_RANDOM_SCENE_OPTIONS */
    massRange?: number;
    /** radius of every body @see DEFAULT_RANDOM_SCENE_OPTIONS */
    radius?: number;
};

export const DEFAULT_RANDOM_SCENE_OPTIONS = {
    count: 100,
    maxSpeed: 1,
    minMass: 0.5,
    massRange: 1.5,
    radius: 10,
};

/**
 * Spawns bodies at random positions inside the universe box, with small random velocities and masses.
 * Pass a seeded `random` to get the same scene every time.
 * @param world the world to spawn into
 * @param options scene options
 * @param random source of numbers in [0, 1)
 * @returns the spawned bodies
 */
export function spawnRandomBodies(world: World, options: RandomSceneOptions = {}, random: () => number = Math.random): Body[] {
    const count = options.count ?? DEFAULT_RANDOM_SCENE_OPTIONS.count;
    const maxSpeed = options.maxSpeed ?? DEFAULT_RANDOM_SCENE_OPTIONS.maxSpeed;
    const minMass = options.minMass ?? DEFAULT_RANDOM_SCENE_OPTIONS.minMass;
    const massRange = options.massRange ?? DEFAULT_RANDOM_SCENE_OPTIONS.massRange;
    const radius = options.radius ?? DEFAULT_RANDOM_SCENE_OPTIONS.radius;

    const { width, height } = world.settings.universe;

    const spawned: Body[] = [];

    for (let i = 0; i < count; i++) {
        const x = (random() - 0.5) * width;
        const y = (random() - 0.5) * height;
        const vx = (random() - 0.5) * 2 * maxSpeed;
        const vy = (random() - 0.5) * 2 * maxSpeed;
        const mass = random() * massRange + minMass;

        spawned.push(
            body.create(world, {
                position: [x, y, 0],
                velocity: [vx, vy, 0],
                mass,
                radius,
            }),
        );
    }

    return spawned;
}
