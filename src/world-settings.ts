import type { Vec3 } from 'mathcat';
import { assert, assertFiniteVec3 } from './utils/assert';

export type WorldSettings = {
    /**
     * Gravity vector. Note that it is scaled by each body's mass before being added
     * to the body's acceleration, so heavier bodies fall faster.
     * Unit: m/s² (per unit of mass)
     * @default [0,-9.81,0]
     */
    gravity: Vec3;

    /**
     * Enable/disable gravity globally.
     * @default true
     */
    gravityEnabled: boolean;

    /**
     * Linear drag coefficient, the friction acceleration is -friction * velocity.
     * Unit: 1/s
     * @default 0.5
     */
    friction: number;

    /**
     * Enable/disable friction globally.
     * @default true
     */
    frictionEnabled: boolean;

    /**
     * Enable/disable the pairwise inverse-square attraction between bodies.
     * @default true
     */
    attractionEnabled: boolean;

    /**
     * Enable/disable the body vs body collision pass.
     * @default true
     */
    collisionsEnabled: boolean;

    /** Unit conversion */
    units: {
        /**
         * Ratio of render units to world units, render translation = position * scale.
         * Also divides distances in the attraction pass.
         * @default 2
         */
        scale: number;
    };

    /**
     * Box centred on the origin outside of which bodies are despawned.
     * Unit: render units
     */
    universe: {
        /** @default 200 */
        width: number;
        /** @default 200 */
        height: number;
    };

    /**
     * Box centred on the origin that bodies bounce off.
     * Unit: render units
     */
    window: {
        /** @default 800 */
        width: number;
        /** @default 400 */
        height: number;
    };

    /** Rest detection options */
    rest: {
        /**
         * Bodies slower than this, close to the floor, become fixed.
         * Unit: m/s
         * @default 1.0
         */
        velocityThreshold: number;

        /**
         * How far above the floor (the bottom window edge) a body may be and still come to rest.
         * @default 1.0
         */
        floorEpsilon: number;
    };
};

export const createWorldSettings = (): WorldSettings => {
    return {
        gravity: [0, -9.81, 0],
        gravityEnabled: true,
        friction: 0.5,
        frictionEnabled: true,
        attractionEnabled: true,
        collisionsEnabled: true,
        units: {
            scale: 2,
        },
        universe: {
            width: 200,
            height: 200,
        },
        window: {
            width: 800,
            height: 400,
        },
        rest: {
            velocityThreshold: 1.0,
            floorEpsilon: 1.0,
        },
    };
};

const assertPositive = (value: number, name: string): void => {
    assert(Number.isFinite(value) && value > 0, `${name} must be a positive finite number, got ${value}`);
};

const assertNonNegative = (value: number, name: string): void => {
    assert(Number.isFinite(value) && value >= 0, `${name} must be a non-negative finite number, got ${value}`);
};

/** throws if any setting is out of range */
export function validateWorldSettings(settings: WorldSettings): void {
    assertFiniteVec3(settings.gravity, 'gravity');
    assertNonNegative(settings.friction, 'friction');
    assertPositive(settings.units.scale, 'units.scale');
    assertPositive(settings.universe.width, 'universe.width');
    assertPositive(settings.universe.height, 'universe.height');
    assertPositive(settings.window.width, 'window.width');
    assertPositive(settings.window.height, 'window.height');
    assertNonNegative(settings.rest.velocityThreshold, 'rest.velocityThreshold');
    assertNonNegative(settings.rest.floorEpsilon, 'rest.floorEpsilon');
}

/** y coordinate of the floor used for rest detection (the bottom window edge) */
export function getFloorY(settings: WorldSettings): number {
    return -settings.window.height / 2;
}
