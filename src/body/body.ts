import { type Vec3, vec3 } from 'mathcat';
import { assert, assertFiniteVec3 } from '../utils/assert';
import type { World } from '../world';
import type { BodyId } from './body-id';
import { BodyState } from './body-state';

/** settings for creating a new body */
export type BodySettings = {
    /** starting position in world units @default [0,0,0] */
    position?: Vec3;

    /** starting velocity @default [0,0,0] */
    velocity?: Vec3;

    /** constant acceleration added to the body every tick @default [0,0,0] */
    externalAcceleration?: Vec3;

    /** mass, must be > 0 @see DEFAULT_BODY_SETTINGS */
    mass?: number;

    /** radius, must be > 0. used for collisions, boundaries and by hosts for drawing @see DEFAULT_BODY_SETTINGS */
    radius?: number;

    /** an optional user-defined field, defaults to null */
    userData?: unknown;
};

export const DEFAULT_BODY_SETTINGS = {
    mass: 1.0,
    radius: 10.0,
};

/** a circular body in a world */
export type Body = {
    /** unique body identifier */
    id: BodyId;

    /** an optional user-defined field, defaults to null */
    userData: unknown | null;

    /** world-space position, z is always 0 */
    position: Vec3;

    /** linear velocity */
    velocity: Vec3;

    /** caller supplied constant acceleration, distinct from the acceleration computed each tick */
    externalAcceleration: Vec3;

    /** render-space translation (position * scale), refreshed by the integrator */
    translation: Vec3;

    mass: number;

    radius: number;

    /**
     * @readonly whether the body came to rest on the floor.
     * fixed bodies are skipped by the integrator and never become free again.
     */
    fixed: boolean;

    /** @readonly whether the body has been removed from its world */
    removed: boolean;
};

const VEC3_ZERO = vec3.create();

/**
 * Creates a new body and appends it to the world
 * @param world the world
 * @param settings settings for the new body
 * @returns the newly created body
 */
export function create(world: World, settings: BodySettings): Body {
    const mass = settings.mass ?? DEFAULT_BODY_SETTINGS.mass;
    const radius = settings.radius ?? DEFAULT_BODY_SETTINGS.radius;

    assert(Number.isFinite(mass) && mass > 0, `body mass must be > 0, got ${mass}`);
    assert(Number.isFinite(radius) && radius > 0, `body radius must be > 0, got ${radius}`);

    const position = vec3.clone(settings.position ?? VEC3_ZERO);
    const velocity = vec3.clone(settings.velocity ?? VEC3_ZERO);
    const externalAcceleration = vec3.clone(settings.externalAcceleration ?? VEC3_ZERO);

    assertFiniteVec3(position, 'position');
    assertFiniteVec3(velocity, 'velocity');
    assertFiniteVec3(externalAcceleration, 'externalAcceleration');

    // the simulation is planar
    position[2] = 0;
    velocity[2] = 0;
    externalAcceleration[2] = 0;

    const body: Body = {
        id: world.bodies.nextId++,
        userData: settings.userData ?? null,
        position,
        velocity,
        externalAcceleration,
        translation: vec3.create(),
        mass,
        radius,
        fixed: false,
        removed: false,
    };

    vec3.scale(body.translation, body.position, world.settings.units.scale);

    world.bodies.list.push(body);

    return body;
}

/**
 * Removes a body from the world
 * @returns true if the body was removed, false if it was not in the world
 */
export function remove(world: World, body: Body): boolean {
    if (body.removed) {
        return false;
    }

    const index = world.bodies.list.indexOf(body);
    if (index === -1) {
        return false;
    }

    world.bodies.list.splice(index, 1);
    body.removed = true;

    return true;
}

/**
 * Gets a live body by id.
 * Returns undefined if no body with the id exists or it has been removed.
 */
export function get(world: World, bodyId: BodyId): Body | undefined {
    for (const body of world.bodies.list) {
        if (body.id === bodyId) {
            return body;
        }
    }
    return undefined;
}

/** Generator that yields all live bodies in the world, in creation order */
export function* iterate(world: World): Generator<Body> {
    for (const body of world.bodies.list) {
        yield body;
    }
}

/** returns the lifecycle state of a body */
export function getState(body: Body): BodyState {
    if (body.removed) return BodyState.DESPAWNED;
    if (body.fixed) return BodyState.FIXED;
    return BodyState.FREE;
}

/**
 * Sets the body position in world units and refreshes its translation.
 * Has no effect on fixed or removed bodies.
 */
export function setPosition(world: World, body: Body, position: Vec3): void {
    if (body.fixed || body.removed) return;
    assertFiniteVec3(position, 'position');

    vec3.set(body.position, position[0], position[1], 0);
    vec3.scale(body.translation, body.position, world.settings.units.scale);
}

/** Sets the body velocity. Has no effect on fixed or removed bodies. */
export function setVelocity(body: Body, velocity: Vec3): void {
    if (body.fixed || body.removed) return;
    assertFiniteVec3(velocity, 'velocity');

    vec3.set(body.velocity, velocity[0], velocity[1], 0);
}

/** Sets the constant external acceleration of a body. Has no effect on fixed or removed bodies. */
export function setExternalAcceleration(body: Body, acceleration: Vec3): void {
    if (body.fixed || body.removed) return;
    assertFiniteVec3(acceleration, 'externalAcceleration');

    vec3.set(body.externalAcceleration, acceleration[0], acceleration[1], 0);
}
