import { type Vec3, vec3 } from 'mathcat';
import type { Body } from './body/body';
import * as snapshot from './body/snapshot';
import { getFloorY, type WorldSettings } from './world-settings';

/**
 * Rest detection. A slow body touching the floor becomes fixed and its velocity is zeroed.
 * @returns true if the body became fixed, in which case it must not be updated further this tick
 */
export function detectRest(body: Body, settings: WorldSettings): boolean {
    if (vec3.length(body.velocity) >= settings.rest.velocityThreshold) {
        return false;
    }

    // position and floor are compared as-is, without converting between world and render units
    if (body.position[1] - body.radius / 2 >= getFloorY(settings) + settings.rest.floorEpsilon) {
        return false;
    }

    body.fixed = true;
    vec3.zero(body.velocity);

    return true;
}

const _attraction_normal = /* @__PURE__ */ vec3.create();

/**
 * Accumulates the pairwise inverse-square attraction of every other snapshot body into `out`.
 * Pairs at exactly the same position are skipped. Very small separations are not clamped and can
 * produce very large accelerations.
 */
export function accumulateAttraction(out: Vec3, body: Body, bodies: snapshot.Snapshot, settings: WorldSettings): Vec3 {
    const scale = settings.units.scale;
    const normal = _attraction_normal;

    for (let i = 0; i < bodies.count; i++) {
        const other = snapshot.at(bodies, i);

        if (other.id === body.id) continue;
        if (snapshot.samePosition(body.position, other.position)) continue;

        const distance = vec3.distance(body.position, other.position) / scale;

        // unit vector from body towards other
        vec3.subtract(normal, other.position, body.position);
        vec3.normalize(normal, normal);

        // the force already contains body.mass, dividing it out again is intended
        const force = (body.mass * other.mass) / (distance * distance);
        vec3.scaleAndAdd(out, out, normal, force / body.mass);
    }

    return out;
}

/**
 * Computes the acceleration of a body for this tick:
 * external acceleration + attraction + mass-scaled gravity + linear friction.
 * Attraction is accumulated before gravity and friction.
 * @param out output vector
 * @param body the body, in its tick-start state
 * @param bodies tick-start snapshot of all bodies
 * @param settings world settings
 * @returns out parameter
 */
export function computeAcceleration(out: Vec3, body: Body, bodies: snapshot.Snapshot, settings: WorldSettings): Vec3 {
    vec3.copy(out, body.externalAcceleration);

    if (settings.attractionEnabled) {
        accumulateAttraction(out, body, bodies, settings);
    }

    // weight: gravity scaled by mass, added directly to the acceleration
    if (settings.gravityEnabled) {
        vec3.scaleAndAdd(out, out, settings.gravity, body.mass);
    }

    // friction: a += -friction * v
    if (settings.frictionEnabled) {
        vec3.scaleAndAdd(out, out, body.velocity, -settings.friction);
    }

    return out;
}

/** semi-implicit euler step: v += a * dt, then p += v * dt */
export function integrate(body: Body, acceleration: Vec3, timeStep: number): void {
    vec3.scaleAndAdd(body.velocity, body.velocity, acceleration, timeStep);
    vec3.scaleAndAdd(body.position, body.position, body.velocity, timeStep);
}
