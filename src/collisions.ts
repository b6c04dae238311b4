import { vec3 } from 'mathcat';
import type { Body } from './body/body';
import * as snapshot from './body/snapshot';
import type { Listener } from './listener';

const _collision_normal = /* @__PURE__ */ vec3.create();
const _collision_relativeVelocity = /* @__PURE__ */ vec3.create();

/**
 * Resolves overlaps between a body and every other snapshot body.
 *
 * Only `body` is changed: its velocity receives an elastic impulse along the contact normal and it is
 * pushed back by half the penetration depth. The other body of each pair gets the mirrored correction when
 * the integrator visits it, using the same snapshot, so the exchange is only approximately symmetric.
 *
 * @param body the body to resolve, after its position has been integrated this tick
 * @param bodies tick-start snapshot of all bodies
 * @param listener optional listener, notified of every resolved overlap
 * @returns the number of overlaps resolved
 */
export function resolveCollisions(body: Body, bodies: snapshot.Snapshot, listener: Listener | undefined): number {
    const normal = _collision_normal;
    const relativeVelocity = _collision_relativeVelocity;

    let resolved = 0;

    for (let i = 0; i < bodies.count; i++) {
        const other = snapshot.at(bodies, i);

        if (other.id === body.id) continue;
        if (snapshot.samePosition(body.position, other.position)) continue;

        const distance = vec3.distance(body.position, other.position);
        const minDistance = body.radius + other.radius;

        if (distance >= minDistance) continue;

        // unit vector from body towards other
        vec3.subtract(normal, other.position, body.position);
        vec3.normalize(normal, normal);

        // j = 2 * (rv . n) / (mA + mB)
        vec3.subtract(relativeVelocity, body.velocity, other.velocity);
        const impulse = (2 * vec3.dot(relativeVelocity, normal)) / (body.mass + other.mass);

        // v -= j * mB * n
        vec3.scaleAndAdd(body.velocity, body.velocity, normal, -impulse * other.mass);

        // push out along -n by half the penetration
        vec3.scaleAndAdd(body.position, body.position, normal, -(minDistance - distance) / 2);

        resolved++;

        if (listener?.onBodyCollision) {
            listener.onBodyCollision(body, snapshot.copy(other));
        }
    }

    return resolved;
}
