import { vec3 } from 'mathcat';
import * as body from './body/body';
import type { Body } from './body/body';
import type { BodyId } from './body/body-id';
import * as snapshot from './body/snapshot';
import { bounceOffWindow, isOutsideUniverse, updateTranslation } from './boundary';
import { resolveCollisions } from './collisions';
import { computeAcceleration, detectRest, integrate } from './forces';
import type { Listener } from './listener';
import * as stats from './stats';
import { assert } from './utils/assert';
import type { World } from './world';

const _update_acceleration = /* @__PURE__ */ vec3.create();

/**
 * Updates the world with a given time step.
 *
 * A snapshot of every body is taken first, then each body that is not fixed goes through:
 * rest detection, force accumulation and integration, collision resolution (if enabled), and boundary handling.
 * Every read of another body during the update goes through the snapshot, so the result does not depend on
 * the order bodies are visited in.
 *
 * Bodies that leave the universe are removed once all bodies have been updated.
 *
 * @param world the world to update
 * @param listener optional listener for simulation events
 * @param timeStep the time step to advance the world by, in seconds
 * @returns ids of the bodies despawned during this update
 */
export function updateWorld(world: World, listener: Listener | undefined, timeStep: number): BodyId[] {
    assert(Number.isFinite(timeStep) && timeStep >= 0, `time step must be a non-negative finite number, got ${timeStep}`);

    const settings = world.settings;
    const bodies = world.bodies.list;

    /* reset counters */
    stats.reset(world.stats);
    world.stats.ticks++;
    world.stats.bodies = bodies.length;

    /* freeze tick-start state */
    snapshot.take(world.snapshot, bodies);

    const despawned: Body[] = [];

    // listeners may add or remove bodies, visit the bodies that were live at the start of the update
    for (const b of bodies.slice()) {
        if (b.removed) continue;

        if (b.fixed) {
            world.stats.fixed++;
            continue;
        }

        if (detectRest(b, settings)) {
            world.stats.fixed++;
            listener?.onBodyFixed?.(b);
            continue;
        }

        world.stats.free++;

        /* forces and integration */
        const acceleration = computeAcceleration(_update_acceleration, b, world.snapshot, settings);
        integrate(b, acceleration, timeStep);

        /* body vs body collisions */
        if (settings.collisionsEnabled) {
            world.stats.collisions += resolveCollisions(b, world.snapshot, listener);
        }

        /* universe bounds */
        updateTranslation(b, settings);

        if (isOutsideUniverse(b, settings)) {
            despawned.push(b);
            listener?.onBodyDespawned?.(b);
            continue;
        }

        /* window bounds, last */
        world.stats.bounces += bounceOffWindow(b, settings, listener);

        updateTranslation(b, settings);
    }

    /* remove despawned bodies */
    const removed: BodyId[] = [];

    for (const b of despawned) {
        // a listener may have removed it already
        body.remove(world, b);
        removed.push(b.id);
    }

    world.stats.despawned = removed.length;

    return removed;
}
