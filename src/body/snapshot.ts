import { type Vec3, vec3 } from 'mathcat';
import type { Body } from './body';
import type { BodyId } from './body-id';

/** frozen tick-start state of a body, read by every pairwise computation in a tick */
export type BodySnapshot = {
    readonly id: BodyId;
    readonly position: Vec3;
    readonly velocity: Vec3;
    readonly mass: number;
    readonly radius: number;
    readonly fixed: boolean;
};

type MutableBodySnapshot = {
    id: BodyId;
    position: Vec3;
    velocity: Vec3;
    mass: number;
    radius: number;
    fixed: boolean;
};

/**
 * Order-preserving copy of all live bodies, taken before any body is mutated in a tick.
 * Entries are reused between ticks, only the first `count` entries are valid.
 */
export type Snapshot = {
    /** @internal entry pool */
    pool: MutableBodySnapshot[];
    /** number of valid entries */
    count: number;
};

export function init(): Snapshot {
    return {
        pool: [],
        count: 0,
    };
}

function makeEntry(): MutableBodySnapshot {
    return {
        id: -1,
        position: vec3.create(),
        velocity: vec3.create(),
        mass: 0,
        radius: 0,
        fixed: false,
    };
}

/** copies the current state of the given bodies into the snapshot */
export function take(snapshot: Snapshot, bodies: readonly Body[]): void {
    while (snapshot.pool.length < bodies.length) {
        snapshot.pool.push(makeEntry());
    }

    for (let i = 0; i < bodies.length; i++) {
        const body = bodies[i];
        const entry = snapshot.pool[i];

        entry.id = body.id;
        vec3.copy(entry.position, body.position);
        vec3.copy(entry.velocity, body.velocity);
        entry.mass = body.mass;
        entry.radius = body.radius;
        entry.fixed = body.fixed;
    }

    snapshot.count = bodies.length;
}

/** returns the snapshot entry at the given index */
export function at(snapshot: Snapshot, index: number): BodySnapshot {
    return snapshot.pool[index];
}

/** returns a detached copy of a snapshot entry, safe to hand to user code */
export function copy(entry: BodySnapshot): BodySnapshot {
    return {
        id: entry.id,
        position: vec3.clone(entry.position),
        velocity: vec3.clone(entry.velocity),
        mass: entry.mass,
        radius: entry.radius,
        fixed: entry.fixed,
    };
}

/** whether two positions are exactly equal, pairs at the same position have no defined normal */
export function samePosition(a: Vec3, b: Vec3): boolean {
    return a[0] === b[0] && a[1] === b[1] && a[2] === b[2];
}
