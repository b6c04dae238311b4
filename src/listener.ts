import type { Body } from './body/body';
import type { BodySnapshot } from './body/snapshot';

/** Axis of a window edge */
export enum Axis {
    X = 0,
    Y = 1,
}

/** Which side of the window a body bounced off */
export enum WallSide {
    /** left or bottom edge */
    MIN = 0,
    /** right or top edge */
    MAX = 1,
}

/** A listener that receives simulation events during world update */
export type Listener = {
    /**
     * Called when rest detection freezes a body near the floor.
     * The body's velocity has already been zeroed and it will not be updated again.
     *
     * @param body - The body that came to rest
     */
    onBodyFixed?: (body: Body) => void;

    /**
     * Called each time an overlap between a body and another body is resolved.
     * Only `body` is changed, `other` is the other body's state at the start of the tick, it is
     * resolved separately when the integrator visits it.
     *
     * @param body - The body whose velocity and position were corrected
     * @param other - Copy of the tick-start snapshot of the body it overlapped, changing it has no effect
     */
    onBodyCollision?: (body: Body, other: BodySnapshot) => void;

    /**
     * Called when a body bounces off a window edge.
     *
     * @param body - The body, with its velocity already reflected
     * @param axis - Axis of the edge
     * @param side - Which edge on that axis
     */
    onWallBounce?: (body: Body, axis: Axis, side: WallSide) => void;

    /**
     * Called when a body leaves the universe and is despawned.
     * The body is removed from the world after all bodies have been updated for the tick.
     *
     * @param body - The despawned body
     */
    onBodyDespawned?: (body: Body) => void;
};
