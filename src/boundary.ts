import { vec3 } from 'mathcat';
import type { Body } from './body/body';
import { Axis, type Listener, WallSide } from './listener';
import type { WorldSettings } from './world-settings';

/** refreshes the render-space translation of a body from its position */
export function updateTranslation(body: Body, settings: WorldSettings): void {
    vec3.scale(body.translation, body.position, settings.units.scale);
}

/**
 * Whether a body's translation, extended by half its radius, lies outside the universe box.
 * Uses the translation as last refreshed by updateTranslation.
 */
export function isOutsideUniverse(body: Body, settings: WorldSettings): boolean {
    const [x, y] = body.translation;
    const halfRadius = body.radius / 2;
    const halfWidth = settings.universe.width / 2;
    const halfHeight = settings.universe.height / 2;

    return x - halfRadius > halfWidth || x + halfRadius < -halfWidth || y - halfRadius > halfHeight || y + halfRadius < -halfHeight;
}

/**
 * Bounces a body off the window edges.
 *
 * Each axis is checked on its own: if the body's edge is past the window edge and its velocity points further out,
 * the velocity component is negated and the position is clamped to the edge, offset inwards by half the radius.
 * The clamp uses the window half-extents directly as position values.
 *
 * @returns the number of axes the body bounced on
 */
export function bounceOffWindow(body: Body, settings: WorldSettings, listener: Listener | undefined): number {
    const halfRadius = body.radius / 2;
    const halfWidth = settings.window.width / 2;
    const halfHeight = settings.window.height / 2;

    const translation = body.translation;
    const velocity = body.velocity;
    const position = body.position;

    let bounces = 0;

    if (translation[0] - halfRadius < -halfWidth && velocity[0] < 0) {
        velocity[0] = -velocity[0];
        position[0] = -halfWidth + halfRadius;
        bounces++;
        listener?.onWallBounce?.(body, Axis.X, WallSide.MIN);
    } else if (translation[0] + halfRadius > halfWidth && velocity[0] > 0) {
        velocity[0] = -velocity[0];
        position[0] = halfWidth - halfRadius;
        bounces++;
        listener?.onWallBounce?.(body, Axis.X, WallSide.MAX);
    }

    if (translation[1] - halfRadius < -halfHeight && velocity[1] < 0) {
        velocity[1] = -velocity[1];
        position[1] = -halfHeight + halfRadius;
        bounces++;
        listener?.onWallBounce?.(body, Axis.Y, WallSide.MIN);
    } else if (translation[1] + halfRadius > halfHeight && velocity[1] > 0) {
        velocity[1] = -velocity[1];
        position[1] = halfHeight - halfRadius;
        bounces++;
        listener?.onWallBounce?.(body, Axis.Y, WallSide.MAX);
    }

    return bounces;
}
